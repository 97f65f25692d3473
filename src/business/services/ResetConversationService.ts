import { inject, injectable } from "tsyringe";
import { InlineKeyboardMarkup, TelegramClient, TelegramUpdate } from "../../clients/TelegramClient";
import { ResetTokenService } from "./ResetTokenService";
import { TransactionalMailService } from "./TransactionalMailService";
import { DeliveryError } from "../errors/DeliveryError";
import { isValidEmail, normalizeEmail } from "../../utils/email";

export type ConversationState = "IDLE" | "AWAITING_EMAIL";

export const RESET_CALLBACK_DATA = "reset";

export const messages = {
    welcome: "Welcome! Choose an option:",
    resetButton: "🔄 Reset Password",
    askEmail: "Please reply with the email you want to reset (example: you@domain.com).",
    invalidEmail: "That doesn't look like a valid email. Please try again.",
    deliveryFailed: "Failed to send email. Please try again later.",
    cancelled: "Cancelled.",
    sent: (email: string) => `Reset link sent to ${email}. Check your email.`,
};

const startKeyboard: InlineKeyboardMarkup = {
    inline_keyboard: [[{ text: messages.resetButton, callback_data: RESET_CALLBACK_DATA }]],
};

/**
 * Turn-based intake dialogue: IDLE → AWAITING_EMAIL → IDLE, one state record per chat.
 */
@injectable()
export class ResetConversationService {
    private readonly states = new Map<number, ConversationState>();

    constructor(
        @inject(TelegramClient) private readonly telegram: TelegramClient,
        @inject(ResetTokenService) private readonly tokenService: ResetTokenService,
        @inject(TransactionalMailService) private readonly mailService: TransactionalMailService
    ) {}

    public getState(chatId: number): ConversationState {
        return this.states.get(chatId) ?? "IDLE";
    }

    public async handleUpdate(update: TelegramUpdate): Promise<void> {
        if (update.callback_query) {
            const query = update.callback_query;
            await this.telegram.answerCallbackQuery(query.id);
            if (query.data === RESET_CALLBACK_DATA && query.message) {
                await this.telegram.editMessageText(query.message.chat.id, query.message.message_id, messages.askEmail);
                this.setState(query.message.chat.id, "AWAITING_EMAIL");
            }
            return;
        }

        const text = update.message?.text;
        if (!update.message || text === undefined) {
            return;
        }

        const chatId = update.message.chat.id;
        const command = this.parseCommand(text);

        switch (command) {
            case "start":
                await this.telegram.sendMessage(chatId, messages.welcome, startKeyboard);
                return;
            case "reset":
                await this.telegram.sendMessage(chatId, messages.askEmail);
                this.setState(chatId, "AWAITING_EMAIL");
                return;
            case "cancel":
                this.setState(chatId, "IDLE");
                await this.telegram.sendMessage(chatId, messages.cancelled);
                return;
            case null:
                if (this.getState(chatId) === "AWAITING_EMAIL") {
                    await this.receiveEmail(chatId, text);
                }
                return;
            default:
                return;
        }
    }

    private async receiveEmail(chatId: number, text: string): Promise<void> {
        if (!isValidEmail(text)) {
            await this.telegram.sendMessage(chatId, messages.invalidEmail);
            return;
        }

        const email = normalizeEmail(text);
        const token = await this.tokenService.issue(email);

        try {
            await this.mailService.sendPasswordReset({ to: email, token });
        } catch (error) {
            if (!(error instanceof DeliveryError)) {
                throw error;
            }
            this.setState(chatId, "IDLE");
            await this.telegram.sendMessage(chatId, messages.deliveryFailed);
            return;
        }

        this.setState(chatId, "IDLE");
        await this.telegram.sendMessage(chatId, messages.sent(email));
    }

    // "/reset@SomeBot extra" → "reset"; plain text → null
    private parseCommand(text: string): string | null {
        const trimmed = text.trim();
        if (!trimmed.startsWith("/")) {
            return null;
        }
        const [head] = trimmed.slice(1).split(/\s+/);
        const [name] = head.split("@");
        return name.toLowerCase();
    }

    private setState(chatId: number, state: ConversationState): void {
        if (state === "IDLE") {
            this.states.delete(chatId);
        } else {
            this.states.set(chatId, state);
        }
    }
}
