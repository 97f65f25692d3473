import axios from "axios";
import { inject, injectable } from "tsyringe";
import { z } from "zod";
import { Config } from "../config/config";

const chatSchema = z.object({ id: z.number() });

const messageSchema = z.object({
    message_id: z.number(),
    chat: chatSchema,
    text: z.string().optional(),
});

export const telegramUpdateSchema = z.object({
    update_id: z.number(),
    message: messageSchema.optional(),
    callback_query: z
        .object({
            id: z.string(),
            data: z.string().optional(),
            message: messageSchema.optional(),
        })
        .optional(),
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

export type InlineKeyboardMarkup = {
    inline_keyboard: Array<Array<{ text: string; callback_data: string }>>;
};

export type UpdateBatch = {
    updates: TelegramUpdate[];
    // Highest update_id seen, including entries that failed validation.
    lastUpdateId: number | null;
};

const getUpdatesResponseSchema = z.object({
    ok: z.literal(true),
    result: z.array(z.object({ update_id: z.number() }).passthrough()),
});

export function parseUpdate(raw: unknown): TelegramUpdate | null {
    const parsed = telegramUpdateSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
}

@injectable()
export class TelegramClient {
    private readonly baseUrl: string;

    constructor(@inject("Config") config: Config) {
        if (!config.botToken) {
            throw new Error("BOT_TOKEN env variable is required for the Telegram client");
        }
        this.baseUrl = `${config.telegramApiBaseUrl.replace(/\/$/, "")}/bot${config.botToken}`;
    }

    public async getUpdates(offset: number | null, timeoutSeconds: number): Promise<UpdateBatch> {
        const { data } = await axios.post<unknown>(
            `${this.baseUrl}/getUpdates`,
            {
                offset: offset ?? undefined,
                timeout: timeoutSeconds,
                allowed_updates: ["message", "callback_query"],
            },
            { timeout: (timeoutSeconds + 10) * 1000 }
        );

        const response = getUpdatesResponseSchema.parse(data);
        const updates: TelegramUpdate[] = [];
        let lastUpdateId: number | null = null;

        for (const raw of response.result) {
            lastUpdateId = lastUpdateId === null ? raw.update_id : Math.max(lastUpdateId, raw.update_id);
            const update = parseUpdate(raw);
            if (update) {
                updates.push(update);
            } else {
                console.warn(`[TelegramClient] skipping malformed update ${raw.update_id}`);
            }
        }

        return { updates, lastUpdateId };
    }

    public async sendMessage(chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<void> {
        const payload: Record<string, unknown> = { chat_id: chatId, text };
        if (replyMarkup) {
            payload.reply_markup = replyMarkup;
        }
        await this.call("sendMessage", payload);
    }

    public async answerCallbackQuery(callbackQueryId: string): Promise<void> {
        await this.call("answerCallbackQuery", { callback_query_id: callbackQueryId });
    }

    public async editMessageText(chatId: number, messageId: number, text: string): Promise<void> {
        await this.call("editMessageText", { chat_id: chatId, message_id: messageId, text });
    }

    private async call(method: string, payload: Record<string, unknown>): Promise<void> {
        await axios.post(`${this.baseUrl}/${method}`, payload, {
            headers: { "Content-Type": "application/json" },
            timeout: 8000,
        });
    }
}
