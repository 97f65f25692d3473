import { Request, Response } from "express";
import { inject, injectable } from "tsyringe";
import { ResetConversationService } from "../business/services/ResetConversationService";
import { parseUpdate } from "../clients/TelegramClient";
import { Config } from "../config/config";

const SECRET_HEADER = "x-telegram-bot-api-secret-token";

@injectable()
export class TelegramController {
    constructor(
        @inject(ResetConversationService) private readonly conversation: ResetConversationService,
        @inject("Config") private readonly config: Config
    ) {}

    public async receiveWebhook(req: Request, res: Response): Promise<void> {
        const secret = this.config.telegramWebhookSecret;
        if (!secret || req.get(SECRET_HEADER) !== secret) {
            res.status(403).send("forbidden");
            return;
        }

        const update = parseUpdate(req.body);
        if (!update) {
            res.status(200).json({ received: 0 });
            return;
        }

        // Always acknowledge: Telegram redelivers anything that is not a 2xx.
        try {
            await this.conversation.handleUpdate(update);
        } catch (error) {
            console.error(`[TelegramController] update ${update.update_id} failed`, error);
        }
        res.status(200).json({ received: 1 });
    }
}
