import { inject, injectable } from "tsyringe";
import { TelegramClient, UpdateBatch } from "../../clients/TelegramClient";
import { ResetConversationService } from "./ResetConversationService";
import { Config } from "../../config/config";

const ERROR_PAUSE_MS = 5000;

@injectable()
export class TelegramPoller {
    private running = false;
    private offset: number | null = null;
    private pause: { timer: NodeJS.Timeout; resume: () => void } | null = null;

    constructor(
        @inject(TelegramClient) private readonly telegram: TelegramClient,
        @inject(ResetConversationService) private readonly conversation: ResetConversationService,
        @inject("Config") private readonly config: Config
    ) {}

    public async start(): Promise<void> {
        this.running = true;
        console.log("🤖 Telegram bot polling started");
        while (this.running) {
            await this.pollOnce();
        }
        console.log("🤖 Telegram bot polling stopped");
    }

    public stop(): void {
        this.running = false;
        if (this.pause) {
            clearTimeout(this.pause.timer);
            this.pause.resume();
            this.pause = null;
        }
    }

    /**
     * One getUpdates round. Each update is its own turn: a failing turn is logged and
     * acknowledged so it is not delivered again.
     */
    public async pollOnce(): Promise<void> {
        let batch: UpdateBatch;
        try {
            batch = await this.telegram.getUpdates(this.offset, this.config.telegramPollTimeoutSeconds);
        } catch (error) {
            console.error("[TelegramPoller] getUpdates failed:", error);
            if (this.running) {
                await this.waitBeforeRetry();
            }
            return;
        }

        for (const update of batch.updates) {
            try {
                await this.conversation.handleUpdate(update);
            } catch (error) {
                console.error(`[TelegramPoller] update ${update.update_id} failed:`, error);
            }
        }

        if (batch.lastUpdateId !== null) {
            this.offset = batch.lastUpdateId + 1;
        }
    }

    // Cut short by stop().
    private waitBeforeRetry(): Promise<void> {
        return new Promise((resolve) => {
            const timer = setTimeout(() => {
                this.pause = null;
                resolve();
            }, ERROR_PAUSE_MS);
            this.pause = { timer, resume: () => resolve() };
        });
    }

    public get nextOffset(): number | null {
        return this.offset;
    }
}
