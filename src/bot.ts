import "reflect-metadata";
import { container } from "./container";
import { Config } from "./config/config";
import { TelegramPoller } from "./business/services/TelegramPoller";
import { IResetTokenRepository } from "./data/interfaces/IResetTokenRepository";
import { runBot } from "./botRunner";

const config = container.resolve<Config>("Config");
if (!config.botToken) {
    throw new Error("❌ BOT_TOKEN env variable is required for bot mode");
}

const poller = container.resolve(TelegramPoller);
const store = container.resolve<IResetTokenRepository>("IResetTokenRepository");

runBot(poller, store, (onSignal) => {
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, onSignal);
    }
})
    .then(() => {
        console.log("👋 Token store closed, exiting");
        process.exit(0);
    })
    .catch((error: unknown) => {
        console.error("❌ Telegram bot crashed:", error);
        process.exit(1);
    });
