import express, { Express } from "express";
import { DependencyContainer } from "tsyringe";
import { Config } from "./config/config";
import resetRoutes from "./routes/ResetRoute";
import telegramRoutes from "./routes/TelegramRoute";
import { ResetController } from "./controllers/ResetController";
import { TelegramController } from "./controllers/TelegramController";

export function createApp(container: DependencyContainer): Express {
    const config = container.resolve<Config>("Config");
    const app = express();

    app.set("trust proxy", true);
    app.use(express.urlencoded({ extended: false }));
    app.use(express.json({ limit: "1mb" }));

    app.use(config.resetPath, resetRoutes(container.resolve(ResetController)));

    if (config.botToken && config.telegramWebhookSecret) {
        app.use("/telegram", telegramRoutes(container.resolve(TelegramController)));
    }

    //health check endpoint
    app.get("/health", (_req, res) => {
        res.status(200).send("ok");
    });

    return app;
}
