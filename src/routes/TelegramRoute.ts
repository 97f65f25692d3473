import { Router } from "express";
import { TelegramController } from "../controllers/TelegramController";

export default function telegramRoutes(controller: TelegramController): Router {
    const router = Router();

    router.post("/webhook", controller.receiveWebhook.bind(controller));

    return router;
}
