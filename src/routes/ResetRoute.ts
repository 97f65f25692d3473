// src/routes/ResetRoute.ts
import { Router } from "express";
import { ResetController } from "../controllers/ResetController";

export default function resetRoutes(controller: ResetController): Router {
    const router = Router();

    router.get("/", controller.showResetPage.bind(controller));
    router.post("/", controller.submitReset.bind(controller));

    return router;
}
