// src/controllers/ResetController.ts
import { Request, Response } from "express";
import { inject, injectable } from "tsyringe";
import { ResetTokenService } from "../business/services/ResetTokenService";
import { TokenRejection } from "../business/models/TokenStatus";
import { IPasswordUpdater } from "../clients/PasswordUpdater";
import { renderResetPage } from "../views/ResetPage";

export const resetMessages = {
    missingToken: "Missing token.",
    missingFields: "Missing token or password.",
    invalid: "Invalid token.",
    used: "This link has already been used.",
    expired: "This link has expired.",
    updated: "Your password has been updated.",
    handOffFailed: "The reset link was accepted but the password could not be updated. Please request a new link.",
    failure: "Something went wrong. Please try again later.",
};

function rejectionMessage(status: TokenRejection): string {
    switch (status.kind) {
        case "missing":
            return resetMessages.invalid;
        case "used":
            return resetMessages.used;
        case "expired":
            return resetMessages.expired;
    }
}

function stringParam(value: unknown): string {
    return typeof value === "string" ? value.trim() : "";
}

@injectable()
export class ResetController {
    constructor(
        @inject(ResetTokenService) private readonly tokenService: ResetTokenService,
        @inject("IPasswordUpdater") private readonly passwordUpdater: IPasswordUpdater
    ) {}

    public async showResetPage(req: Request, res: Response): Promise<void> {
        try {
            const token = stringParam(req.query.token);
            if (!token) {
                this.sendPage(res, 200, resetMessages.missingToken);
                return;
            }

            const status = await this.tokenService.evaluate(token);
            if (status.kind !== "valid") {
                this.sendPage(res, 200, rejectionMessage(status));
                return;
            }

            res.status(200).type("html").send(renderResetPage({ form: { email: status.email } }));
        } catch (err) {
            this.handleError(res, err, "showResetPage failed");
        }
    }

    public async submitReset(req: Request, res: Response): Promise<void> {
        try {
            const token = stringParam(req.query.token);
            // Passwords are taken as typed; only emptiness is checked here.
            const password = typeof req.body?.password === "string" ? req.body.password : "";
            if (!token || !password) {
                this.sendPage(res, 400, resetMessages.missingFields);
                return;
            }

            const status = await this.tokenService.redeem(token);
            if (status.kind !== "valid") {
                this.sendPage(res, 400, rejectionMessage(status));
                return;
            }

            const result = await this.passwordUpdater.setPassword(status.email, password);
            if (!result.ok) {
                console.error(`[ResetController] password hand-off failed for ${status.email}: ${result.error}`);
                this.sendPage(res, 502, resetMessages.handOffFailed);
                return;
            }

            this.sendPage(res, 200, resetMessages.updated);
        } catch (err) {
            this.handleError(res, err, "submitReset failed");
        }
    }

    private sendPage(res: Response, status: number, message: string): void {
        res.status(status).type("html").send(renderResetPage({ message }));
    }

    private handleError(res: Response, err: unknown, context: string): void {
        console.error(`❌ [ResetController] ${context}:`, err);
        this.sendPage(res, 500, resetMessages.failure);
    }
}
