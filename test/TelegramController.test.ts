import { Request, Response } from "express";
import { TelegramController } from "../src/controllers/TelegramController";
import { ResetConversationService } from "../src/business/services/ResetConversationService";
import { testConfig } from "./fixtures";

describe("TelegramController.receiveWebhook", () => {
    let conversation: { handleUpdate: jest.Mock };
    let res: { status: jest.Mock; send: jest.Mock; json: jest.Mock };

    const request = (body: unknown, secretHeader?: string): Request =>
        ({
            body,
            get: (name: string) =>
                name.toLowerCase() === "x-telegram-bot-api-secret-token" ? secretHeader : undefined,
        }) as unknown as Request;

    const createController = (secret?: string) =>
        new TelegramController(
            conversation as unknown as ResetConversationService,
            testConfig({ telegramWebhookSecret: secret })
        );

    const validUpdate = { update_id: 9, message: { message_id: 1, chat: { id: 42 }, text: "/reset" } };

    beforeEach(() => {
        conversation = { handleUpdate: jest.fn().mockResolvedValue(undefined) };
        res = { status: jest.fn(), send: jest.fn(), json: jest.fn() };
        res.status.mockReturnValue(res);
        jest.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("refuses updates when no secret is configured", async () => {
        await createController(undefined).receiveWebhook(request(validUpdate, "anything"), res as unknown as Response);

        expect(res.status).toHaveBeenCalledWith(403);
        expect(conversation.handleUpdate).not.toHaveBeenCalled();
    });

    it("refuses updates carrying the wrong secret", async () => {
        await createController("test-secret").receiveWebhook(request(validUpdate, "wrong"), res as unknown as Response);

        expect(res.status).toHaveBeenCalledWith(403);
        expect(conversation.handleUpdate).not.toHaveBeenCalled();
    });

    it("hands a valid update to the dialogue", async () => {
        await createController("test-secret").receiveWebhook(
            request(validUpdate, "test-secret"),
            res as unknown as Response
        );

        expect(conversation.handleUpdate).toHaveBeenCalledWith(validUpdate);
        expect(res.status).toHaveBeenCalledWith(200);
        expect(res.json).toHaveBeenCalledWith({ received: 1 });
    });

    it("acknowledges malformed bodies without handling them", async () => {
        await createController("test-secret").receiveWebhook(
            request({ hello: "world" }, "test-secret"),
            res as unknown as Response
        );

        expect(conversation.handleUpdate).not.toHaveBeenCalled();
        expect(res.json).toHaveBeenCalledWith({ received: 0 });
    });

    it("acknowledges updates whose turn failed", async () => {
        conversation.handleUpdate.mockRejectedValue(new Error("connection lost"));

        await createController("test-secret").receiveWebhook(
            request(validUpdate, "test-secret"),
            res as unknown as Response
        );

        expect(res.status).toHaveBeenCalledWith(200);
        expect(res.json).toHaveBeenCalledWith({ received: 1 });
    });
});
