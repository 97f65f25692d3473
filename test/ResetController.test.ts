import { Request, Response } from "express";
import { ResetController } from "../src/controllers/ResetController";
import { ResetTokenService } from "../src/business/services/ResetTokenService";
import { SqliteResetTokenRepository } from "../src/data/repositories/SqliteResetTokenRepository";
import { IResetTokenRepository } from "../src/data/interfaces/IResetTokenRepository";
import { StoreError } from "../src/business/errors/StoreError";
import { hashResetToken } from "../src/utils/crypto";
import { FakeClock, sequenceTokens, testConfig } from "./fixtures";

type MockResponse = {
    statusCode: number;
    body: string;
    status: jest.Mock;
    type: jest.Mock;
    send: jest.Mock;
};

function mockResponse(): MockResponse {
    const res: MockResponse = {
        statusCode: 0,
        body: "",
        status: jest.fn(),
        type: jest.fn(),
        send: jest.fn(),
    };
    res.status.mockImplementation((code: number) => {
        res.statusCode = code;
        return res;
    });
    res.type.mockReturnValue(res);
    res.send.mockImplementation((body: string) => {
        res.body = body;
        return res;
    });
    return res;
}

function request(query: Record<string, string>, body: Record<string, string> = {}): Request {
    return { query, body } as unknown as Request;
}

describe("ResetController", () => {
    let repository: SqliteResetTokenRepository;
    let clock: FakeClock;
    let passwordUpdater: { setPassword: jest.Mock };
    let tokenService: ResetTokenService;
    let controller: ResetController;

    const get = async (query: Record<string, string>) => {
        const res = mockResponse();
        await controller.showResetPage(request(query), res as unknown as Response);
        return res;
    };

    const post = async (query: Record<string, string>, body: Record<string, string>) => {
        const res = mockResponse();
        await controller.submitReset(request(query, body), res as unknown as Response);
        return res;
    };

    beforeEach(async () => {
        repository = new SqliteResetTokenRepository(":memory:");
        clock = new FakeClock("2024-05-01T12:00:00.000Z");
        passwordUpdater = { setPassword: jest.fn().mockResolvedValue({ ok: true }) };
        tokenService = new ResetTokenService(repository, testConfig(), clock, sequenceTokens("tok123"));
        controller = new ResetController(tokenService, passwordUpdater);
        jest.spyOn(console, "error").mockImplementation(() => undefined);

        await tokenService.issue("user@example.com");
    });

    afterEach(async () => {
        await repository.close();
        jest.restoreAllMocks();
    });

    describe("GET", () => {
        it("asks for a token when none is given", async () => {
            const res = await get({});

            expect(res.statusCode).toBe(200);
            expect(res.body).toContain("<p>Missing token.</p>");
            expect(res.body).not.toContain("<form");
        });

        it("rejects unknown tokens", async () => {
            const res = await get({ token: "unknown" });

            expect(res.statusCode).toBe(200);
            expect(res.body).toContain("<p>Invalid token.</p>");
        });

        it("shows the password form bound to the token's address", async () => {
            const res = await get({ token: "tok123" });

            expect(res.statusCode).toBe(200);
            expect(res.type).toHaveBeenCalledWith("html");
            expect(res.body).toContain('<form method="POST">');
            expect(res.body).toContain("<label>New password for user@example.com:</label>");
        });

        it("does not consume the token", async () => {
            await get({ token: "tok123" });

            await expect(tokenService.evaluate("tok123")).resolves.toEqual({ kind: "valid", email: "user@example.com" });
        });

        it("reports expired tokens", async () => {
            clock.advanceMinutes(61);

            const res = await get({ token: "tok123" });

            expect(res.body).toContain("<p>This link has expired.</p>");
        });

        it("escapes the address in the form", async () => {
            const escaping = new ResetTokenService(repository, testConfig(), clock, sequenceTokens("tok-escape"));
            await escaping.issue("a<b>@example.com");

            const res = await get({ token: "tok-escape" });

            expect(res.body).toContain("New password for a&lt;b&gt;@example.com:");
        });
    });

    describe("POST", () => {
        it("rejects an empty password before any lookup", async () => {
            const lookup = jest.spyOn(repository, "findByToken");

            const res = await post({ token: "tok123" }, { password: "" });

            expect(res.statusCode).toBe(400);
            expect(res.body).toContain("<p>Missing token or password.</p>");
            expect(lookup).not.toHaveBeenCalled();
        });

        it("rejects a missing token", async () => {
            const res = await post({}, { password: "n3w-pass" });

            expect(res.statusCode).toBe(400);
            expect(res.body).toContain("<p>Missing token or password.</p>");
        });

        it("consumes the token, hands off the password and reports success", async () => {
            const res = await post({ token: "tok123" }, { password: "n3w-pass" });

            expect(res.statusCode).toBe(200);
            expect(res.body).toContain("<p>Your password has been updated.</p>");
            expect(passwordUpdater.setPassword).toHaveBeenCalledWith("user@example.com", "n3w-pass");

            const page = await get({ token: "tok123" });
            expect(page.body).toContain("<p>This link has already been used.</p>");
        });

        it("rejects a second redemption", async () => {
            await post({ token: "tok123" }, { password: "n3w-pass" });

            const res = await post({ token: "tok123" }, { password: "other-pass" });

            expect(res.statusCode).toBe(400);
            expect(res.body).toContain("<p>This link has already been used.</p>");
            expect(passwordUpdater.setPassword).toHaveBeenCalledTimes(1);
        });

        it("rejects expired tokens without mutating them", async () => {
            clock.advanceMinutes(61);

            const res = await post({ token: "tok123" }, { password: "n3w-pass" });

            expect(res.statusCode).toBe(400);
            expect(res.body).toContain("<p>This link has expired.</p>");
            expect(passwordUpdater.setPassword).not.toHaveBeenCalled();
            await expect(repository.findByToken(hashResetToken("tok123"))).resolves.toMatchObject({ used: false });
        });

        it("rejects unknown tokens", async () => {
            const res = await post({ token: "unknown" }, { password: "n3w-pass" });

            expect(res.statusCode).toBe(400);
            expect(res.body).toContain("<p>Invalid token.</p>");
        });

        it("reports a failed hand-off while keeping the token consumed", async () => {
            passwordUpdater.setPassword.mockResolvedValue({ ok: false, error: "Account store responded with 500" });

            const res = await post({ token: "tok123" }, { password: "n3w-pass" });

            expect(res.statusCode).toBe(502);
            expect(res.body).toContain(
                "<p>The reset link was accepted but the password could not be updated. Please request a new link.</p>"
            );
            await expect(tokenService.evaluate("tok123")).resolves.toEqual({ kind: "used" });
        });

        it("answers store failures with a server error", async () => {
            const broken: IResetTokenRepository = {
                insert: jest.fn(),
                findByToken: jest.fn().mockRejectedValue(new StoreError("STORE_FAILURE", "connection lost")),
                markUsed: jest.fn(),
                close: jest.fn(),
            };
            controller = new ResetController(
                new ResetTokenService(broken, testConfig(), clock, sequenceTokens()),
                passwordUpdater
            );

            const res = await post({ token: "tok123" }, { password: "n3w-pass" });

            expect(res.statusCode).toBe(500);
            expect(res.body).toContain("<p>Something went wrong. Please try again later.</p>");
            expect(broken.markUsed).not.toHaveBeenCalled();
        });
    });
});
