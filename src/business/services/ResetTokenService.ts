import { inject, injectable } from "tsyringe";
import { IResetTokenRepository } from "../../data/interfaces/IResetTokenRepository";
import { Config } from "../../config/config";
import { Clock } from "../../utils/clock";
import { hashResetToken, TokenGenerator } from "../../utils/crypto";
import { isValidEmail, normalizeEmail } from "../../utils/email";
import { ValidationError } from "../errors/ValidationError";
import { StoreError } from "../errors/StoreError";
import { TokenStatus } from "../models/TokenStatus";

const MAX_ISSUE_ATTEMPTS = 3;

@injectable()
export class ResetTokenService {
    constructor(
        @inject("IResetTokenRepository") private readonly tokenRepository: IResetTokenRepository,
        @inject("Config") private readonly config: Config,
        @inject("Clock") private readonly clock: Clock,
        @inject("TokenGenerator") private readonly generateToken: TokenGenerator
    ) {}

    /**
     * Creates a pending token for the address and returns the raw token string.
     * The row keeps only its sha256 digest, so the link cannot be rebuilt from the store.
     */
    public async issue(email: string): Promise<string> {
        if (!isValidEmail(email)) {
            throw new ValidationError("email", "That doesn't look like a valid email address.");
        }

        const normalized = normalizeEmail(email);
        const createdAt = this.clock.now();
        const expiresAt = new Date(createdAt.getTime() + this.config.resetExpiryMinutes * 60_000);

        for (let attempt = 1; ; attempt++) {
            const token = this.generateToken();
            try {
                await this.tokenRepository.insert(normalized, hashResetToken(token), createdAt, expiresAt);
                return token;
            } catch (error) {
                if (error instanceof StoreError && error.retryable && attempt < MAX_ISSUE_ATTEMPTS) {
                    console.warn(`[ResetTokenService] token collision on attempt ${attempt}, regenerating`);
                    continue;
                }
                throw error;
            }
        }
    }

    public async evaluate(token: string): Promise<TokenStatus> {
        const record = await this.tokenRepository.findByToken(hashResetToken(token));
        if (!record) {
            return { kind: "missing" };
        }
        if (record.used) {
            return { kind: "used" };
        }
        if (record.isExpiredAt(this.clock.now())) {
            return { kind: "expired" };
        }
        return { kind: "valid", email: record.email };
    }

    /**
     * Consumes the token. The store's conditional update decides between concurrent
     * redeemers; a loser re-reads the row and reports whatever it now classifies as.
     */
    public async redeem(token: string): Promise<TokenStatus> {
        const status = await this.evaluate(token);
        if (status.kind !== "valid") {
            return status;
        }

        const consumed = await this.tokenRepository.markUsed(hashResetToken(token), this.clock.now());
        if (consumed) {
            return status;
        }

        const current = await this.evaluate(token);
        return current.kind === "valid" ? { kind: "used" } : current;
    }
}
