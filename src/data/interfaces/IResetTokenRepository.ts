import { ResetTokenModel } from "../../business/models/ResetTokenModel";

/** `token` is always the stored digest, never the raw link token. */
export interface IResetTokenRepository {
    insert(email: string, token: string, createdAt: Date, expiresAt: Date): Promise<ResetTokenModel>;
    findByToken(token: string): Promise<ResetTokenModel | null>;
    /**
     * Flips `used` to true only while the row is still unused and unexpired at `now`.
     * Resolves to true when this call performed the transition.
     */
    markUsed(token: string, now: Date): Promise<boolean>;
    close(): Promise<void>;
}
