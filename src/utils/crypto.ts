// src/utils/crypto.ts

import crypto from "crypto";

const TOKEN_BYTES = 32;

/**
 * 256 bits from the CSPRNG, URL-safe so it can travel in a query string untouched.
 */
export function generateResetToken(): string {
    return crypto.randomBytes(TOKEN_BYTES).toString("base64url");
}

/** Only this digest is persisted; the raw token exists in the emailed link alone. */
export function hashResetToken(token: string): string {
    return crypto.createHash("sha256").update(token).digest("hex");
}

export type TokenGenerator = () => string;
