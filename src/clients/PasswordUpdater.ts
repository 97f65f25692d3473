export type PasswordUpdateResult = { ok: true } | { ok: false; error: string };

/**
 * Boundary to whatever system owns the user accounts. Hashing and storing the
 * credential is its job; this service only guarantees the reset token was consumed.
 */
export interface IPasswordUpdater {
  setPassword(email: string, newPassword: string): Promise<PasswordUpdateResult>;
}
