import { IPasswordUpdater, PasswordUpdateResult } from "./PasswordUpdater";

export class LoggingPasswordUpdater implements IPasswordUpdater {
  async setPassword(email: string): Promise<PasswordUpdateResult> {
    console.warn(
      `[LoggingPasswordUpdater] PASSWORD_UPDATE_URL not set; reset token for ${email} consumed but no account store was updated.`
    );
    return { ok: true };
  }
}
