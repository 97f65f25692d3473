import axios from "axios";
import { IPasswordUpdater, PasswordUpdateResult } from "./PasswordUpdater";

export class HttpPasswordUpdater implements IPasswordUpdater {
  constructor(
    private readonly url: string,
    private readonly bearerToken?: string
  ) {}

  async setPassword(email: string, newPassword: string): Promise<PasswordUpdateResult> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.bearerToken) {
      headers.Authorization = `Bearer ${this.bearerToken}`;
    }

    try {
      await axios.post(this.url, { email, password: newPassword }, { headers, timeout: 8000 });
      return { ok: true };
    } catch (error) {
      const message = axios.isAxiosError(error)
        ? `Account store responded with ${error.response?.status ?? error.code ?? "no response"}`
        : error instanceof Error
          ? error.message
          : "Unknown account store error";
      console.error("[HttpPasswordUpdater] setPassword failed:", message);
      return { ok: false, error: message };
    }
  }
}
