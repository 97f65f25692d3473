import { escapeHtml } from "../utils/html";

export type ResetPageOptions =
    | { message: string; form?: undefined }
    | { message?: string; form: { email: string } };

// The form has no action: the browser posts back to the current URL, token included.
export function renderResetPage(options: ResetPageOptions): string {
    const message = options.message ? `<p>${escapeHtml(options.message)}</p>` : "";
    const form = options.form
        ? `
<form method="POST">
  <label>New password for ${escapeHtml(options.form.email)}:</label><br>
  <input name="password" type="password" required minlength="6"><br><br>
  <button type="submit">Set new password</button>
</form>`
        : "";

    return `<!doctype html>
<html>
<head><meta charset="utf-8"><title>Password Reset</title></head>
<body>
<h2>Password Reset</h2>
${message}${form}
</body>
</html>
`;
}
