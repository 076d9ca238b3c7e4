import { errorMessage } from "../errors.js";
import { DELIVERY_TIMEOUT_MS, FetchLike, Notifier, NotifyResult } from "../types.js";

export const SENDGRID_SEND_URL = "https://api.sendgrid.com/v3/mail/send";

export interface SendGridSettings {
  apiKey: string;
  from: string;
  to: string[];
}

export class SendGridNotifier implements Notifier {
  readonly name = "sendgrid";

  constructor(
    private readonly settings: SendGridSettings,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async send(subject: string, htmlBody: string): Promise<NotifyResult> {
    const { apiKey, from, to } = this.settings;
    const payload = {
      personalizations: [{ to: to.map((email) => ({ email })) }],
      from: { email: from },
      subject,
      content: [
        { type: "text/plain", value: " " },
        { type: "text/html", value: htmlBody },
      ],
    };

    let response: Awaited<ReturnType<FetchLike>>;
    try {
      response = await this.fetchImpl(SENDGRID_SEND_URL, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(DELIVERY_TIMEOUT_MS),
      });
    } catch (error) {
      return { ok: false, reason: `SendGrid request failed: ${errorMessage(error)}` };
    }

    if (response.status >= 300) {
      const text = await response.text().catch(() => "");
      return {
        ok: false,
        reason: `SendGrid send failed: ${response.status} ${text || "<empty response>"}`,
      };
    }
    return { ok: true };
  }
}
