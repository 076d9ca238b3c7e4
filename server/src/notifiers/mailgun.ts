import { errorMessage } from "../errors.js";
import { DELIVERY_TIMEOUT_MS, FetchLike, Notifier, NotifyResult } from "../types.js";

export interface MailgunSettings {
  apiKey: string;
  domain: string;
  baseUrl: string;
  from: string;
  to: string[];
}

export class MailgunNotifier implements Notifier {
  readonly name = "mailgun";

  constructor(
    private readonly settings: MailgunSettings,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async send(subject: string, htmlBody: string): Promise<NotifyResult> {
    const { apiKey, domain, baseUrl, from, to } = this.settings;
    const form = new URLSearchParams();
    form.append("from", from);
    to.forEach((recipient) => form.append("to", recipient));
    form.append("subject", subject);
    form.append("text", " ");
    form.append("html", htmlBody);

    let response: Awaited<ReturnType<FetchLike>>;
    try {
      response = await this.fetchImpl(`${baseUrl}/v3/${domain}/messages`, {
        method: "POST",
        headers: {
          Authorization: `Basic ${Buffer.from(`api:${apiKey}`).toString("base64")}`,
        },
        body: form,
        signal: AbortSignal.timeout(DELIVERY_TIMEOUT_MS),
      });
    } catch (error) {
      return { ok: false, reason: `Mailgun request failed: ${errorMessage(error)}` };
    }

    if (response.status >= 300) {
      const text = await response.text().catch(() => "");
      return {
        ok: false,
        reason: `Mailgun send failed: ${response.status} ${text || "<empty response>"}`,
      };
    }
    return { ok: true };
  }
}
