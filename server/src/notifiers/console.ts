import { Notifier, NotifyResult } from "../types.js";

export class ConsoleNotifier implements Notifier {
  readonly name = "console";

  async send(subject: string, _htmlBody: string): Promise<NotifyResult> {
    console.log(`[DRY RUN] Would email subject: ${subject}`);
    return { ok: true };
  }
}
