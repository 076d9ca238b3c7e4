import { ConfigError } from "../errors.js";
import { EmailSettings, FetchLike, Notifier } from "../types.js";
import { ConsoleNotifier } from "./console.js";
import { MailgunNotifier } from "./mailgun.js";
import { SendGridNotifier } from "./sendgrid.js";

export interface NotifierOptions {
  dryRun?: boolean;
  fetchImpl?: FetchLike;
}

function requireSender(email: EmailSettings): { from: string; to: string[] } {
  if (!email.from || !email.to.length) {
    throw new ConfigError("Missing EMAIL_FROM or EMAIL_TO.");
  }
  return { from: email.from, to: email.to };
}

/**
 * Builds the configured notifier. Credentials are checked here so a
 * misconfigured run stops before any mail is attempted.
 */
export function createNotifier(
  email: EmailSettings,
  options: NotifierOptions = {}
): Notifier {
  const provider = options.dryRun ? "console" : email.provider;

  switch (provider) {
    case "console":
      return new ConsoleNotifier();
    case "sendgrid": {
      const { from, to } = requireSender(email);
      if (!email.sendgrid.apiKey) {
        throw new ConfigError("Missing SENDGRID_API_KEY.");
      }
      return new SendGridNotifier(
        { apiKey: email.sendgrid.apiKey, from, to },
        options.fetchImpl
      );
    }
    case "mailgun": {
      const { apiKey, domain, baseUrl } = email.mailgun;
      if (!apiKey || !domain || !email.from || !email.to.length) {
        throw new ConfigError(
          "Missing one of MAILGUN_API_KEY, MAILGUN_DOMAIN, EMAIL_FROM, or EMAIL_TO."
        );
      }
      return new MailgunNotifier(
        { apiKey, domain, baseUrl, from: email.from, to: email.to },
        options.fetchImpl
      );
    }
  }
}
