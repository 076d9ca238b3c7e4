import { ConfigError } from "../src/errors";
import { ConsoleNotifier } from "../src/notifiers/console";
import { createNotifier } from "../src/notifiers/factory";
import { MailgunNotifier } from "../src/notifiers/mailgun";
import { SENDGRID_SEND_URL, SendGridNotifier } from "../src/notifiers/sendgrid";
import { EmailSettings, FetchLike } from "../src/types";

type FetchInit = Parameters<FetchLike>[1];

function fakeFetch(status: number, body = "") {
  const calls: Array<{ url: string; init: FetchInit }> = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return { status, text: async () => body };
  };
  return { fetchImpl, calls };
}

const email: EmailSettings = {
  provider: "mailgun",
  from: "alerts@example.com",
  to: ["me@example.com", "desk@example.com"],
  mailgun: { apiKey: "test-key", domain: "mg.example.com", baseUrl: "https://api.mailgun.net" },
  sendgrid: { apiKey: "test-sendgrid-key" },
};

describe("MailgunNotifier", () => {
  const settings = {
    apiKey: "test-key",
    domain: "mg.example.com",
    baseUrl: "https://api.mailgun.net",
    from: "alerts@example.com",
    to: ["me@example.com", "desk@example.com"],
  };

  it("posts a form to the domain's messages endpoint", async () => {
    const { fetchImpl, calls } = fakeFetch(200, '{"message":"Queued"}');
    const notifier = new MailgunNotifier(settings, fetchImpl);

    await expect(notifier.send("bought 1 stocks, sold $5.00 profit", "&nbsp;")).resolves.toEqual({
      ok: true,
    });

    expect(calls).toHaveLength(1);
    const [{ url, init }] = calls;
    expect(url).toBe("https://api.mailgun.net/v3/mg.example.com/messages");
    expect(init.method).toBe("POST");
    expect(init.headers.Authorization).toBe(
      `Basic ${Buffer.from("api:test-key").toString("base64")}`
    );
    if (!(init.body instanceof URLSearchParams)) {
      throw new Error("expected a form body");
    }
    expect(init.body.get("from")).toBe("alerts@example.com");
    expect(init.body.getAll("to")).toEqual(["me@example.com", "desk@example.com"]);
    expect(init.body.get("subject")).toBe("bought 1 stocks, sold $5.00 profit");
    expect(init.body.get("text")).toBe(" ");
    expect(init.body.get("html")).toBe("&nbsp;");
  });

  it("bounds the request with an abort signal", async () => {
    const { fetchImpl, calls } = fakeFetch(200);
    await new MailgunNotifier(settings, fetchImpl).send("subject", "&nbsp;");

    const signal = calls[0].init.signal;
    expect(signal).toBeDefined();
    expect(signal?.aborted).toBe(false);
  });

  it("reports a timed-out request as a failure", async () => {
    const notifier = new MailgunNotifier(settings, async () => {
      throw new Error("The operation was aborted due to timeout");
    });

    await expect(notifier.send("subject", "&nbsp;")).resolves.toEqual({
      ok: false,
      reason: "Mailgun request failed: The operation was aborted due to timeout",
    });
  });

  it("still fails cleanly when the error body cannot be read", async () => {
    const notifier = new MailgunNotifier(settings, async () => ({
      status: 503,
      text: async () => {
        throw new Error("socket closed");
      },
    }));

    await expect(notifier.send("subject", "&nbsp;")).resolves.toEqual({
      ok: false,
      reason: "Mailgun send failed: 503 <empty response>",
    });
  });

  it("reports non-2xx responses as failures", async () => {
    const { fetchImpl } = fakeFetch(401, "Forbidden");
    const notifier = new MailgunNotifier(settings, fetchImpl);

    await expect(notifier.send("subject", "&nbsp;")).resolves.toEqual({
      ok: false,
      reason: "Mailgun send failed: 401 Forbidden",
    });
  });

  it("reports network errors as failures", async () => {
    const notifier = new MailgunNotifier(settings, async () => {
      throw new Error("getaddrinfo ENOTFOUND api.mailgun.net");
    });

    await expect(notifier.send("subject", "&nbsp;")).resolves.toEqual({
      ok: false,
      reason: "Mailgun request failed: getaddrinfo ENOTFOUND api.mailgun.net",
    });
  });
});

describe("SendGridNotifier", () => {
  const settings = {
    apiKey: "test-sendgrid-key",
    from: "alerts@example.com",
    to: ["me@example.com"],
  };

  it("posts a JSON message", async () => {
    const { fetchImpl, calls } = fakeFetch(202);
    const notifier = new SendGridNotifier(settings, fetchImpl);

    await expect(notifier.send("subject line", "&nbsp;")).resolves.toEqual({ ok: true });

    const [{ url, init }] = calls;
    expect(url).toBe(SENDGRID_SEND_URL);
    expect(init.signal?.aborted).toBe(false);
    expect(init.headers).toEqual({
      Authorization: "Bearer test-sendgrid-key",
      "Content-Type": "application/json",
    });
    expect(typeof init.body === "string" ? JSON.parse(init.body) : null).toEqual({
      personalizations: [{ to: [{ email: "me@example.com" }] }],
      from: { email: "alerts@example.com" },
      subject: "subject line",
      content: [
        { type: "text/plain", value: " " },
        { type: "text/html", value: "&nbsp;" },
      ],
    });
  });

  it("reports an empty error body", async () => {
    const { fetchImpl } = fakeFetch(500);
    const notifier = new SendGridNotifier(settings, fetchImpl);

    await expect(notifier.send("subject", "&nbsp;")).resolves.toEqual({
      ok: false,
      reason: "SendGrid send failed: 500 <empty response>",
    });
  });
});

describe("createNotifier", () => {
  it("builds the configured provider", () => {
    const { fetchImpl } = fakeFetch(200);
    expect(createNotifier(email, { fetchImpl })).toBeInstanceOf(MailgunNotifier);
    expect(
      createNotifier({ ...email, provider: "sendgrid" }, { fetchImpl })
    ).toBeInstanceOf(SendGridNotifier);
  });

  it("uses the console notifier for dry runs", () => {
    expect(createNotifier(email, { dryRun: true })).toBeInstanceOf(ConsoleNotifier);
    expect(createNotifier({ ...email, provider: "console", to: [] }).name).toBe("console");
  });

  it("fails fast on missing Mailgun settings", () => {
    expect(() =>
      createNotifier({ ...email, mailgun: { ...email.mailgun, apiKey: undefined } })
    ).toThrow(
      new ConfigError("Missing one of MAILGUN_API_KEY, MAILGUN_DOMAIN, EMAIL_FROM, or EMAIL_TO.")
    );
    expect(() => createNotifier({ ...email, to: [] })).toThrow(ConfigError);
  });

  it("fails fast on missing SendGrid settings", () => {
    expect(() =>
      createNotifier({ ...email, provider: "sendgrid", sendgrid: {} })
    ).toThrow("Missing SENDGRID_API_KEY.");
    expect(() =>
      createNotifier({ ...email, provider: "sendgrid", from: undefined })
    ).toThrow("Missing EMAIL_FROM or EMAIL_TO.");
  });
});

describe("ConsoleNotifier", () => {
  it("logs the subject instead of sending", async () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);

    await expect(new ConsoleNotifier().send("subject", "&nbsp;")).resolves.toEqual({ ok: true });
    expect(log).toHaveBeenCalledWith("[DRY RUN] Would email subject: subject");

    log.mockRestore();
  });
});
