export class ParseError extends Error {
  constructor(message = "Unparseable value") {
    super(message);
    this.name = "ParseError";
  }
}

/** Missing or invalid settings; raised before anything is delivered. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly provider: string
  ) {
    super(message);
    this.name = "DeliveryError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error ?? "");
}
