export type GenerationFailureKind = "rate_limited" | "auth_failed" | "network" | "empty_output" | "malformed";

export class GenerationUnavailableError extends Error {
  constructor(
    readonly kind: GenerationFailureKind,
    message: string
  ) {
    super(message);
    this.name = "GenerationUnavailableError";
  }
}

export const statusOf = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  return typeof error.status === "number" ? error.status : undefined;
};

const messageOf = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
};

export const toGenerationError = (error: unknown): GenerationUnavailableError => {
  if (error instanceof GenerationUnavailableError) return error;

  const status = statusOf(error);
  const message = messageOf(error);

  if (status === 429 || /rate limit|too many requests/i.test(message)) {
    return new GenerationUnavailableError("rate_limited", `Rate limited by model provider: ${message}`);
  }
  if (status === 401 || status === 403 || /api key|unauthorized|authentication/i.test(message)) {
    return new GenerationUnavailableError("auth_failed", `Model provider rejected credentials: ${message}`);
  }
  return new GenerationUnavailableError("network", `Model call failed: ${message}`);
};
