export class MetricsApiError extends Error {
  /** HTTP status, or null when the request never got a response. */
  readonly status: number | null;
  readonly retryAfterMs: number | null;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: { status?: number | null; retryAfterMs?: number | null; timedOut?: boolean } = {}
  ) {
    super(message);
    this.name = "MetricsApiError";
    this.status = options.status ?? null;
    this.retryAfterMs = options.retryAfterMs ?? null;
    this.timedOut = options.timedOut ?? false;
  }

  get retryable(): boolean {
    if (this.timedOut || this.status === null) return true;
    return this.status === 429 || this.status >= 500;
  }
}
