/**
 * Error taxonomy shared across packages. Callers branch on class, never
 * on message text.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class NoCandidatesError extends Error {
  constructor(agentId?: string) {
    super(agentId ? `No prompt candidates for agent ${agentId}` : "No prompt candidates available");
    this.name = "NoCandidatesError";
  }
}

/** Every usable credential is cooling down; the caller should back off. */
export class CredentialsExhaustedError extends Error {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super(
      `All API keys are rate-limited or over budget. Shortest cooldown: ${Math.round(retryAfterSeconds)}s`
    );
    this.name = "CredentialsExhaustedError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/** No credential exists, or all are deactivated or over budget. */
export class NoCredentialsAvailableError extends Error {
  constructor() {
    super("No API keys are available. Check budgets and key validity.");
    this.name = "NoCredentialsAvailableError";
  }
}

/** Non-retryable provider response (bad request, auth failure, ...). */
export class FatalApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`API error ${status}: ${body}`);
    this.name = "FatalApiError";
    this.status = status;
    this.body = body;
  }
}

/** Provider answered with a retryable status (429, 529, 5xx). */
export class TransientApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "TransientApiError";
    this.status = status;
  }
}

/** The request never produced an HTTP status: reset, refused, DNS, ... */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class MalformedResponseError extends Error {
  constructor(detail: string) {
    super(`Unexpected API response format: ${detail}`);
    this.name = "MalformedResponseError";
  }
}

export class RetriesExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const cause = lastError instanceof Error ? lastError.message : String(lastError);
    super(`API call failed after ${attempts} attempts. Last error: ${cause}`, { cause: lastError });
    this.name = "RetriesExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class PolicyStateCorruptError extends Error {
  readonly agentId: string;

  constructor(agentId: string, errors: string[]) {
    super(`Stored policy state for agent ${agentId} is malformed: ${errors.join(", ")}`);
    this.name = "PolicyStateCorruptError";
    this.agentId = agentId;
  }
}
