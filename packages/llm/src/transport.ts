import { FatalApiError, TransientApiError, TransportError } from "@gauntlet/schemas";
import type { ChatMessage, ThinkingOptions } from "@gauntlet/schemas";

/** The part of a credential a transport needs to authenticate. */
export interface TransportCredential {
  alias: string;
  key: string;
}

export interface TransportRequest {
  model: string;
  system: string;
  messages: ChatMessage[];
  maxTokens: number;
  /** Absent in thinking mode. */
  temperature?: number;
  thinking?: ThinkingOptions;
}

export interface TransportResponse {
  text: string;
  tokensIn: number;
  tokensOut: number;
  modelId: string;
}

/**
 * One provider's chat endpoint. Implementations make exactly one
 * request per call and report failures as TransientApiError,
 * FatalApiError, TransportError or MalformedResponseError.
 */
export interface ChatTransport {
  send(credential: TransportCredential, request: TransportRequest): Promise<TransportResponse>;
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status === 529 || status >= 500;
}

function statusOf(err: Error): number | undefined {
  if ("status" in err && typeof err.status === "number") return err.status;
  return undefined;
}

function bodyOf(err: Error): string {
  if ("error" in err && err.error !== undefined && err.error !== null) {
    return typeof err.error === "string" ? err.error : JSON.stringify(err.error);
  }
  return err.message;
}

/** Maps an SDK failure onto the call-layer taxonomy by its HTTP status. */
export function toCallError(err: unknown): Error {
  if (!(err instanceof Error)) {
    return new TransportError(String(err), { cause: err });
  }
  const status = statusOf(err);
  if (status === undefined) {
    return new TransportError(err.message, { cause: err });
  }
  if (isRetryableStatus(status)) {
    return new TransientApiError(status, err.message);
  }
  return new FatalApiError(status, bodyOf(err));
}
