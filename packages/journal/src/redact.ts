const SENSITIVE_KEYS = /^(key|authorization|x-api-key|password|secret|token|api[_-]?key|credential|access[_-]?token|refresh[_-]?token|client[_-]?secret|database[_-]?url)$/i;
const SENSITIVE_VALUES = /Bearer\s|sk-ant-|sk-proj-|sk-[A-Za-z0-9_-]{16,}|xai-[A-Za-z0-9]{16,}|gsk_[A-Za-z0-9]{16,}|AIza[A-Za-z0-9_-]{35}|eyJ[A-Za-z0-9_-]{10,}\./;

/** Replaces secret-looking keys and values with "[REDACTED]", recursively. */
export function redactPayload(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value !== "object") {
    if (typeof value === "string" && SENSITIVE_VALUES.test(value)) return "[REDACTED]";
    return value;
  }
  if (Array.isArray(value)) return value.map(redactPayload);
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (SENSITIVE_KEYS.test(k) && typeof v === "string") {
      result[k] = "[REDACTED]";
    } else {
      result[k] = redactPayload(v);
    }
  }
  return result;
}
