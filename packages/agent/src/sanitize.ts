/** Model output that tries to rewrite the agent's instructions. */
export class UnsafeContentError extends Error {
  constructor() {
    super("Potentially malicious content detected and blocked");
    this.name = "UnsafeContentError";
  }
}

const INJECTION_PATTERNS: RegExp[] = [
  /ignore\s+(previous|all|above|prior)\s+instructions?/i,
  /system\s*prompt/i,
  /you\s+are\s+now/i,
  /pretend\s+(to\s+be|you('re|\s+are))/i,
  /act\s+as\s+(?![\s\S]*character)/i,
  /override\s+(your|all|safety)/i,
  /jailbreak/i,
  /disregard\s+(your|all|any)/i,
  /new\s+instruction/i,
  /from\s+now\s+on\s+(you|ignore|act)/i,
  /<\s*script/i,
  /<\s*iframe/i,
  /javascript\s*:/i,
  /data\s*:\s*text/i,
  /base64\s*,/i,
];

// Tab, newline and carriage return survive
const CONTROL_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g;

/**
 * Truncates model text, rejects instruction-injection phrasing and
 * strips control characters. Throws UnsafeContentError on a match.
 */
export function sanitizeModelText(text: string, maxLength = 4096): string {
  const clipped = text.slice(0, maxLength);
  if (INJECTION_PATTERNS.some((pattern) => pattern.test(clipped))) {
    throw new UnsafeContentError();
  }
  return clipped.replace(CONTROL_CHARS, "").trim();
}
