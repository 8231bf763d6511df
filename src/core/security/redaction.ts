export const REDACTED = "<redacted>";

const SECRET_KEY = /api[_-]?key|secret|token|passw(?:or)?d|credential|private[_-]?key/i;

const INLINE_SECRET = /(api[_-]?key|secret|token|passw(?:or)?d)\s*[:=]\s*[^\s"]+/gi;
const BEARER = /(authorization:\s*bearer\s+)[^\s"]+/gi;
const EMAIL = /([A-Za-z0-9._%+-])[A-Za-z0-9._%+-]*@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g;

export function isSecretKey(key: string): boolean {
  return SECRET_KEY.test(key);
}

function maskEmails(text: string): string {
  return text.replace(EMAIL, (_m, first: string, domain: string) => `${first}***@${domain}`);
}

/** Masks secrets inside free text such as audit messages. */
export function redactSecrets(input: string): string {
  const output = input
    .replace(INLINE_SECRET, (_m, key: string) => `${key}=${REDACTED}`)
    .replace(BEARER, (_m, prefix: string) => `${prefix}${REDACTED}`);
  return maskEmails(output);
}

/**
 * Masks exported configuration text line by line. A `key=value` line whose
 * key looks secret keeps its key; headers are left alone.
 */
export function redactConfigText(text: string): string {
  return text
    .split("\n")
    .map((line) => {
      const index = line.indexOf("=");
      if (line.startsWith("[") || index === -1) {
        return line;
      }
      const key = line.slice(0, index);
      return isSecretKey(key) ? `${key}=${REDACTED}` : `${key}=${maskEmails(line.slice(index + 1))}`;
    })
    .join("\n");
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === "string") {
    return redactSecrets(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item));
  }
  if (value !== null && typeof value === "object") {
    return sanitizeData(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/** Audit payloads: values under secret-looking keys are dropped, strings are scrubbed. */
export function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(data).map(([key, value]): [string, unknown] => [
      key,
      isSecretKey(key) ? REDACTED : sanitizeValue(value),
    ]),
  );
}
