/** Имена параметров, значения которых нельзя писать в лог. */
const SENSITIVE_PARAM = "access_token|refresh_token|id_token|token|code|client_secret|password|pass|api[_-]?key|key";

const SENSITIVE_KEY_RE = new RegExp(`^(?:${SENSITIVE_PARAM}|authorization)$`, "i");
const QUERY_PARAM_RE = new RegExp(`([?#&;](?:${SENSITIVE_PARAM})=)([^&#;\\s]+)`, "gi");
const TEXT_PARAM_RE = new RegExp(`\\b(${SENSITIVE_PARAM})\\b\\s*[:=]\\s*([^\\s,;&#]+)`, "gi");

export function isSensitiveKey(k: string): boolean {
  return SENSITIVE_KEY_RE.test(String(k ?? ""));
}

/**
 * Замаскировать секреты в пользовательском идентификаторе (для логов).
 *
 * Идентификатор может оказаться URL с токеном в query, а fragment после `#`
 * в OAuth-потоках тоже часто несёт токены. Разбор не через `new URL()`:
 * идентификаторы вроде `bob@example.com` он не принимает.
 *
 * Пример: `example.com/cb?token=abc&x=1#id_token=zzz` → `example.com/cb?token=***&x=1#***`
 */
export function redactIdentifierForLog(identifier: string): string {
  const raw = String(identifier ?? "");
  if (!raw) return raw;

  const hashAt = raw.indexOf("#");
  const head = hashAt >= 0 ? raw.slice(0, hashAt) : raw;
  const masked = head.replace(QUERY_PARAM_RE, "$1***");
  return hashAt >= 0 ? `${masked}#***` : masked;
}

/**
 * Замаскировать секреты в произвольной строке (сообщения, причины ошибок).
 *
 * Поддерживает `?token=...`, `password: ...`, `Authorization: Bearer|Basic ...`.
 */
export function redactSecretsInStringForLog(input: string): string {
  const s = String(input ?? "");
  if (!s) return s;

  return s
    .replace(QUERY_PARAM_RE, "$1***")
    .replace(TEXT_PARAM_RE, "$1=***")
    .replace(/(\bAuthorization:\s*(?:Bearer|Basic)\s+)(\S+)/gi, "$1***");
}
