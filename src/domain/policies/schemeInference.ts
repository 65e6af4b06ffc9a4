import type { DiscoveryScheme } from "../identity/discoveryScheme";
import { hasText } from "./hasText";

export type SchemeInferenceInput = {
  userInfo?: string;
  path?: string;
  query?: string;
  port?: number;
};

/**
 * Policy: схема по умолчанию, если во входе её не было.
 *
 * Правила проверяются по порядку, первое сработавшее побеждает:
 * 1. `user@host` без path/query/port похож на аккаунт → `acct`
 * 2. всё остальное (голый хост, хост+path, …) считаем web-ресурсом → `https`
 */
export function inferScheme(parts: SchemeInferenceInput): DiscoveryScheme {
  if (hasText(parts.userInfo) && !hasText(parts.path) && !hasText(parts.query) && parts.port === undefined) {
    return "acct";
  }
  return "https";
}
