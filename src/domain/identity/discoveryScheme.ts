/**
 * Схемы, которые распознаёт грамматика идентификатора.
 *
 * Порядок важен: он же порядок альтернатив в regex (`https` раньше `http`).
 */
export const DISCOVERY_SCHEMES = ["https", "http", "acct", "mailto", "tel", "device"] as const;

export type DiscoveryScheme = (typeof DISCOVERY_SCHEMES)[number];

/** Схемы, которые сериализуются без `//` после `scheme:`. */
export const NON_HTTP_SCHEMES: ReadonlySet<DiscoveryScheme> = new Set<DiscoveryScheme>(["device", "acct", "tel", "mailto"]);

export function isDiscoveryScheme(v: string): v is DiscoveryScheme {
  return DISCOVERY_SCHEMES.some((s) => s === v);
}

export function isNonHttpScheme(v: string): boolean {
  return isDiscoveryScheme(v) && NON_HTTP_SCHEMES.has(v);
}
