import type { DiscoveryScheme } from "./discoveryScheme";

/**
 * StructuredUri: URI, разложенный на компоненты (value object, immutable).
 *
 * Отсутствующий компонент не хранится вовсе (нет ключа), а не хранится как `undefined`.
 * `port` отсутствует = “не задан” (это не то же самое, что 0).
 */
export type StructuredUri = {
  readonly scheme?: string;
  readonly userInfo?: string;
  readonly host?: string;
  readonly port?: number;
  readonly path?: string;
  /** Сырой query без разбора на пары key=value. */
  readonly query?: string;
  readonly fragment?: string;
};

/** Результат нормализации: схема есть всегда, fragment не бывает никогда. */
export type NormalizedResource = Omit<StructuredUri, "scheme" | "fragment"> & {
  readonly scheme: DiscoveryScheme;
  readonly fragment?: never;
};

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export function createStructuredUri(parts: StructuredUri): StructuredUri {
  const out: Mutable<StructuredUri> = {};
  if (parts.scheme !== undefined) out.scheme = parts.scheme;
  if (parts.userInfo !== undefined) out.userInfo = parts.userInfo;
  if (parts.host !== undefined) out.host = parts.host;
  if (parts.port !== undefined) out.port = parts.port;
  if (parts.path !== undefined) out.path = parts.path;
  if (parts.query !== undefined) out.query = parts.query;
  if (parts.fragment !== undefined) out.fragment = parts.fragment;
  return Object.freeze(out);
}

/**
 * Собрать NormalizedResource. Поля `fragment` у входа нет по типу, поэтому он не может попасть в результат.
 */
export function createNormalizedResource(parts: Omit<NormalizedResource, "fragment">): NormalizedResource {
  const out: Mutable<NormalizedResource> = { scheme: parts.scheme };
  if (parts.userInfo !== undefined) out.userInfo = parts.userInfo;
  if (parts.host !== undefined) out.host = parts.host;
  if (parts.port !== undefined) out.port = parts.port;
  if (parts.path !== undefined) out.path = parts.path;
  if (parts.query !== undefined) out.query = parts.query;
  return Object.freeze(out);
}
