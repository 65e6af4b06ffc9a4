import { isNonHttpScheme } from "../identity/discoveryScheme";
import type { StructuredUri } from "../identity/structuredUri";
import { hasLength, hasText } from "./hasText";

/**
 * Policy: собрать строку из StructuredUri.
 *
 * - `acct` / `mailto` / `tel` / `device`: `scheme:userinfo@host:port/path?query#fragment`, без `//`
 * - `http` / `https` / любая другая или пустая схема: обычная иерархическая форма `scheme://…`
 *
 * `null`/`undefined` на входе: штатный случай (“нечего сериализовать”), результат `undefined`.
 */
export function serializeUri(uri: StructuredUri | null | undefined): string | undefined {
  if (!uri) return undefined;
  if (hasText(uri.scheme) && isNonHttpScheme(uri.scheme)) return serializeOpaque(uri.scheme, uri);
  return serializeHierarchical(uri);
}

function serializeOpaque(scheme: string, uri: StructuredUri): string {
  let out = `${scheme}:`;
  if (hasText(uri.userInfo)) out += `${uri.userInfo}@`;
  if (hasText(uri.host)) out += uri.host;
  if (uri.port !== undefined && uri.port >= 0) out += `:${uri.port}`;
  // Префикс `scheme:` уже непустой, поэтому `/` перед path без ведущего слеша нужен всегда.
  if (hasText(uri.path)) out += uri.path.startsWith("/") ? uri.path : `/${uri.path}`;
  if (hasText(uri.query)) out += `?${uri.query}`;
  if (hasText(uri.fragment)) out += `#${uri.fragment}`;
  return out;
}

/** Иерархическая сериализация: authority всегда предваряется `//`. */
export function serializeHierarchical(uri: StructuredUri): string {
  let out = "";
  if (hasText(uri.scheme)) out += `${uri.scheme}:`;
  if (hasLength(uri.userInfo) || hasLength(uri.host)) {
    out += "//";
    if (hasLength(uri.userInfo)) out += `${uri.userInfo}@`;
    if (hasLength(uri.host)) out += uri.host;
    if (uri.port !== undefined && uri.port >= 0) out += `:${uri.port}`;
  }
  if (hasLength(uri.path)) {
    if (out.length > 0 && !uri.path.startsWith("/")) out += "/";
    out += uri.path;
  }
  if (hasLength(uri.query)) out += `?${uri.query}`;
  if (hasLength(uri.fragment)) out += `#${uri.fragment}`;
  return out;
}
