import { DISCOVERY_SCHEMES, type DiscoveryScheme } from "../identity/discoveryScheme";

/**
 * Грамматика пользовательского идентификатора для WebFinger / OIDC Discovery.
 *
 * Стандартный разбор URI (`new URL()`) здесь не подходит: он отвергает `bob@example.com`,
 * голый хост и т.п., а `acct:bob@example.com` раскладывает не на те компоненты.
 *
 * Шаблон якорный (матч всей строки), обычная backtracking-семантика:
 *   [scheme ":" ["//"]] [userinfo "@"] host [":" digits*] [path] ["?" query] ["#" fragment]
 */
const IDENTIFIER_PATTERN = new RegExp(
  "^" +
    `((${DISCOVERY_SCHEMES.join("|")}):(//)?)?` + // scheme
    "(" +
    "(([^@]+)@)?" + // userinfo
    "(([^?#:/]+)" + // host
    "(:(\\d*))?)" + // port
    ")" +
    "([^?#]+)?" + // path
    "(\\?([^#]+))?" + // query
    "(#(.*))?" + // fragment
    "$",
);

/** Сырые capture-группы. `undefined` = группа не участвовала в матче. */
export type IdentifierMatch = {
  scheme?: DiscoveryScheme;
  userInfo?: string;
  host?: string;
  /** Только цифры; пустая строка, если был `:` без цифр. */
  port?: string;
  path?: string;
  query?: string;
  fragment?: string;
};

export function matchIdentifier(identifier: string): IdentifierMatch | null {
  const m = IDENTIFIER_PATTERN.exec(identifier);
  if (!m) return null;
  return {
    scheme: toScheme(m[2]),
    userInfo: m[6],
    host: m[8],
    port: m[10],
    path: m[11],
    query: m[13],
    fragment: m[15],
  };
}

function toScheme(raw: string | undefined): DiscoveryScheme | undefined {
  if (raw === undefined) return undefined;
  return DISCOVERY_SCHEMES.find((s) => s === raw);
}
