import { domainToASCII } from "node:url";
import type { NormalizedResource } from "../identity/structuredUri";
import { APP_ERROR } from "../../shared/appErrorCodes";
import { err, ok, type Result } from "../../shared/result";
import { hasText } from "./hasText";
import { serializeUri } from "./serializeUri";

/** Link relation издателя OpenID Connect (OIDC Discovery 1.0, §2). */
export const OIDC_ISSUER_REL = "http://openid.net/specs/connect/1.0/issuer";

/**
 * Policy: URL WebFinger-запроса для нормализованного ресурса.
 *
 * Пример: `acct:bob@example.com` →
 *   `https://example.com/.well-known/webfinger?resource=acct%3Abob%40example.com&rel=...`
 *
 * Только строит строку: сам запрос делает внешний HTTP-клиент.
 */
export function buildWebfingerRequestUrl(resource: NormalizedResource, rel: string = OIDC_ISSUER_REL): Result<string> {
  if (!hasText(resource.host)) {
    return err({
      code: APP_ERROR.VALIDATION,
      message: "У ресурса нет хоста: некуда отправлять WebFinger-запрос",
      details: { scheme: resource.scheme },
    });
  }

  // Хост из грамматики может содержать `@`, `\` и пробелы: такой хост либо не парсится,
  // либо уводит запрос на чужой хост. Сверяем с тем, что реально окажется в URL.
  const expectedHost = domainToASCII(resource.host);
  if (!expectedHost) return invalidHost(resource);

  // `http:` ресурс опрашиваем по http, все остальные по https.
  const transport = resource.scheme === "http" ? "http" : "https";
  const authority = resource.port !== undefined ? `${resource.host}:${resource.port}` : resource.host;

  let url: URL;
  try {
    url = new URL(`${transport}://${authority}/.well-known/webfinger`);
  } catch {
    return invalidHost(resource);
  }
  if (url.hostname !== expectedHost || url.username || url.password) return invalidHost(resource);

  const params = new URLSearchParams({ resource: serializeUri(resource) ?? "" });
  if (hasText(rel)) params.set("rel", rel);
  url.search = params.toString();

  return ok(url.toString());
}

function invalidHost(resource: NormalizedResource): Result<string> {
  return err({
    code: APP_ERROR.VALIDATION,
    message: "Хост ресурса не годится для WebFinger-запроса",
    details: { scheme: resource.scheme, host: resource.host },
  });
}
