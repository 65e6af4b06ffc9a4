import type { NormalizedResource, StructuredUri } from "../../domain/identity/structuredUri";
import { normalizeResource } from "../../domain/policies/normalizeResource";
import { serializeUri } from "../../domain/policies/serializeUri";
import { buildWebfingerRequestUrl } from "../../domain/policies/webfingerTarget";
import type { Logger } from "../../log/logService";
import { redactIdentifierForLog } from "../../log/redact";
import { AppError } from "../../shared/appError";
import { ok, type AppErrorDto, type Result } from "../../shared/result";
import type { NormalizerSettings } from "../../types";

export type ResourceNormalizerDeps = {
  log: Logger;
  settings: NormalizerSettings;
};

/**
 * Use-case: нормализация resource-идентификаторов для discovery-клиента.
 *
 * Доменные политики чистые и ничего не логируют; здесь к ним добавляется лог отказов
 * (warn) и, в debug-режиме, лог успешных нормализаций (info).
 */
export class ResourceNormalizer {
  constructor(private readonly deps: ResourceNormalizerDeps) {}

  normalize(identifier: string | null | undefined): Result<NormalizedResource> {
    const r = normalizeResource(identifier);
    if (!r.ok) {
      this.logRejected(r.error, identifier);
      return r;
    }
    if (this.deps.settings.debug.enabled) {
      this.deps.log.info("идентификатор нормализован", {
        identifier: redactIdentifierForLog(identifier ?? ""),
        scheme: r.value.scheme,
        host: r.value.host,
      });
    }
    return r;
  }

  serialize(uri: StructuredUri | null | undefined): string | undefined {
    return serializeUri(uri);
  }

  /** Каноническая строка идентификатора (ключ кэша / значение `resource`). */
  canonicalize(identifier: string | null | undefined): Result<string> {
    const r = this.normalize(identifier);
    if (!r.ok) return r;
    return ok(serializeUri(r.value) ?? "");
  }

  webfingerRequestUrl(identifier: string | null | undefined): Result<string> {
    const r = this.normalize(identifier);
    if (!r.ok) return r;
    const url = buildWebfingerRequestUrl(r.value, this.deps.settings.webfinger.rel);
    if (!url.ok) this.logRejected(url.error, identifier);
    return url;
  }

  /** Для вызывающего кода на исключениях: бросает `AppError` с тем же DTO, что и `normalize()`. */
  requireResource(identifier: string | null | undefined): NormalizedResource {
    const r = this.normalize(identifier);
    if (!r.ok) throw new AppError(r.error);
    return r.value;
  }

  private logRejected(error: AppErrorDto, identifier: string | null | undefined) {
    this.deps.log.warn(error.message, {
      errorCode: error.code,
      identifier: identifier == null ? null : redactIdentifierForLog(identifier),
    });
  }
}
