import type { NormalizerSettings } from "./types";
import { OIDC_ISSUER_REL } from "./domain/policies/webfingerTarget";
import { RawNormalizerSettingsSchema, type RawNormalizerSettings } from "./shared/validation/normalizerSettingsSchema";

/** Настройки по умолчанию. */
export const DEFAULT_SETTINGS: NormalizerSettings = {
  debug: {
    enabled: false,
  },
  log: {
    maxEntries: 1000,
  },
  webfinger: {
    rel: OIDC_ISSUER_REL,
  },
};

/**
 * Нормализовать сырые настройки.
 *
 * Битый вход (лишние ключи, неверные типы) целиком заменяется defaults: частично
 * испорченный конфиг не должен давать “полунастроенный” нормализатор.
 */
export function normalizeSettings(raw: unknown): NormalizerSettings {
  const parsed = RawNormalizerSettingsSchema.safeParse(raw ?? {});
  const obj: RawNormalizerSettings = parsed.success ? parsed.data : {};

  return {
    debug: {
      enabled: obj.debug?.enabled ?? DEFAULT_SETTINGS.debug.enabled,
    },
    log: {
      maxEntries: normalizeNumber(obj.log?.maxEntries, { defaultValue: DEFAULT_SETTINGS.log.maxEntries, min: 10, max: 100_000 }),
    },
    webfinger: {
      rel: (obj.webfinger?.rel ?? DEFAULT_SETTINGS.webfinger.rel).trim(),
    },
  };
}

function normalizeNumber(v: unknown, params: { defaultValue: number; min?: number; max?: number }): number {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() ? Number(v) : NaN;
  if (!Number.isFinite(n)) return params.defaultValue;
  const min = typeof params.min === "number" ? params.min : -Infinity;
  const max = typeof params.max === "number" ? params.max : Infinity;
  return Math.min(max, Math.max(min, Math.floor(n)));
}
