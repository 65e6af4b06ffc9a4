import { z } from "zod";

/**
 * Runtime-валидация “сырых” настроек (JSON-конфиг, env, объект от хоста).
 *
 * Важно:
 * - схема описывает именно RAW формат, где числа могут прийти строками
 * - defaults и границы применяются дальше, в `normalizeSettings()`
 */

const zNumOrStr = z.union([z.number(), z.string()]);

export const RawNormalizerSettingsSchema = z
  .object({
    debug: z
      .object({
        enabled: z.boolean().optional(),
      })
      .optional(),

    log: z
      .object({
        maxEntries: zNumOrStr.optional(),
      })
      .optional(),

    webfinger: z
      .object({
        rel: z.string().optional(),
      })
      .optional(),
  })
  .strict();

export type RawNormalizerSettings = z.infer<typeof RawNormalizerSettingsSchema>;
