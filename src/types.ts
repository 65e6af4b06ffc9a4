/** Настройки нормализатора (после `normalizeSettings()`). */
export interface NormalizerSettings {
  debug: {
    /** Логировать успешные нормализации (info). По умолчанию пишем только отказы (warn). */
    enabled: boolean;
  };
  log: {
    /** Сколько записей держать в памяти `LogService`. */
    maxEntries: number;
  };
  webfinger: {
    /** Значение `rel` в WebFinger-запросе; пустая строка = без `rel`. */
    rel: string;
  };
}
