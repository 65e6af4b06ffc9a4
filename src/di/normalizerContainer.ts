import "reflect-metadata";
import { container, type DependencyContainer } from "tsyringe";
import { ResourceNormalizer } from "../application/normalizer/resourceNormalizer";
import { LogService, type LogEntry } from "../log/logService";
import { normalizeSettings } from "../settingsStore";
import type { NormalizerSettings } from "../types";

export const TOKENS = {
  settings: "normalizer.settings",
  logService: "normalizer.logService",
} as const;

/**
 * Tsyringe child container на один экземпляр нормализатора.
 *
 * DI без декораторов/emitDecoratorMetadata: зависимости регистрируются явно через фабрики.
 */
export function createNormalizerContainer(params: { settings?: unknown; onLogEntry?: (entry: LogEntry) => void } = {}): DependencyContainer {
  const c = container.createChildContainer();

  c.register<NormalizerSettings>(TOKENS.settings, { useValue: normalizeSettings(params.settings) });

  const log = new LogService(c.resolve<NormalizerSettings>(TOKENS.settings).log.maxEntries, params.onLogEntry);
  c.register<LogService>(TOKENS.logService, { useValue: log });

  c.register(ResourceNormalizer, {
    useFactory: (cc) =>
      new ResourceNormalizer({
        log: cc.resolve<LogService>(TOKENS.logService).scoped("Нормализация"),
        settings: cc.resolve<NormalizerSettings>(TOKENS.settings),
      }),
  });

  return c;
}
