import { isSensitiveKey, redactSecretsInStringForLog } from "./redact";

/** Уровень записи лога. */
export type LogLevel = "info" | "warn" | "error";

/** Одна запись лога. */
export interface LogEntry {
  /** Unix time в мс. */
  ts: number;
  level: LogLevel;
  /** Сообщение (всегда на русском). */
  message: string;
  /** Доп. данные (для диагностики). */
  data?: Record<string, unknown>;
}

/** Минимальный контракт логгера, который принимают use-case. */
export type Logger = {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
};

type Listener = () => void;

const MIN_ENTRIES = 10;
const MAX_STRING_CHARS = 2000;
const MAX_ARRAY_ITEMS = 100;
const MAX_OBJECT_KEYS = 100;
const MAX_DEPTH = 6;

/**
 * In-memory лог с ограничением по числу записей.
 *
 * Наружу записи уходят через `onEntry` (например, в stderr или во внешний логгер хоста).
 * Всё, что попадает в запись, предварительно проходит redact.
 */
export class LogService implements Logger {
  private maxEntries: number;
  private entries: LogEntry[] = [];
  private listeners = new Set<Listener>();
  private readonly onEntry?: (entry: LogEntry) => void;

  /** @param onEntry Коллбек на каждую новую запись (уже redacted). */
  constructor(maxEntries: number, onEntry?: (entry: LogEntry) => void) {
    this.maxEntries = Math.max(MIN_ENTRIES, maxEntries);
    this.onEntry = onEntry;
  }

  /** Изменить лимит записей (с обрезкой старых). */
  setMaxEntries(maxEntries: number) {
    this.maxEntries = Math.max(MIN_ENTRIES, maxEntries);
    this.trim();
    this.emit();
  }

  onChange(cb: Listener) {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  /** Копия текущих записей. */
  list(): LogEntry[] {
    return this.entries.slice();
  }

  /**
   * Логгер “в скоупе”: префикс сообщения + фиксированный контекст.
   *
   * Пример:
   *   const log = base.scoped("Нормализация", { requestId });
   *   log.warn("идентификатор не распознан", { identifier });
   */
  scoped(scope: string, fixed?: Record<string, unknown>): Logger {
    const prefix = String(scope ?? "").trim();
    const text = (message: string) => (prefix ? `${prefix}: ${message}` : message);
    const merge = (data?: Record<string, unknown>) => (fixed || data ? { ...fixed, ...data } : undefined);
    return {
      info: (message, data) => this.info(text(message), merge(data)),
      warn: (message, data) => this.warn(text(message), merge(data)),
      error: (message, data) => this.error(text(message), merge(data)),
    };
  }

  info(message: string, data?: Record<string, unknown>) {
    this.push({ ts: Date.now(), level: "info", message, data });
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.push({ ts: Date.now(), level: "warn", message, data });
  }

  error(message: string, data?: Record<string, unknown>) {
    this.push({ ts: Date.now(), level: "error", message, data });
  }

  clear() {
    this.entries = [];
    this.emit();
  }

  private push(e: LogEntry) {
    const safe = sanitizeLogEntry(e);
    this.entries.push(safe);
    this.trim();
    this.onEntry?.(safe);
    this.emit();
  }

  private trim() {
    const overflow = this.entries.length - this.maxEntries;
    if (overflow > 0) this.entries.splice(0, overflow);
  }

  private emit() {
    for (const cb of this.listeners) cb();
  }
}

function sanitizeLogEntry(e: LogEntry): LogEntry {
  const out: LogEntry = { ts: e.ts, level: e.level, message: sanitizeString(e.message) };
  if (e.data) out.data = sanitizeRecord(e.data, 0);
  return out;
}

function sanitizeString(s: string): string {
  const out = redactSecretsInStringForLog(s);
  if (out.length > MAX_STRING_CHARS) return out.slice(0, MAX_STRING_CHARS) + "...[truncated]";
  return out;
}

function sanitizeRecord(obj: Record<string, unknown>, depth: number): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const keys = Object.keys(obj);
  for (const k of keys.slice(0, MAX_OBJECT_KEYS)) {
    const val = obj[k];
    // Чувствительный ключ: значение в лог не пишем вообще.
    out[k] = typeof val === "string" && isSensitiveKey(k) ? "***" : sanitizeUnknown(val, depth + 1);
  }
  if (keys.length > MAX_OBJECT_KEYS) out["[truncated]"] = `${keys.length - MAX_OBJECT_KEYS} keys`;
  return out;
}

function sanitizeUnknown(v: unknown, depth: number): unknown {
  if (depth > MAX_DEPTH) return "[truncated]";
  if (v === null || v === undefined) return v;

  if (typeof v === "string") return sanitizeString(v);
  if (typeof v === "number" || typeof v === "boolean") return v;

  if (v instanceof Error) {
    return {
      name: sanitizeString(v.name),
      message: sanitizeString(v.message),
      stack: v.stack ? sanitizeString(v.stack) : undefined,
    };
  }

  if (Array.isArray(v)) {
    const out = v.slice(0, MAX_ARRAY_ITEMS).map((x: unknown) => sanitizeUnknown(x, depth + 1));
    if (v.length > MAX_ARRAY_ITEMS) out.push("[truncated]");
    return out;
  }

  if (typeof v === "object") return sanitizeRecord(Object.fromEntries(Object.entries(v)), depth);

  return sanitizeString(String(v));
}
