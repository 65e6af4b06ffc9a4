export type Result<T> = { ok: true; value: T } | { ok: false; error: AppErrorDto };

export type ErrorCode = "E_BLANK_INPUT" | "E_GRAMMAR_MISMATCH" | "E_PORT_RANGE" | "E_VALIDATION" | "E_SETTINGS" | "E_INTERNAL";

/**
 * Унифицированная ошибка уровня библиотеки.
 *
 * - `message`: можно отдавать вызывающему (например, как текст ошибки валидации)
 * - `cause`: безопасно логировать
 * - `details`: сырой контекст (идентификатор и т.п.), перед логированием проходит redact
 */
export type AppErrorDto = {
  code: ErrorCode;
  message: string;
  cause?: string;
  details?: Record<string, unknown>;
};

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: AppErrorDto): Result<T> {
  return { ok: false, error };
}

export function isOk<T>(r: Result<T>): r is { ok: true; value: T } {
  return r.ok;
}

export function isErr<T>(r: Result<T>): r is { ok: false; error: AppErrorDto } {
  return !r.ok;
}
