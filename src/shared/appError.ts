import type { AppErrorDto } from "./result";

/**
 * Typed error для тех мест, где вызывающий код предпочитает `throw`, а не `Result`.
 *
 * Важно: `message` в AppErrorDto можно показывать пользователю.
 */
export class AppError extends Error {
  readonly dto: AppErrorDto;

  constructor(dto: AppErrorDto) {
    super(dto.message);
    this.name = "AppError";
    this.dto = dto;
  }
}

export function isAppError(e: unknown): e is AppError {
  if (e instanceof AppError) return true;
  // Другой realm / дубль пакета в node_modules: `instanceof` не сработает, проверяем структурно.
  if (typeof e !== "object" || e === null) return false;
  if (!("name" in e) || e.name !== "AppError") return false;
  if (!("dto" in e) || typeof e.dto !== "object" || e.dto === null) return false;
  return "code" in e.dto && typeof e.dto.code === "string" && "message" in e.dto && typeof e.dto.message === "string";
}
