/** Policy: строка есть и не пустая. */
export function hasLength(v: string | null | undefined): v is string {
  return typeof v === "string" && v.length > 0;
}

/** Policy: строка есть и содержит хотя бы один не-whitespace символ. */
export function hasText(v: string | null | undefined): v is string {
  return typeof v === "string" && v.trim().length > 0;
}

/** Policy: null / undefined / "" / только пробелы считаются одинаково “пустыми”. */
export function isBlank(v: string | null | undefined): boolean {
  return !hasText(v);
}
