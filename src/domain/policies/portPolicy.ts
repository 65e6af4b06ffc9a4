export const MAX_PORT = 65535;

export type PortDecision = { kind: "absent" } | { kind: "port"; port: number } | { kind: "out_of_range"; raw: string };

/**
 * Policy: порт из capture-группы грамматики (там только цифры).
 *
 * - нет группы или `:` без цифр → порт не задан
 * - больше 65535 (включая строки, которые не влезают в число) → out_of_range, без обрезки и насыщения
 */
export function portFromCapture(raw: string | undefined): PortDecision {
  if (raw === undefined || raw.length === 0) return { kind: "absent" };
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n > MAX_PORT) return { kind: "out_of_range", raw };
  return { kind: "port", port: n };
}
