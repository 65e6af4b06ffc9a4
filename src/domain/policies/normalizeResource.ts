import { createNormalizedResource, type NormalizedResource } from "../identity/structuredUri";
import { APP_ERROR } from "../../shared/appErrorCodes";
import { err, ok, type Result } from "../../shared/result";
import { isBlank } from "./hasText";
import { matchIdentifier } from "./identifierGrammar";
import { portFromCapture } from "./portPolicy";
import { inferScheme } from "./schemeInference";

/**
 * Policy: нормализовать resource-идентификатор по правилам OIDC Discovery / WebFinger.
 *
 * Не бросает исключений: кривой пользовательский ввод здесь штатная ситуация,
 * поэтому неудача возвращается как `err(...)` с кодом:
 * - `E_BLANK_INPUT`: null / пустая строка / только пробелы
 * - `E_GRAMMAR_MISMATCH`: строка целиком не подходит под грамматику
 * - `E_PORT_RANGE`: порт больше 65535
 *
 * В успешном результате схема есть всегда, fragment отброшен.
 */
export function normalizeResource(identifier: string | null | undefined): Result<NormalizedResource> {
  if (isBlank(identifier)) {
    return err({
      code: APP_ERROR.BLANK_INPUT,
      message: "Пустой идентификатор нельзя нормализовать",
      details: { identifier: identifier ?? null },
    });
  }
  const raw = identifier ?? "";

  const m = matchIdentifier(raw);
  if (!m) {
    return err({
      code: APP_ERROR.GRAMMAR_MISMATCH,
      message: "Идентификатор не распознан",
      details: { identifier: raw },
    });
  }

  const port = portFromCapture(m.port);
  if (port.kind === "out_of_range") {
    return err({
      code: APP_ERROR.PORT_RANGE,
      message: "Порт вне допустимого диапазона",
      details: { identifier: raw, port: port.raw },
    });
  }

  const parts = {
    userInfo: m.userInfo,
    host: m.host,
    port: port.kind === "port" ? port.port : undefined,
    path: m.path,
    query: m.query,
  };

  // m.fragment в результат не попадает.
  return ok(createNormalizedResource({ ...parts, scheme: m.scheme ?? inferScheme(parts) }));
}
