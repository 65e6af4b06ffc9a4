/**
 * Единый набор кодов ошибок (AppErrorDto.code).
 *
 * Коды стабильные: на них опираются тесты и вызывающий код
 * (например, web-слой превращает E_BLANK_INPUT / E_GRAMMAR_MISMATCH в ошибку валидации формы).
 */
export const APP_ERROR = {
  BLANK_INPUT: "E_BLANK_INPUT",
  GRAMMAR_MISMATCH: "E_GRAMMAR_MISMATCH",
  PORT_RANGE: "E_PORT_RANGE",

  VALIDATION: "E_VALIDATION",
  SETTINGS: "E_SETTINGS",
  INTERNAL: "E_INTERNAL",
} as const;

export type AppErrorCode = (typeof APP_ERROR)[keyof typeof APP_ERROR];
