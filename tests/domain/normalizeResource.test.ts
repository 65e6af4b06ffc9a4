import { describe, expect, it } from "vitest";
import { normalizeResource } from "../../src/domain/policies/normalizeResource";
import { serializeUri } from "../../src/domain/policies/serializeUri";
import type { NormalizedResource } from "../../src/domain/identity/structuredUri";

function normalized(identifier: string): NormalizedResource {
  const r = normalizeResource(identifier);
  if (!r.ok) throw new Error(`expected ok for ${identifier}: ${r.error.code}`);
  return r.value;
}

describe("domain/policies/normalizeResource", () => {
  it.each([null, undefined, "", " ", "\t\n  "])("пустой ввод %j → E_BLANK_INPUT", (v) => {
    const r = normalizeResource(v);
    expect(r.ok).toBe(false);
    if (r.ok) throw new Error("expected err");
    expect(r.error.code).toBe("E_BLANK_INPUT");
  });

  it("user@host без схемы → acct", () => {
    expect(normalized("bob@example.com")).toEqual({ scheme: "acct", userInfo: "bob", host: "example.com" });
  });

  it("host + path без схемы → https", () => {
    expect(normalized("example.com/bob")).toEqual({ scheme: "https", host: "example.com", path: "/bob" });
  });

  it("голый хост → https", () => {
    expect(normalized("example.com")).toEqual({ scheme: "https", host: "example.com" });
  });

  it("явная схема acct: вывод схемы не применяется", () => {
    expect(normalized("acct:bob@example.com")).toEqual({ scheme: "acct", userInfo: "bob", host: "example.com" });
  });

  it("fragment всегда отбрасывается", () => {
    const v = normalized("https://example.com/bob#frag");
    expect(v).toEqual({ scheme: "https", host: "example.com", path: "/bob" });
    expect("fragment" in v).toBe(false);
  });

  it("раскладывает все компоненты", () => {
    expect(normalized("https://alice@example.com:8080/x/y?a=1&b=2#top")).toEqual({
      scheme: "https",
      userInfo: "alice",
      host: "example.com",
      port: 8080,
      path: "/x/y",
      query: "a=1&b=2",
    });
  });

  it("user@host с портом, path или query → https, а не acct", () => {
    expect(normalized("joe@example.com:8080").scheme).toBe("https");
    expect(normalized("joe@example.com/about").scheme).toBe("https");
    expect(normalized("joe@example.com?x=1").scheme).toBe("https");
  });

  it("`:` без цифр: порт не задан", () => {
    expect(normalized("example.com:")).toEqual({ scheme: "https", host: "example.com" });
    expect(normalized("bob@example.com:")).toEqual({ scheme: "acct", userInfo: "bob", host: "example.com" });
  });

  it("всё после цифр порта уходит в path", () => {
    expect(normalized("example.com:80x")).toEqual({ scheme: "https", host: "example.com", port: 80, path: "x" });
  });

  it("порт 0 отличается от “не задан”", () => {
    expect(normalized("example.com:0").port).toBe(0);
  });

  it("tel / mailto / device без `//`", () => {
    expect(normalized("tel:+15551234")).toEqual({ scheme: "tel", host: "+15551234" });
    expect(normalized("mailto:joe@example.com")).toEqual({ scheme: "mailto", userInfo: "joe", host: "example.com" });
    expect(normalized("device:p1.example.com")).toEqual({ scheme: "device", host: "p1.example.com" });
  });

  it("схемы чувствительны к регистру: HTTPS:// не распознаётся как схема", () => {
    // Без схемы хостом становится `HTTPS`, пустой порт, дальше path `//example.com`.
    expect(normalized("HTTPS://example.com")).toEqual({ scheme: "https", host: "HTTPS", path: "//example.com" });
  });

  it.each(["/path", "?q=1", "#frag", ":8080"])("не подходит под грамматику: %j → E_GRAMMAR_MISMATCH", (v) => {
    const r = normalizeResource(v);
    if (r.ok) throw new Error("expected err");
    expect(r.error.code).toBe("E_GRAMMAR_MISMATCH");
    expect(r.error.details).toEqual({ identifier: v });
  });

  it("порт больше 65535 → E_PORT_RANGE", () => {
    const r = normalizeResource("example.com:65536");
    if (r.ok) throw new Error("expected err");
    expect(r.error.code).toBe("E_PORT_RANGE");
    expect(r.error.details).toEqual({ identifier: "example.com:65536", port: "65536" });

    const huge = normalizeResource(`example.com:${"9".repeat(40)}`);
    expect(huge.ok).toBe(false);
    expect(normalized("example.com:65535").port).toBe(65535);
  });

  it("результат заморожен", () => {
    expect(Object.isFrozen(normalized("bob@example.com"))).toBe(true);
  });

  it("сериализация + повторная нормализация http(s) даёт тот же ресурс", () => {
    for (const input of ["https://example.com:8443/a/b?x=1#f", "example.com/bob", "http://joe@example.org/p?q"]) {
      const first = normalized(input);
      const again = normalized(serializeUri(first) ?? "");
      expect(again).toEqual(first);
    }
  });

  it("path без ведущего `/` после сериализации получает `/`: повторная нормализация отличается", () => {
    const first = normalized("example.com:80x");
    const text = serializeUri(first);
    expect(text).toBe("https://example.com:80/x");
    expect(normalized(text ?? "")).toEqual({ scheme: "https", host: "example.com", port: 80, path: "/x" });
  });
});
