import { describe, expect, it } from "vitest";
import { buildWebfingerRequestUrl, OIDC_ISSUER_REL } from "../../src/domain/policies/webfingerTarget";
import { createNormalizedResource, type NormalizedResource } from "../../src/domain/identity/structuredUri";
import { normalizeResource } from "../../src/domain/policies/normalizeResource";

function normalized(identifier: string): NormalizedResource {
  const r = normalizeResource(identifier);
  if (!r.ok) throw new Error(`expected ok for ${identifier}: ${r.error.code}`);
  return r.value;
}

describe("domain/policies/webfingerTarget", () => {
  it("acct-ресурс: https на хост ресурса, rel издателя по умолчанию", () => {
    const r = buildWebfingerRequestUrl(createNormalizedResource({ scheme: "acct", userInfo: "bob", host: "example.com" }));
    expect(r).toEqual({
      ok: true,
      value:
        "https://example.com/.well-known/webfinger?resource=acct%3Abob%40example.com&rel=http%3A%2F%2Fopenid.net%2Fspecs%2Fconnect%2F1.0%2Fissuer",
    });
  });

  it("http-ресурс с портом: http и порт в authority, без rel", () => {
    const r = buildWebfingerRequestUrl(createNormalizedResource({ scheme: "http", host: "localhost", port: 8080, path: "/alice" }), "");
    expect(r).toEqual({
      ok: true,
      value: "http://localhost:8080/.well-known/webfinger?resource=http%3A%2F%2Flocalhost%3A8080%2Falice",
    });
  });

  it("без хоста → E_VALIDATION", () => {
    const r = buildWebfingerRequestUrl(createNormalizedResource({ scheme: "tel", path: "/123" }), OIDC_ISSUER_REL);
    if (r.ok) throw new Error("expected err");
    expect(r.error.code).toBe("E_VALIDATION");
  });

  it("хост приводится к нижнему регистру, resource остаётся как был", () => {
    expect(buildWebfingerRequestUrl(normalized("bob@Example.COM"), "self")).toEqual({
      ok: true,
      value: "https://example.com/.well-known/webfinger?resource=acct%3Abob%40Example.COM&rel=self",
    });
  });

  it("`@` внутри хоста не уводит запрос на другой хост", () => {
    const resource = normalized("a@victim.com@attacker.com");
    expect(resource.host).toBe("victim.com@attacker.com");

    const r = buildWebfingerRequestUrl(resource);
    if (r.ok) throw new Error(`expected err, got ${r.value}`);
    expect(r.error.code).toBe("E_VALIDATION");
    expect(r.error.details).toEqual({ scheme: "acct", host: "victim.com@attacker.com" });
  });

  it.each(["bob@ex ample.com", "ex\\ample.com/p"])("недопустимые символы в хосте: %j → E_VALIDATION", (identifier) => {
    const r = buildWebfingerRequestUrl(normalized(identifier));
    if (r.ok) throw new Error(`expected err, got ${r.value}`);
    expect(r.error.code).toBe("E_VALIDATION");
  });
});
