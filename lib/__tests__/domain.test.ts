import { describe, expect, it } from "vitest";
import { resolveAllowedUrl } from "../catalog/domain";

const DOMAIN = "cervezafortuna.com";

describe("resolveAllowedUrl", () => {
  it("resolves absolute paths against the domain root", () => {
    expect(resolveAllowedUrl("/inicio/cervezas/", DOMAIN)).toEqual({
      ok: true,
      url: "https://cervezafortuna.com/inicio/cervezas/",
    });
  });

  it("resolves bare relative paths against the domain root too", () => {
    expect(resolveAllowedUrl("inicio/cervezas/", DOMAIN)).toEqual({
      ok: true,
      url: "https://cervezafortuna.com/inicio/cervezas/",
    });
  });

  it("accepts full URLs on the domain", () => {
    expect(resolveAllowedUrl(" http://cervezafortuna.com/contacto/ ", DOMAIN)).toEqual({
      ok: true,
      url: "http://cervezafortuna.com/contacto/",
    });
  });

  it("rejects other domains", () => {
    expect(resolveAllowedUrl("https://example.com/beer", DOMAIN)).toEqual({
      ok: false,
      message: "Domain 'example.com' is not allowed. Only 'cervezafortuna.com' is permitted.",
    });
  });

  it("requires an exact host match", () => {
    expect(resolveAllowedUrl("https://shop.cervezafortuna.com/", DOMAIN).ok).toBe(false);
    expect(resolveAllowedUrl("https://cervezafortuna.com.example.net/", DOMAIN).ok).toBe(false);
  });

  it("rejects non-http protocols", () => {
    expect(resolveAllowedUrl("ftp://cervezafortuna.com/file", DOMAIN)).toEqual({
      ok: false,
      message: "Protocol 'ftp:' is not allowed.",
    });
  });
});
