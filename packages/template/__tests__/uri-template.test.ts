/* packages/template/__tests__/uri-template.test.ts */

import { describe, expect, it } from "vitest";
import { UriTemplate } from "../src/uri-template.js";
import { ArgumentError } from "../src/errors.js";
import type { GroupValues } from "../src/pattern.js";

describe("UriTemplate construction", () => {
  it("exposes template metadata", () => {
    const t = new UriTemplate("/users/{id}/posts/{post:\\d+}/");

    expect(t.template).toBe("/users/{id}/posts/{post:\\d+}/");
    expect(t.normalized).toBe("/users/{id}/posts/{post}/");
    expect(t.placeholders()).toEqual(["id", "post"]);
    expect(t.explicitConstraintCount()).toBe(1);
    expect(t.literalCharacterCount()).toBe(15);
    expect(t.endsWithSlash()).toBe(true);
    expect(t.isPlaceholderPresent("post")).toBe(true);
    expect(t.isPlaceholderPresent("x")).toBe(false);
    expect(t.toString()).toBe("/users/([^/]+)/posts/(\\d+)/");
  });

  it("rejects the empty string", () => {
    expect(() => new UriTemplate("")).toThrow(ArgumentError);
  });

  it("provides an empty sentinel", () => {
    const bindings = new Map<string, string>();

    expect(UriTemplate.EMPTY.template).toBe("");
    expect(UriTemplate.EMPTY.placeholders()).toEqual([]);
    expect(UriTemplate.EMPTY.endsWithSlash()).toBe(false);
    expect(UriTemplate.EMPTY.match("", bindings)).toBe(true);
    expect(UriTemplate.EMPTY.match("/", bindings)).toBe(false);
  });

  it("does not let the empty sentinel leak into public construction", () => {
    expect(UriTemplate.EMPTY.pattern.source).toBe("");
    expect(() => new UriTemplate("")).toThrow(ArgumentError);
    expect(new UriTemplate("/a").pattern.source).toBe("/a");
  });
});

describe("UriTemplate.match", () => {
  it("binds placeholder values", () => {
    const t = new UriTemplate("/users/{id}");
    const bindings = new Map<string, string>();

    expect(t.match("/users/42", bindings)).toBe(true);
    expect(Object.fromEntries(bindings)).toEqual({ id: "42" });
  });

  it("rejects over-length input", () => {
    const t = new UriTemplate("/users/{id}");
    expect(t.match("/users/42/extra", new Map<string, string>())).toBe(false);
  });

  it("lets an explicit constraint span separators", () => {
    const t = new UriTemplate("/files/{path:.+}");
    expect(t.matchParams("/files/a/b/c")).toEqual({ path: "a/b/c" });
  });

  it("honours explicit constraints", () => {
    const t = new UriTemplate("/users/{id:\\d+}");
    expect(t.matchParams("/users/42")).toEqual({ id: "42" });
    expect(t.matchParams("/users/me")).toBeNull();
  });

  it("returns raw group values positionally", () => {
    const t = new UriTemplate("/{v:(a|b)c}/{w}");
    const groups: GroupValues = [];

    expect(t.match("/bc/z", groups)).toBe(true);
    expect(groups).toEqual(["bc", "b", "z"]);
  });

  it("keeps the last value of an inconsistent repeated placeholder", () => {
    const t = new UriTemplate("/{x}/{x}");
    expect(t.matchParams("/p/q")).toEqual({ x: "q" });
  });

  it("throws when the output container is missing", () => {
    const t = new UriTemplate("/users/{id}");
    const missing = JSON.parse("null");
    expect(() => t.match("/users/1", missing)).toThrow(ArgumentError);
  });
});

describe("UriTemplate.generate", () => {
  it("substitutes bindings from a record or a map", () => {
    const t = new UriTemplate("/users/{id}");
    expect(t.generate({ id: "42" })).toBe("/users/42");
    expect(t.generate(new Map([["id", "7"]]))).toBe("/users/7");
  });

  it("substitutes the empty string for missing bindings", () => {
    expect(new UriTemplate("/users/{id}").generate({})).toBe("/users/");
  });

  it("ignores explicit constraints", () => {
    expect(new UriTemplate("/a/{x:\\d+}/b").generate({ x: "5" })).toBe("/a/5/b");
  });

  it("reuses the first value for a repeated placeholder", () => {
    expect(new UriTemplate("/{x}/{x}").generate(["p", "q"])).toBe("/p/p");
    expect(new UriTemplate("/{a}/{b}/{a}").generate(["1", "2"])).toBe("/1/2/1");
  });

  it("consumes a sub-range of the values", () => {
    const t = new UriTemplate("/{a}/{b}");
    expect(t.generate(["z", "1", "2"], 1)).toBe("/1/2");
    expect(t.generate(["z", "1", "2"], 1, 1)).toBe("/1/");
  });

  it("leaves placeholders empty once the values run out", () => {
    const t = new UriTemplate("/{a}/{b}");
    expect(t.generate(["1"])).toBe("/1/");
    expect(t.generate([null, "2"])).toBe("//2");
  });

  it("rejects a range outside the values", () => {
    const t = new UriTemplate("/{a}");
    expect(() => t.generate(["a"], 2)).toThrow(ArgumentError);
    expect(() => t.generate(["a"], 0, 2)).toThrow(ArgumentError);
  });

  it("round-trips through match", () => {
    const t = new UriTemplate("/orgs/{org}/repos/{repo}{ext:\\.\\w+}");
    const values = { org: "acme", repo: "tools", ext: ".json" };
    const uri = t.generate(values);

    expect(uri).toBe("/orgs/acme/repos/tools.json");
    expect(t.matchParams(uri)).toEqual(values);
  });
});

describe("UriTemplate identity", () => {
  it("is equal when the generated sources are equal", () => {
    const a = new UriTemplate("/a/{x}");
    const b = new UriTemplate("/a/{y}");
    const c = new UriTemplate("/a/{x:[^/]+}");

    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(true);
    expect(a.hashCode()).toBe(b.hashCode());
    expect(a.equals(new UriTemplate("/a/{x}/"))).toBe(false);
  });

  it("is not equal when constraints differ only in spelling", () => {
    const a = new UriTemplate("/a/{x:\\d}");
    const b = new UriTemplate("/a/{x:[0-9]}");
    expect(a.equals(b)).toBe(false);
  });
});
