/* packages/router/__tests__/manifest.test.ts */

import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { ArgumentError } from "@urimatch/template";
import { loadRouteManifest, parseRouteManifest } from "../src/manifest.js";
import { RouteManifestError } from "../src/errors.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

function manifestError(fn: () => unknown): RouteManifestError | null {
  try {
    fn();
  } catch (err) {
    if (err instanceof RouteManifestError) return err;
    throw err;
  }
  return null;
}

describe("parseRouteManifest", () => {
  it("builds a route table from route descriptors", () => {
    const table = parseRouteManifest({
      version: 1,
      routes: [
        { template: "/users/{id}", handler: "users.show", name: "user" },
        { template: "/users/me", handler: "users.me" },
      ],
    });

    expect(table.match("/users/me")?.value).toEqual({ handler: "users.me" });
    expect(table.match("/users/5")).toMatchObject({
      value: { handler: "users.show", name: "user" },
      params: { id: "5" },
    });
  });

  it("reports validation errors with their paths", () => {
    const err = manifestError(() =>
      parseRouteManifest({ version: 1, routes: [{ template: "/x" }] }),
    );

    expect(err).not.toBeNull();
    expect(err?.code).toBe("INVALID_MANIFEST");
    expect(err?.errors[0]?.instancePath).toEqual(["routes", "0"]);
    expect(err?.message).toContain("routes/0");
  });

  it("rejects documents that are not objects", () => {
    expect(() => parseRouteManifest("nope")).toThrow(RouteManifestError);
    expect(() => parseRouteManifest(null)).toThrow(RouteManifestError);
  });

  it("rejects unknown properties", () => {
    expect(() => parseRouteManifest({ version: 1, routes: [], extra: true })).toThrow(
      RouteManifestError,
    );
  });

  it("rejects an unsupported version", () => {
    expect(() => parseRouteManifest({ version: 2, routes: [] })).toThrow(
      "Unsupported route manifest version 2 (expected 1)",
    );
  });

  it("surfaces template errors unchanged", () => {
    expect(() =>
      parseRouteManifest({ version: 1, routes: [{ template: "/{", handler: "x" }] }),
    ).toThrow(ArgumentError);
  });
});

describe("loadRouteManifest", () => {
  it("reads a manifest file from disk", () => {
    const table = loadRouteManifest(fixture("routes.json"));

    expect(table.size).toBe(3);
    expect(table.match("/files/a/b.txt")).toMatchObject({
      value: { handler: "files.get" },
      params: { path: "a/b.txt" },
    });
    expect(table.match("/users/me")?.value.handler).toBe("users.me");
  });

  it("wraps unreadable files", () => {
    expect(() => loadRouteManifest(fixture("missing.json"))).toThrow(
      /^Cannot read route manifest /,
    );
  });
});
