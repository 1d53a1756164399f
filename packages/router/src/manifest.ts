/* packages/router/src/manifest.ts */

import { readFileSync } from "node:fs";
import { validate } from "jtd";
import type { Schema } from "jtd";
import { RouteManifestError } from "./errors.js";
import { RouteTableBuilder } from "./route-table.js";
import type { RouteTable, RouteTableOptions } from "./route-table.js";

export const MANIFEST_VERSION = 1;

export interface RouteDescriptor {
  handler: string;
  name?: string;
}

interface RouteManifestFile {
  version: number;
  routes: ({ template: string } & RouteDescriptor)[];
}

const MANIFEST_SCHEMA: Schema = {
  properties: {
    version: { type: "uint8" },
    routes: {
      elements: {
        properties: {
          template: { type: "string" },
          handler: { type: "string" },
        },
        optionalProperties: {
          name: { type: "string" },
        },
      },
    },
  },
};

function describeErrors(errors: { instancePath: string[]; schemaPath: string[] }[]): string {
  return errors
    .map((e) => {
      const path = e.instancePath.length > 0 ? e.instancePath.join("/") : "(root)";
      return `${path} (schema: ${e.schemaPath.join("/")})`;
    })
    .join("; ");
}

function assertManifest(data: unknown): asserts data is RouteManifestFile {
  const errors = validate(MANIFEST_SCHEMA, data, { maxDepth: 32, maxErrors: 10 });
  if (errors.length > 0) {
    throw new RouteManifestError(`Invalid route manifest: ${describeErrors(errors)}`, errors);
  }
}

/** Build a route table from an already-parsed manifest document */
export function parseRouteManifest(
  data: unknown,
  options?: RouteTableOptions,
): RouteTable<RouteDescriptor> {
  assertManifest(data);
  if (data.version !== MANIFEST_VERSION) {
    throw new RouteManifestError(
      `Unsupported route manifest version ${data.version} (expected ${MANIFEST_VERSION})`,
    );
  }

  const builder = new RouteTableBuilder<RouteDescriptor>(options);
  for (const { template, handler, name } of data.routes) {
    builder.add(template, name === undefined ? { handler } : { handler, name });
  }
  return builder.build();
}

export function loadRouteManifest(
  filePath: string,
  options?: RouteTableOptions,
): RouteTable<RouteDescriptor> {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RouteManifestError(`Cannot read route manifest ${filePath}: ${reason}`);
  }
  return parseRouteManifest(data, options);
}
