/* packages/router/src/index.ts */

export { RouteTable, RouteTableBuilder } from "./route-table.js";
export { parseRouteManifest, loadRouteManifest, MANIFEST_VERSION } from "./manifest.js";
export { RouteManifestError } from "./errors.js";

export type { RouteEntry, RouteMatch, RouteLogger, RouteTableOptions } from "./route-table.js";
export type { RouteDescriptor } from "./manifest.js";
