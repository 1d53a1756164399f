/* packages/template/src/index.ts */

export { UriTemplate } from "./uri-template.js";
export { CompiledPattern } from "./pattern.js";
export { compareSpecificity } from "./comparator.js";
export { buildUri } from "./build-uri.js";
export { encode, contextualEncode, decode, isEncoded } from "./encoding.js";
export { parseTemplate, DEFAULT_CONSTRAINT } from "./parser.js";
export {
  UriTemplateError,
  ArgumentError,
  PatternCompileError,
  MissingValueError,
} from "./errors.js";

export type { TemplateBindings, PositionalValues } from "./uri-template.js";
export type { GroupValues } from "./pattern.js";
export type { UriComponents, UriValues, BuildUriOptions, EncodingMode } from "./build-uri.js";
export type { ComponentKind } from "./encoding.js";
export type { ParsedTemplate } from "./parser.js";
export type { ErrorCode } from "./errors.js";
