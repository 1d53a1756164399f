/* packages/template/src/build-uri.ts */

import { contextualEncode, encode } from "./encoding.js";
import type { ComponentKind } from "./encoding.js";
import { MissingValueError } from "./errors.js";
import { parseTemplate, substitute } from "./parser.js";

/** Component templates; each may contain `{name}` placeholders */
export interface UriComponents {
  scheme?: string | null;
  /** Used only when none of `userInfo`, `host` and `port` is given */
  authority?: string | null;
  userInfo?: string | null;
  host?: string | null;
  port?: string | null;
  path?: string | null;
  query?: string | null;
  fragment?: string | null;
}

export type UriValues =
  | ReadonlyMap<string, unknown>
  | Readonly<Record<string, unknown>>
  | readonly unknown[];

export type EncodingMode = "strict" | "contextual";

export interface BuildUriOptions {
  /**
   * "strict" percent-encodes every illegal character of a value; "contextual"
   * leaves existing `%XX` escapes alone. Defaults to "strict".
   */
  encoding?: EncodingMode;
}

type Encoder = (value: string) => string;

/** Resolves one placeholder to its (already encoded) text */
type ValueSource = (name: string, encodeValue: Encoder) => string;

const verbatim: Encoder = (value) => value;

function isList(values: UriValues): values is readonly unknown[] {
  return Array.isArray(values);
}

function isMap(values: UriValues): values is ReadonlyMap<string, unknown> {
  return values instanceof Map;
}

function present(value: unknown): value is NonNullable<unknown> {
  return value !== null && value !== undefined;
}

function namedSource(values: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>): ValueSource {
  let get: (name: string) => unknown;
  if (isMap(values)) {
    const map = values;
    get = (name) => map.get(name);
  } else {
    const record = values;
    get = (name) => (Object.prototype.hasOwnProperty.call(record, name) ? record[name] : undefined);
  }

  return (name, encodeValue) => {
    const value = get(name);
    if (!present(value)) throw new MissingValueError(name);
    return encodeValue(String(value));
  };
}

/**
 * One cursor and one name->value map shared by every component, so a name
 * used in two components takes one positional value.
 */
function positionalSource(values: readonly unknown[]): ValueSource {
  const assigned = new Map<string, string>();
  let cursor = 0;

  return (name, encodeValue) => {
    const prior = assigned.get(name);
    if (prior !== undefined) return prior;
    if (cursor < values.length) {
      const value = values[cursor++];
      if (present(value)) {
        const text = encodeValue(String(value));
        assigned.set(name, text);
        return text;
      }
    }
    throw new MissingValueError(name);
  };
}

function renderComponent(template: string, resolve: ValueSource, encodeValue: Encoder): string {
  if (!template.includes("{")) return template;
  const { normalized } = parseTemplate(template);
  return substitute(normalized, (name) => resolve(name, encodeValue));
}

function nonEmpty(value: string | null | undefined): value is string {
  return value !== null && value !== undefined && value.length > 0;
}

/**
 * Compose a URI from component templates, resolving every placeholder from
 * one shared value source. Unlike `UriTemplate.generate`, a placeholder with
 * no value throws.
 *
 * Scheme and port values are inserted as given; the other components are
 * encoded for their kind. Literal template text is never encoded.
 *
 * @throws {MissingValueError} naming the first placeholder without a value
 */
export function buildUri(
  components: UriComponents,
  values: UriValues,
  options: BuildUriOptions = {},
): string {
  const resolve = isList(values) ? positionalSource(values) : namedSource(values);
  const encodeFor = (kind: ComponentKind): Encoder =>
    options.encoding === "contextual"
      ? (value) => contextualEncode(value, kind)
      : (value) => encode(value, kind);

  const { scheme, authority, userInfo, host, port, path, query, fragment } = components;
  let uri = "";

  if (present(scheme)) {
    uri += renderComponent(scheme, resolve, verbatim) + ":";
  }

  if (present(userInfo) || present(host) || present(port)) {
    uri += "//";
    if (nonEmpty(userInfo)) {
      uri += renderComponent(userInfo, resolve, encodeFor("userInfo")) + "@";
    }
    if (present(host)) {
      uri += renderComponent(host, resolve, encodeFor("host"));
    }
    if (nonEmpty(port)) {
      uri += ":" + renderComponent(port, resolve, verbatim);
    }
  } else if (present(authority)) {
    uri += "//" + renderComponent(authority, resolve, encodeFor("authority"));
  }

  if (present(path)) {
    uri += renderComponent(path, resolve, encodeFor("path"));
  }
  if (nonEmpty(query)) {
    uri += "?" + renderComponent(query, resolve, encodeFor("queryParam"));
  }
  if (nonEmpty(fragment)) {
    uri += "#" + renderComponent(fragment, resolve, encodeFor("fragment"));
  }

  return uri;
}
