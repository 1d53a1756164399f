/* packages/template/src/uri-template.ts */

import { buildUri } from "./build-uri.js";
import { compareSpecificity } from "./comparator.js";
import { ArgumentError } from "./errors.js";
import { EMPTY_PARSE, parseTemplate, substitute } from "./parser.js";
import type { ParsedTemplate } from "./parser.js";
import { CompiledPattern } from "./pattern.js";
import type { GroupValues } from "./pattern.js";

export type TemplateBindings =
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string | undefined>>;

export type PositionalValues = readonly (string | null | undefined)[];

function isPositional(values: TemplateBindings | PositionalValues): values is PositionalValues {
  return Array.isArray(values);
}

function isMap(bindings: TemplateBindings): bindings is ReadonlyMap<string, string> {
  return bindings instanceof Map;
}

function lookup(bindings: TemplateBindings, name: string): string | undefined {
  if (isMap(bindings)) return bindings.get(name);
  return Object.prototype.hasOwnProperty.call(bindings, name) ? bindings[name] : undefined;
}

function checkRange(values: PositionalValues, offset: number, length: number): void {
  const valid =
    Number.isInteger(offset) &&
    Number.isInteger(length) &&
    offset >= 0 &&
    length >= 0 &&
    offset + length <= values.length;
  if (!valid) {
    throw new ArgumentError(
      `Range [${offset}, ${offset + length}) is outside a list of ${values.length} values`,
    );
  }
}

// Set only while UriTemplate.EMPTY is being built
let buildingEmpty = false;

/**
 * A parsed URI template: literal text with `{name}` or `{name:regex}`
 * placeholders. Instances are immutable; matching and generation keep no
 * state between calls.
 *
 * Two templates are equal when their generated pattern sources are equal.
 */
export class UriTemplate {
  /** Sentinel for "no template": empty pattern, no placeholders */
  static readonly EMPTY: UriTemplate = UriTemplate.createEmpty();

  static readonly compare = compareSpecificity;
  static readonly buildUri = buildUri;

  readonly template: string;
  readonly normalized: string;
  readonly pattern: CompiledPattern;
  private readonly variables: readonly string[];
  private readonly explicitConstraints: number;
  private readonly literalCharacters: number;
  private readonly trailingSlash: boolean;

  /**
   * @throws {ArgumentError} if the template is empty or a placeholder is malformed
   * @throws {PatternCompileError} if the generated pattern does not compile
   */
  constructor(template: string) {
    const parsed: ParsedTemplate = buildingEmpty ? EMPTY_PARSE : parseTemplate(template);
    this.template = parsed.template;
    this.normalized = parsed.normalized;
    this.pattern =
      parsed.source.length === 0
        ? CompiledPattern.EMPTY
        : new CompiledPattern(parsed.source, parsed.groupNames);
    this.variables = Object.freeze([...parsed.names]);
    this.explicitConstraints = parsed.explicitConstraints;
    this.literalCharacters = parsed.literalCharacters;
    this.trailingSlash = parsed.template.endsWith("/");
  }

  private static createEmpty(): UriTemplate {
    buildingEmpty = true;
    try {
      return new UriTemplate("");
    } finally {
      buildingEmpty = false;
    }
  }

  // -- Introspection --

  placeholders(): readonly string[] {
    return this.variables;
  }

  isPlaceholderPresent(name: string): boolean {
    return this.variables.includes(name);
  }

  explicitConstraintCount(): number {
    return this.explicitConstraints;
  }

  literalCharacterCount(): number {
    return this.literalCharacters;
  }

  endsWithSlash(): boolean {
    return this.trailingSlash;
  }

  // -- Matching --

  /**
   * Match a URI against the template, filling `bindings` with placeholder
   * values or `groupValues` with every capturing group's value.
   */
  match(uri: string, bindings: Map<string, string>): boolean;
  match(uri: string, groupValues: GroupValues): boolean;
  match(uri: string, out: Map<string, string> | GroupValues): boolean {
    if (out === null || out === undefined) {
      throw new ArgumentError("match() needs an output container");
    }
    if (Array.isArray(out)) return this.pattern.match(uri, out);
    return this.pattern.match(uri, out);
  }

  /** Placeholder bindings for a matching URI, or null */
  matchParams(uri: string): Record<string, string> | null {
    const bindings = new Map<string, string>();
    if (!this.pattern.match(uri, bindings)) return null;
    return Object.fromEntries(bindings);
  }

  // -- Generation --

  /**
   * Substitute placeholder values into the template.
   *
   * With bindings, a placeholder without a value becomes the empty string.
   *
   * With a list, values are taken in order of first occurrence of each
   * distinct name; a repeated name reuses its value, and placeholders left
   * once the list (or the `offset`/`length` range of it) runs out become the
   * empty string.
   */
  generate(bindings: TemplateBindings): string;
  generate(values: PositionalValues, offset?: number, length?: number): string;
  generate(values: TemplateBindings | PositionalValues, offset = 0, length?: number): string {
    if (!isPositional(values)) {
      const bindings = values;
      return substitute(this.normalized, (name) => lookup(bindings, name) ?? "");
    }

    const list = values;
    const count = length ?? list.length - offset;
    checkRange(list, offset, count);
    const end = offset + count;
    const assigned = new Map<string, string>();
    let cursor = offset;

    return substitute(this.normalized, (name) => {
      const prior = assigned.get(name);
      if (prior !== undefined) return prior;
      if (cursor < end) {
        const value = list[cursor++];
        if (value !== null && value !== undefined) {
          assigned.set(name, value);
          return value;
        }
      }
      return "";
    });
  }

  // -- Identity --

  equals(other: unknown): boolean {
    return other instanceof UriTemplate && this.pattern.equals(other.pattern);
  }

  hashCode(): number {
    return this.pattern.hashCode();
  }

  /** The generated pattern source */
  toString(): string {
    return this.pattern.toString();
  }
}
