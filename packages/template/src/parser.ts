/* packages/template/src/parser.ts */

import { ArgumentError, PatternCompileError } from "./errors.js";

/** Matches one unconstrained path segment */
export const DEFAULT_CONSTRAINT = "[^/]+";

const NAME_PATTERN = /^\w[\w.-]*$/;
const REGEX_SPECIALS = /[\\^$.*+?()[\]{}|]/g;

export interface ParsedTemplate {
  template: string;
  /** Template with explicit constraints stripped, `{name}` kept */
  normalized: string;
  /** Regular expression source, unanchored */
  source: string;
  /** Placeholder bound by each capturing group, in group-index order */
  groupNames: (string | undefined)[];
  /** Unique placeholder names in order of first occurrence */
  names: string[];
  explicitConstraints: number;
  literalCharacters: number;
}

interface Placeholder {
  name: string;
  constraint: string | null;
  end: number;
}

export const EMPTY_PARSE: Readonly<ParsedTemplate> = Object.freeze({
  template: "",
  normalized: "",
  source: "",
  groupNames: [],
  names: [],
  explicitConstraints: 0,
  literalCharacters: 0,
});

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function escapeLiteral(text: string): string {
  return text.replace(REGEX_SPECIALS, "\\$&");
}

/** Scan from just after `{` up to the brace that closes the placeholder */
function readPlaceholder(template: string, start: number): Placeholder {
  let depth = 1;
  let pos = start;
  while (pos < template.length) {
    const ch = template[pos];
    if (ch === "\\") {
      pos += 2;
      continue;
    }
    if (ch === "{") depth++;
    else if (ch === "}" && --depth === 0) break;
    pos++;
  }
  if (depth !== 0) {
    throw new ArgumentError(`Unclosed placeholder at index ${start - 1} in "${template}"`);
  }

  const body = template.slice(start, pos);
  const colon = body.indexOf(":");
  const name = (colon === -1 ? body : body.slice(0, colon)).trim();
  if (!NAME_PATTERN.test(name)) {
    throw new ArgumentError(`Invalid placeholder name "${name}" in "${template}"`);
  }
  const constraint = colon === -1 ? "" : body.slice(colon + 1).trim();
  return { name, constraint: constraint.length > 0 ? constraint : null, end: pos + 1 };
}

/** A `)` that closes a group opened before the constraint would leak out of its capturing group */
function checkContained(template: string, name: string, constraint: string): void {
  let depth = 0;
  let inClass = false;
  for (let i = 0; i < constraint.length; i++) {
    const ch = constraint[i];
    if (ch === "\\") {
      i++;
    } else if (inClass) {
      if (ch === "]") inClass = false;
    } else if (ch === "[") {
      inClass = true;
    } else if (ch === "(") {
      depth++;
    } else if (ch === ")" && --depth < 0) {
      throw new PatternCompileError(
        template,
        `Constraint for placeholder "${name}" in "${template}" closes a group it did not open`,
      );
    }
  }
}

/** Number of capturing groups a constraint introduces, or a compile error */
function countGroups(template: string, name: string, constraint: string): number {
  try {
    // The empty alternative always matches, so exec never returns null here
    const probe = new RegExp(`(?:${constraint})|`).exec("");
    return probe ? probe.length - 1 : 0;
  } catch (err) {
    throw new PatternCompileError(
      template,
      `Invalid constraint for placeholder "${name}" in "${template}": ${errorMessage(err)}`,
      err,
    );
  }
}

export function parseTemplate(template: string): ParsedTemplate {
  if (typeof template !== "string" || template.length === 0) {
    throw new ArgumentError("Template must be a non-empty string");
  }

  let normalized = "";
  let source = "";
  const groupNames: (string | undefined)[] = [];
  const names: string[] = [];
  let explicitConstraints = 0;
  let literalCharacters = 0;

  let pos = 0;
  while (pos < template.length) {
    const open = template.indexOf("{", pos);
    const literal = open === -1 ? template.slice(pos) : template.slice(pos, open);
    if (literal.length > 0) {
      normalized += literal;
      source += escapeLiteral(literal);
      literalCharacters += literal.length;
    }
    if (open === -1) break;

    const placeholder = readPlaceholder(template, open + 1);
    const { name, constraint } = placeholder;
    normalized += `{${name}}`;
    if (!names.includes(name)) names.push(name);

    groupNames.push(name);
    if (constraint === null) {
      source += `(${DEFAULT_CONSTRAINT})`;
    } else {
      explicitConstraints++;
      checkContained(template, name, constraint);
      source += `(${constraint})`;
      for (let i = countGroups(template, name, constraint); i > 0; i--) {
        groupNames.push(undefined);
      }
    }
    pos = placeholder.end;
  }

  try {
    new RegExp(source);
  } catch (err) {
    throw new PatternCompileError(
      template,
      `Template "${template}" does not compile: ${errorMessage(err)}`,
      err,
    );
  }

  return {
    template,
    normalized,
    source,
    groupNames,
    names,
    explicitConstraints,
    literalCharacters,
  };
}

/**
 * Replace every `{name}` of a normalized template with what `resolve` returns,
 * visiting placeholders left to right.
 */
export function substitute(normalized: string, resolve: (name: string) => string): string {
  return normalized.replace(/\{(\w[\w.-]*)\}/g, (_, name: string) => resolve(name));
}
