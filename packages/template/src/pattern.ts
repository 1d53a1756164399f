/* packages/template/src/pattern.ts */

import { PatternCompileError } from "./errors.js";

export type GroupValues = (string | undefined)[];

/** 31-based 32-bit string hash */
export function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * A regular expression generated from a template, plus the placeholder each
 * capturing group binds. Structural groups (written inside an explicit
 * constraint) map to `undefined`.
 *
 * The expression is compiled without the `g` and `y` flags, so `exec` keeps
 * no cursor between calls and one instance can be shared by any number of
 * concurrent matches.
 */
export class CompiledPattern {
  static readonly EMPTY = new CompiledPattern("", []);

  readonly source: string;
  readonly groupNames: readonly (string | undefined)[];
  private readonly regex: RegExp;

  constructor(source: string, groupNames: readonly (string | undefined)[]) {
    this.source = source;
    this.groupNames = Object.freeze([...groupNames]);
    try {
      this.regex = new RegExp(`^(?:${source})$`);
    } catch (err) {
      throw new PatternCompileError(
        source,
        `Pattern "${source}" does not compile: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
  }

  /**
   * Match the whole candidate. Both output forms clear the container first.
   *
   * With a `Map`, each named group's value is stored under its placeholder
   * name. When a name binds several groups (a repeated placeholder) the last
   * group wins; the groups are not checked for agreement.
   *
   * With an array, every capturing group's value (or `undefined` for a group
   * that did not participate) is appended in group-index order.
   */
  match(candidate: string, bindings: Map<string, string>): boolean;
  match(candidate: string, groupValues: GroupValues): boolean;
  match(candidate: string, out: Map<string, string> | GroupValues): boolean {
    if (Array.isArray(out)) {
      out.length = 0;
    } else {
      out.clear();
    }

    const result = this.regex.exec(candidate);
    if (!result) return false;

    for (let group = 1; group < result.length; group++) {
      const value = result[group];
      if (Array.isArray(out)) {
        out.push(value);
        continue;
      }
      const name = this.groupNames[group - 1];
      if (name !== undefined && value !== undefined) {
        out.set(name, value);
      }
    }
    return true;
  }

  equals(other: unknown): boolean {
    return other instanceof CompiledPattern && other.source === this.source;
  }

  hashCode(): number {
    return hashString(this.source);
  }

  toString(): string {
    return this.source;
  }
}
