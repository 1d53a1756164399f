/* packages/template/src/comparator.ts */

import type { UriTemplate } from "./uri-template.js";

/**
 * Order templates most specific first: more explicit constraints, then more
 * literal characters, then fewer placeholders, then pattern source. Templates
 * with identical pattern sources compare 0 before any count is looked at, so
 * the order agrees with `UriTemplate.equals`.
 */
export function compareSpecificity(a: UriTemplate, b: UriTemplate): number {
  const left = a.pattern.source;
  const right = b.pattern.source;
  if (left === right) return 0;

  const byConstraints = b.explicitConstraintCount() - a.explicitConstraintCount();
  if (byConstraints !== 0) return byConstraints;

  const byLiterals = b.literalCharacterCount() - a.literalCharacterCount();
  if (byLiterals !== 0) return byLiterals;

  const byPlaceholders = a.placeholders().length - b.placeholders().length;
  if (byPlaceholders !== 0) return byPlaceholders;

  return left < right ? -1 : left > right ? 1 : 0;
}
