/* packages/router/src/errors.ts */

import type { ValidationError as JTDValidationError } from "jtd";

export class RouteManifestError extends Error {
  readonly code = "INVALID_MANIFEST";
  readonly errors: JTDValidationError[];

  constructor(message: string, errors: JTDValidationError[] = []) {
    super(message);
    this.errors = errors;
    this.name = "RouteManifestError";
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
      },
    };
  }
}
