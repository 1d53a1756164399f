/* packages/template/src/errors.ts */

export type ErrorCode = "INVALID_ARGUMENT" | "PATTERN_COMPILE" | "MISSING_VALUE";

export class UriTemplateError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "UriTemplateError";
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

export class ArgumentError extends UriTemplateError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "ArgumentError";
  }
}

/** The generated pattern source (or one explicit constraint) is not a valid regular expression */
export class PatternCompileError extends UriTemplateError {
  readonly template: string;

  constructor(template: string, message: string, cause?: unknown) {
    super("PATTERN_COMPILE", message, { cause });
    this.template = template;
    this.name = "PatternCompileError";
  }
}

export class MissingValueError extends UriTemplateError {
  readonly variable: string;

  constructor(variable: string) {
    super("MISSING_VALUE", `The template variable "${variable}" has no value`);
    this.variable = variable;
    this.name = "MissingValueError";
  }
}
