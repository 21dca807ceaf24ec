export class LintError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A malformed SPDX license expression. `fragment` is the offending part of
 * the input and `position` its zero-based offset.
 */
export class ParseError extends LintError {
  constructor(
    message: string,
    readonly expression: string,
    readonly fragment: string,
    readonly position: number,
  ) {
    super(message);
  }
}

export class ReadError extends LintError {
  constructor(readonly path: string, message: string) {
    super(`Could not read ${path}: ${message}`);
  }
}

export class TemplateError extends LintError {}

export class StyleError extends LintError {
  constructor(readonly path: string, message: string) {
    super(message);
  }
}

export class ConfigError extends LintError {
  constructor(readonly source: string, message: string) {
    super(`${source}: ${message}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
