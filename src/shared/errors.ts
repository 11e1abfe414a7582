/**
 * Domain errors.
 *
 * Every error here is recoverable at the point of input: the API maps them
 * to 4xx responses and the CLI prints them and exits non-zero.
 */

export type DitaErrorCode =
  | "EMPTY_TITLE"
  | "MISSING_TEMPLATE"
  | "MISSING_FIELD"
  | "DUPLICATE_ITEM"
  | "EMPTY_MAP"
  | "INVALID_BUNDLE"
  | "LIMIT_EXCEEDED";

export class DitaScaffoldError extends Error {
  readonly code: DitaErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: DitaErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class EmptyTitleError extends DitaScaffoldError {
  constructor(what = "Title") {
    super("EMPTY_TITLE", `${what} must contain at least one letter or digit`);
  }
}

export class MissingTemplateError extends DitaScaffoldError {
  constructor(type: string) {
    super("MISSING_TEMPLATE", `No template registered for content type "${type}"`, { type });
  }
}

export class MissingFieldError extends DitaScaffoldError {
  readonly fields: string[];

  constructor(type: string, fields: string[]) {
    super(
      "MISSING_FIELD",
      `Missing required field(s) for ${type}: ${fields.join(", ")}`,
      { type, fields },
    );
    this.fields = fields;
  }
}

export class DuplicateItemError extends DitaScaffoldError {
  constructor(id: string, title: string, existingTitle: string) {
    super(
      "DUPLICATE_ITEM",
      `"${title}" and "${existingTitle}" would both generate ${id}.xml. Please use unique names.`,
      { id, title, existingTitle },
    );
  }
}

export class EmptyMapError extends DitaScaffoldError {
  constructor() {
    super("EMPTY_MAP", "No topics to include in the chapter map");
  }
}

export class InvalidBundleError extends DitaScaffoldError {
  constructor(reason: string) {
    super("INVALID_BUNDLE", `Invalid bundle: ${reason}`);
  }
}

export class LimitExceededError extends DitaScaffoldError {
  constructor(type: string, limit: number) {
    super(
      "LIMIT_EXCEEDED",
      `A session holds at most ${limit} ${type} topic(s)`,
      { type, limit },
    );
  }
}

export function isDitaScaffoldError(err: unknown): err is DitaScaffoldError {
  return err instanceof DitaScaffoldError;
}
