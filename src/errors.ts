export type SubsetErrorReason =
  | "UNKNOWN_PARAMETER"
  | "CATALOG_LOOKUP"
  | "INVALID_CATALOG"
  | "INVALID_RANGE"
  | "EMPTY_AXIS"
  | "REMOTE_ACCESS"
  | "VARIABLE_NOT_FOUND";

export class SubsetPipelineError extends Error {
  readonly reason: SubsetErrorReason;

  constructor(reason: SubsetErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SubsetPipelineError";
    this.reason = reason;
    Object.setPrototypeOf(this, SubsetPipelineError.prototype);
  }
}

export class UnknownParameterError extends SubsetPipelineError {
  readonly parameter: string;

  constructor(parameter: string, validOptions: string[]) {
    super("UNKNOWN_PARAMETER", `'${parameter}' is not in valid parameter options (${validOptions.join(", ")})`);
    this.name = "UnknownParameterError";
    this.parameter = parameter;
    Object.setPrototypeOf(this, UnknownParameterError.prototype);
  }
}

export class CatalogLookupError extends SubsetPipelineError {
  readonly matches: number;

  constructor(variable: string, temporal: string, matches: number) {
    super(
      "CATALOG_LOOKUP",
      matches === 0
        ? `No catalog entry for ${variable} at ${temporal} resolution`
        : `Catalog has ${matches} entries for ${variable} at ${temporal} resolution; expected exactly one`
    );
    this.name = "CatalogLookupError";
    this.matches = matches;
    Object.setPrototypeOf(this, CatalogLookupError.prototype);
  }
}

export class InvalidCatalogError extends SubsetPipelineError {
  readonly line: number;

  constructor(line: number, message: string) {
    super("INVALID_CATALOG", `Catalog line ${line}: ${message}`);
    this.name = "InvalidCatalogError";
    this.line = line;
    Object.setPrototypeOf(this, InvalidCatalogError.prototype);
  }
}

export class InvalidRangeError extends SubsetPipelineError {
  constructor(message = "Start date must be less than stop date") {
    super("INVALID_RANGE", message);
    this.name = "InvalidRangeError";
    Object.setPrototypeOf(this, InvalidRangeError.prototype);
  }
}

export class EmptyAxisError extends SubsetPipelineError {
  constructor(axis = "axis") {
    super("EMPTY_AXIS", `Cannot resolve nearest value on empty ${axis}`);
    this.name = "EmptyAxisError";
    Object.setPrototypeOf(this, EmptyAxisError.prototype);
  }
}

export class RemoteAccessError extends SubsetPipelineError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super("REMOTE_ACCESS", message, { cause: options?.cause });
    this.name = "RemoteAccessError";
    this.url = url;
    this.status = options?.status;
    Object.setPrototypeOf(this, RemoteAccessError.prototype);
  }
}

export class VariableNotFoundError extends SubsetPipelineError {
  readonly variable: string;
  readonly url: string;

  constructor(variable: string, url: string) {
    super("VARIABLE_NOT_FOUND", `Variable ${variable} not found in ${url}`);
    this.name = "VariableNotFoundError";
    this.variable = variable;
    this.url = url;
    Object.setPrototypeOf(this, VariableNotFoundError.prototype);
  }
}
