/**
 * Error types raised while reading JSON netlists.
 *
 * Every failure of the parser or the importer is fatal for the current
 * import call. The service layer turns these into `{ error }` results.
 */

/**
 * Base class for all reader errors.
 */
export class JsonNetlistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonNetlistError";
  }
}

/**
 * Input ended while a value was still incomplete.
 */
export class StreamError extends JsonNetlistError {
  constructor(message: string) {
    super(message);
    this.name = "StreamError";
  }
}

/**
 * Unrecognized character at the start of a value, non-string object key,
 * out-of-range integer, or a rejected duplicate key.
 */
export class JsonSyntaxError extends JsonNetlistError {
  constructor(message: string) {
    super(message);
    this.name = "JsonSyntaxError";
  }
}

/**
 * The document parsed but does not have the shape of a netlist.
 */
export class SchemaError extends JsonNetlistError {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

/**
 * A module with the same name already exists in the target design.
 */
export class NameConflictError extends JsonNetlistError {
  readonly moduleName: string;

  constructor(moduleName: string) {
    super(`Re-definition of module ${moduleName}.`);
    this.name = "NameConflictError";
    this.moduleName = moduleName;
  }
}

/**
 * Invalid environment configuration.
 */
export class ConfigError extends Error {
  readonly variables: string[];

  constructor(message: string, variables: string[]) {
    super(message);
    this.name = "ConfigError";
    this.variables = variables;
  }
}
