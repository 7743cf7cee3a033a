/**
 * Error taxonomy shared by the registry, the codecs and the converter.
 *
 * Every error carries a machine-readable code and a details record so
 * callers can report the offending name and JSON path.
 */

export enum ErrorCode {
  GRAMMAR_SYNTAX = 'GRAMMAR_SYNTAX',
  UNKNOWN_TYPE = 'UNKNOWN_TYPE',
  UNKNOWN_CONSTRUCTOR = 'UNKNOWN_CONSTRUCTOR',
  SHAPE_MISMATCH = 'SHAPE_MISMATCH',
  UNSUPPORTED_VERSION = 'UNSUPPORTED_VERSION',
  CONFIGURATION = 'CONFIGURATION',
  CONVERSION_FAILED = 'CONVERSION_FAILED',
}

export interface ErrorDetails {
  /** Type or constructor name involved */
  name?: string;
  /** JSON path (`$.blocks[0].c`) or value path (`Para[0]`) */
  path?: string;
  expected?: string;
  actual?: string;
  [key: string]: unknown;
}

export class AstError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(message: string, code: ErrorCode, details: ErrorDetails = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AstError';
    this.code = code;
    this.details = details;
  }

  toJSON(): { name: string; message: string; code: ErrorCode; details: ErrorDetails } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

export class GrammarSyntaxError extends AstError {
  constructor(message: string, public line: number, public column: number) {
    super(`Grammar syntax error at line ${line}, column ${column}: ${message}`, ErrorCode.GRAMMAR_SYNTAX, {
      line,
      column,
    });
    this.name = 'GrammarSyntaxError';
  }
}

export class UnknownTypeError extends AstError {
  constructor(public typeName: string) {
    super(`Unknown type '${typeName}'`, ErrorCode.UNKNOWN_TYPE, { name: typeName });
    this.name = 'UnknownTypeError';
  }
}

export class UnknownConstructorError extends AstError {
  constructor(public constructorName: string, public path?: string) {
    super(
      path === undefined
        ? `Unknown constructor '${constructorName}'`
        : `Unknown constructor '${constructorName}' at ${path}`,
      ErrorCode.UNKNOWN_CONSTRUCTOR,
      { name: constructorName, path },
    );
    this.name = 'UnknownConstructorError';
  }
}

export class ShapeMismatchError extends AstError {
  constructor(
    public path: string,
    public expected: string,
    public actual: string,
    name?: string,
    cause?: unknown,
  ) {
    super(`Expected ${expected} at ${path}, got ${actual}`, ErrorCode.SHAPE_MISMATCH, {
      name,
      path,
      expected,
      actual,
    }, cause);
    this.name = 'ShapeMismatchError';
  }
}

export class UnsupportedVersionError extends AstError {
  constructor(public version: string, reason: string) {
    super(`Unsupported schema version '${version}': ${reason}`, ErrorCode.UNSUPPORTED_VERSION, {
      version,
    });
    this.name = 'UnsupportedVersionError';
  }
}

export class ConfigurationError extends AstError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, ErrorCode.CONFIGURATION, details, cause);
    this.name = 'ConfigurationError';
  }
}

export class ConversionError extends AstError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, ErrorCode.CONVERSION_FAILED, details, cause);
    this.name = 'ConversionError';
  }
}

/** Short description of a JSON or tree value for error messages. */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'nothing';
  if (Array.isArray(value)) return `array of length ${value.length}`;
  if (value instanceof Map) return 'mapping';
  if (typeof value === 'object') {
    if ('tag' in value && typeof value.tag === 'string') return `${value.tag} node`;
    const ctor: unknown = value.constructor;
    return typeof ctor === 'function' && ctor !== Object ? ctor.name : 'object';
  }
  return typeof value;
}
