/**
 * Error taxonomy for the Quill engine.
 *
 * Evaluation errors abort the statement that raised them. Tool failures
 * never appear here as thrown errors inside a run: the runner turns them
 * into tool results. Everything that does escape a run is one of these.
 */

import type { Span } from './ast';
import type { OutputSchema } from './schema';

export type ErrorCode =
  | 'UndefinedVariable'
  | 'UndefinedProperty'
  | 'TypeError'
  | 'InvalidOperands'
  | 'DivisionByZero'
  | 'IndexOutOfBounds'
  | 'NotIndexable'
  | 'UnknownTool'
  | 'ToolError'
  | 'MaxStepsExceeded'
  | 'OutputValidationError'
  | 'ApiError'
  | 'ProviderError'
  | 'MissingApiKey'
  | 'UnknownProvider'
  | 'ConfigError';

export class QuillError extends Error {
  readonly code: ErrorCode;
  readonly span: Span | undefined;

  constructor(code: ErrorCode, message: string, span?: Span) {
    super(message);
    this.name = 'QuillError';
    this.code = code;
    this.span = span;
  }
}

export class UndefinedVariableError extends QuillError {
  constructor(readonly variable: string, span?: Span) {
    super('UndefinedVariable', `Undefined variable: '${variable}'`, span);
    this.name = 'UndefinedVariableError';
  }
}

export class UndefinedPropertyError extends QuillError {
  constructor(readonly property: string, readonly typeName: string, span?: Span) {
    super('UndefinedProperty', `Undefined property '${property}' on ${typeName}`, span);
    this.name = 'UndefinedPropertyError';
  }
}

export class QuillTypeError extends QuillError {
  constructor(readonly expected: string, readonly got: string, span?: Span) {
    super('TypeError', `Type error: expected ${expected}, got ${got}`, span);
    this.name = 'QuillTypeError';
  }
}

export class InvalidOperandsError extends QuillError {
  constructor(readonly op: string, readonly left: string, readonly right: string, span?: Span) {
    super(
      'InvalidOperands',
      right
        ? `Invalid operands for '${op}': ${left} and ${right}`
        : `Invalid operand for '${op}': ${left}`,
      span,
    );
    this.name = 'InvalidOperandsError';
  }
}

export class DivisionByZeroError extends QuillError {
  constructor(span?: Span) {
    super('DivisionByZero', 'Division by zero', span);
    this.name = 'DivisionByZeroError';
  }
}

export class IndexOutOfBoundsError extends QuillError {
  constructor(readonly index: number, readonly length: number, span?: Span) {
    super('IndexOutOfBounds', `Index ${index} out of bounds for length ${length}`, span);
    this.name = 'IndexOutOfBoundsError';
  }
}

export class NotIndexableError extends QuillError {
  constructor(readonly typeName: string, span?: Span) {
    super('NotIndexable', `Cannot index into ${typeName}`, span);
    this.name = 'NotIndexableError';
  }
}

export class UnknownToolError extends QuillError {
  constructor(readonly tool: string, span?: Span) {
    super('UnknownTool', `Unknown tool: ${tool}`, span);
    this.name = 'UnknownToolError';
  }
}

export class ToolError extends QuillError {
  constructor(readonly tool: string, readonly detail: string, span?: Span) {
    super('ToolError', `Tool '${tool}' failed: ${detail}`, span);
    this.name = 'ToolError';
  }
}

export class MaxStepsExceededError extends QuillError {
  constructor(readonly limit: number) {
    super('MaxStepsExceeded', `Agent exceeded maximum steps (${limit})`);
    this.name = 'MaxStepsExceededError';
  }
}

export class OutputValidationError extends QuillError {
  constructor(readonly detail: string, readonly expected: OutputSchema, readonly got: string) {
    super('OutputValidationError', `Output validation failed: ${detail}`);
    this.name = 'OutputValidationError';
  }
}

export class ApiError extends QuillError {
  constructor(message: string, readonly status?: number) {
    super('ApiError', status === undefined ? `API error: ${message}` : `API error (${status}): ${message}`);
    this.name = 'ApiError';
  }
}

export class ProviderError extends QuillError {
  constructor(readonly provider: string, message: string) {
    super('ProviderError', `Provider '${provider}' failed: ${message}`);
    this.name = 'ProviderError';
  }
}

export class MissingApiKeyError extends QuillError {
  constructor(readonly provider: string) {
    super('MissingApiKey', `Missing API key for ${provider}. Set ${provider.toUpperCase()}_API_KEY`);
    this.name = 'MissingApiKeyError';
  }
}

export class UnknownProviderError extends QuillError {
  constructor(readonly provider: string) {
    super(
      'UnknownProvider',
      `Unknown provider "${provider}". Set ${provider.toUpperCase()}_BASE_URL environment variable.`,
    );
    this.name = 'UnknownProviderError';
  }
}

export class ConfigError extends QuillError {
  constructor(message: string) {
    super('ConfigError', message);
    this.name = 'ConfigError';
  }
}

/**
 * Message text of anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
