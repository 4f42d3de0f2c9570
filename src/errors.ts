/**
 * Error Handling
 *
 * Defines the failure taxonomy shared by backends, the degradation ladder and
 * the orchestrator, plus the error classes thrown at configuration and
 * persistence boundaries.
 *
 * - Backend failure kinds are classified by adapters and never thrown upward
 * - Tool failures become textual tool results (the model reacts to them)
 * - Configuration problems are fatal at startup
 */

// =============================================================================
// Failure Taxonomy
// =============================================================================

/** Failures an adapter can report for a single send */
export type BackendFailureKind = 'BackendUnavailable' | 'Timeout' | 'ContentFiltered' | 'MalformedResponse';

/** Every failure kind the orchestrator knows about */
export type ErrorKind = BackendFailureKind | 'ToolExecutionFailed' | 'RecursionLimitExceeded' | 'AllTiersExhausted';

/** Failure kinds that can end a turn */
export type TurnFailureKind = Extract<ErrorKind, 'RecursionLimitExceeded' | 'AllTiersExhausted'>;

/**
 * User-legible descriptions, shown once by the presentation layer when a
 * turn fails.
 */
export const ERROR_DESCRIPTIONS: Record<ErrorKind, string> = {
  BackendUnavailable: 'The assistant could not be reached.',
  Timeout: 'The assistant took too long to respond.',
  ContentFiltered: 'The assistant declined to process that request.',
  MalformedResponse: 'The assistant returned a response that could not be read.',
  ToolExecutionFailed: 'A tool failed while handling your request.',
  RecursionLimitExceeded:
    'The assistant kept calling tools without finishing. Please try rephrasing your request.',
  AllTiersExhausted:
    'Sorry, the assistant is unavailable right now. Your message was not saved, so you can try again.',
};

/**
 * Get the user-facing description for a failure kind
 */
export function describeFailure(kind: ErrorKind): string {
  return ERROR_DESCRIPTIONS[kind];
}

// =============================================================================
// Base Error Class
// =============================================================================

export type FocusErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'TURN_IN_PROGRESS'
  | 'TOOL_EXECUTION_ERROR'
  | 'BACKEND_FAILURE';

/**
 * Base error class for errors that cross module boundaries as exceptions.
 * Carries a stable code and optional structured data.
 */
export class FocusError extends Error {
  constructor(
    public readonly code: FocusErrorCode,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'FocusError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain object for structured logs. Never includes the stack.
   */
  toJSON(): { code: FocusErrorCode; message: string; data?: unknown } {
    const result: { code: FocusErrorCode; message: string; data?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.data !== undefined) {
      result.data = this.data;
    }
    return result;
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Invalid static configuration: duplicate tool names, a broken ladder,
 * unparseable environment values. Fatal at startup.
 */
export class ConfigurationError extends FocusError {
  constructor(message: string, data?: unknown) {
    super('CONFIGURATION_ERROR', message, data);
    this.name = 'ConfigurationError';
  }
}

/**
 * The persisted conversation log could not be read or written.
 */
export class PersistenceError extends FocusError {
  constructor(message: string, data?: unknown) {
    super('PERSISTENCE_ERROR', message, data);
    this.name = 'PersistenceError';
  }
}

/**
 * A new user message arrived while a turn was still in flight.
 */
export class TurnInProgressError extends FocusError {
  constructor() {
    super('TURN_IN_PROGRESS', 'A turn is already in progress');
    this.name = 'TurnInProgressError';
  }
}

/**
 * Domain failure raised inside a tool's run function. The registry converts
 * it into an error tool result; it never reaches the orchestrator.
 */
export class ToolExecutionError extends FocusError {
  constructor(message: string, data?: unknown) {
    super('TOOL_EXECUTION_ERROR', message, data);
    this.name = 'ToolExecutionError';
  }
}

/**
 * Classified failure of one backend attempt. Adapters throw it internally and
 * turn it into a failure outcome at their boundary.
 */
export class BackendFailureError extends FocusError {
  constructor(
    public readonly kind: BackendFailureKind,
    message: string
  ) {
    super('BACKEND_FAILURE', message, { kind });
    this.name = 'BackendFailureError';
  }
}

// =============================================================================
// Tool Results
// =============================================================================

/**
 * Textual outcome of a tool handler. Error results are still delivered to the
 * model as the content of the tool message.
 */
export interface ToolResult {
  text: string;
  isError: boolean;
}

/**
 * Create a tool error result.
 *
 * @param message - Human-readable error description
 * @param toolName - Prefixes the text with the failing tool
 */
export function createToolErrorResult(message: string, toolName?: string): ToolResult {
  const body = message.trim() === '' ? 'unknown error' : message;
  return {
    text: toolName ? `Tool '${toolName}' failed: ${body}` : body,
    isError: true,
  };
}

/**
 * Create a successful tool result
 */
export function createToolSuccessResult(text: string): ToolResult {
  return { text, isError: false };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Extract a message from any thrown value without exposing stacks.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

export function isFocusError(error: unknown): error is FocusError {
  return error instanceof FocusError;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
