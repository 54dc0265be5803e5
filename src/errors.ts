/**
 * Error taxonomy for script execution
 *
 * Fatal errors abort the running script. FunctionExecutionError and
 * UnknownFunctionError are recoverable inside the tool loop, where they are
 * turned into error results for the model.
 */

export type RunnerErrorCode =
  | 'TRANSPORT'
  | 'MALFORMED_RESPONSE'
  | 'UNKNOWN_MODEL'
  | 'UNKNOWN_PROVIDER'
  | 'DUPLICATE_MODEL_DECLARATION'
  | 'UNDEFINED_VARIABLE'
  | 'FUNCTION_EXECUTION'
  | 'UNKNOWN_FUNCTION'
  | 'UNKNOWN_BUILTIN'
  | 'NO_MESSAGE'
  | 'NO_MODEL_DECLARED'
  | 'MISSING_API_KEY'
  | 'REGISTRY_LOCKED'
  | 'SESSION_NOT_FOUND'
  | 'SCRIPT_SYNTAX'
  | 'STATEMENT';

export class RunnerError extends Error {
  constructor(
    message: string,
    public readonly code: RunnerErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'RunnerError';
  }
}

/** Network failure, timeout or non-2xx status from a provider */
export class TransportError extends RunnerError {
  constructor(
    message: string,
    public readonly status: number | null = null,
    options?: ErrorOptions
  ) {
    super(message, 'TRANSPORT', options);
    this.name = 'TransportError';
  }
}

/** Provider answered 2xx but the body is not the expected shape */
export class MalformedResponseError extends RunnerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'MALFORMED_RESPONSE', options);
    this.name = 'MalformedResponseError';
  }
}

export class UnknownModelError extends RunnerError {
  constructor(public readonly modelId: string) {
    super(`Model ${modelId} is not defined`, 'UNKNOWN_MODEL');
    this.name = 'UnknownModelError';
  }
}

export class UnknownProviderError extends RunnerError {
  constructor(public readonly provider: string) {
    super(`No adapter registered for provider ${provider}`, 'UNKNOWN_PROVIDER');
    this.name = 'UnknownProviderError';
  }
}

export class DuplicateModelDeclarationError extends RunnerError {
  constructor() {
    super('Only one .llm statement is allowed per script', 'DUPLICATE_MODEL_DECLARATION');
    this.name = 'DuplicateModelDeclarationError';
  }
}

export class UndefinedVariableError extends RunnerError {
  constructor(public readonly variable: string) {
    super(`Variable '${variable}' is not defined`, 'UNDEFINED_VARIABLE');
    this.name = 'UndefinedVariableError';
  }
}

export class FunctionExecutionError extends RunnerError {
  constructor(
    public readonly functionName: string,
    detail: string
  ) {
    super(`Error executing function '${functionName}': ${detail}`, 'FUNCTION_EXECUTION');
    this.name = 'FunctionExecutionError';
  }
}

export class UnknownFunctionError extends RunnerError {
  constructor(public readonly functionName: string) {
    super(`Unknown function '${functionName}'`, 'UNKNOWN_FUNCTION');
    this.name = 'UnknownFunctionError';
  }
}

export class UnknownBuiltinError extends RunnerError {
  constructor(public readonly builtin: string) {
    super(`${builtin} is not defined`, 'UNKNOWN_BUILTIN');
    this.name = 'UnknownBuiltinError';
  }
}

export class NoMessageError extends RunnerError {
  constructor(keyword: string) {
    super(`${keyword} needs a message to append to`, 'NO_MESSAGE');
    this.name = 'NoMessageError';
  }
}

export class NoModelDeclaredError extends RunnerError {
  constructor() {
    super('No model declared: add an .llm statement before .exec', 'NO_MODEL_DECLARED');
    this.name = 'NoModelDeclaredError';
  }
}

export class MissingApiKeyError extends RunnerError {
  constructor(
    public readonly provider: string,
    envVar: string
  ) {
    super(`No API key for ${provider}: set ${envVar}`, 'MISSING_API_KEY');
    this.name = 'MissingApiKeyError';
  }
}

export class RegistryLockedError extends RunnerError {
  constructor() {
    super('Model registry is locked once execution has started', 'REGISTRY_LOCKED');
    this.name = 'RegistryLockedError';
  }
}

export class SessionNotFoundError extends RunnerError {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class ScriptSyntaxError extends RunnerError {
  constructor(message: string) {
    super(message, 'SCRIPT_SYNTAX');
    this.name = 'ScriptSyntaxError';
  }
}

/**
 * Fatal failure of one statement, carrying where it happened
 */
export class StatementError extends RunnerError {
  constructor(
    public readonly sequenceNo: number,
    public readonly keyword: string,
    cause: unknown
  ) {
    super(
      `Statement ${String(sequenceNo).padStart(2, '0')} (${keyword}): ${errorMessage(cause)}`,
      'STATEMENT',
      { cause }
    );
    this.name = 'StatementError';
  }
}

/**
 * Message text of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
