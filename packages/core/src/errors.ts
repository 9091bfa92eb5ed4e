/** Every way a registry can fail to compile. All are configuration-time errors; none is retryable. */
export type CompileErrorCode =
  | 'InvalidAccountName'
  | 'MissingRequiredField'
  | 'InvalidInterval'
  | 'InvalidPort'
  | 'InvalidServiceName'
  | 'InvalidExtraConfig'
  | 'MissingCredentialSource'
  | 'DuplicateArtifactKey'
  | 'InvalidRegistry';

export interface CompileErrorOptions {
  /** Account the error was raised for, when there is one */
  account?: string | null;
  /** Dotted path of the offending field inside the account */
  field?: string | null;
  context?: Record<string, unknown>;
}

/**
 * Raised when an account registry cannot be turned into artifacts.
 * A single CompileError aborts the whole run; no partial artifact set is ever returned.
 */
export class CompileError extends Error {
  public readonly code: CompileErrorCode;
  public readonly account: string | null;
  public readonly field: string | null;
  public readonly context?: Record<string, unknown>;

  constructor(code: CompileErrorCode, message: string, options: CompileErrorOptions = {}) {
    super(message);
    this.name = 'CompileError';
    this.code = code;
    this.account = options.account ?? null;
    this.field = options.field ?? null;
    this.context = options.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      account: this.account,
      field: this.field,
      context: this.context,
    };
  }
}

export function isCompileError(err: unknown): err is CompileError {
  return err instanceof CompileError;
}
