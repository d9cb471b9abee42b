/**
 * Registry error taxonomy.
 *
 * Every failure the core can report is a RegistryError with a kind the
 * caller can switch on. Exit codes are what the CLI hands to the shell.
 */

export type RegistryErrorKind =
  | "NotFound"
  | "CorruptIndex"
  | "Ambiguous"
  | "MissingContent"
  | "IOFailure";

export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
  MISUSE: 2,
  AMBIGUOUS: 2,
  MISSING_CONTENT: 3,
  CORRUPT_INDEX: 4,
  IO_FAILURE: 5,
  NOT_FOUND: 7,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

const EXIT_CODES: Record<RegistryErrorKind, ExitCodeValue> = {
  NotFound: ExitCode.NOT_FOUND,
  CorruptIndex: ExitCode.CORRUPT_INDEX,
  Ambiguous: ExitCode.AMBIGUOUS,
  MissingContent: ExitCode.MISSING_CONTENT,
  IOFailure: ExitCode.IO_FAILURE,
};

export interface RegistryErrorOptions {
  hint?: string;
  candidates?: string[];
  cause?: unknown;
}

export interface StructuredError {
  error: {
    kind: RegistryErrorKind;
    message: string;
    exitCode: ExitCodeValue;
    hint?: string;
    candidates?: string[];
  };
}

export class RegistryError extends Error {
  readonly kind: RegistryErrorKind;
  readonly exitCode: ExitCodeValue;
  readonly hint?: string;
  readonly candidates: string[];

  constructor(kind: RegistryErrorKind, message: string, options: RegistryErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "RegistryError";
    this.kind = kind;
    this.exitCode = EXIT_CODES[kind];
    this.hint = options.hint;
    this.candidates = options.candidates ?? [];
  }

  toJSON(): StructuredError {
    return {
      error: {
        kind: this.kind,
        message: this.message,
        exitCode: this.exitCode,
        ...(this.hint !== undefined && { hint: this.hint }),
        ...(this.candidates.length > 0 && { candidates: this.candidates }),
      },
    };
  }

  /** Human-readable form for stderr / tool output */
  format(): string {
    let output = `${this.kind}: ${this.message}`;
    if (this.candidates.length > 0) {
      output += `\nCandidates:\n${this.candidates.map((c) => `  - ${c}`).join("\n")}`;
    }
    if (this.hint) {
      output += `\nHint: ${this.hint}`;
    }
    return output;
  }
}

export function isRegistryError(err: unknown): err is RegistryError {
  return err instanceof RegistryError;
}

/** Node fs errors carry a string code; everything else does not. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
