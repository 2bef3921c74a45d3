export type ErrorKind =
  | "NotFound"
  | "NotAFile"
  | "DuplicateAlias"
  | "DuplicatePath"
  | "IoFailure"
  | "WouldOverwrite"
  | "ConfigCorrupt"
  | "InvalidInput"
  | "Conflict"
  | "VcsFailure";

export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Usage: 2,
  Validation: 3,
  Conflict: 4,
  Filesystem: 5
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

const KIND_EXIT_CODES: Record<ErrorKind, ExitCode> = {
  NotFound: ExitCodes.Validation,
  NotAFile: ExitCodes.Validation,
  DuplicateAlias: ExitCodes.Conflict,
  DuplicatePath: ExitCodes.Conflict,
  IoFailure: ExitCodes.Filesystem,
  WouldOverwrite: ExitCodes.Conflict,
  ConfigCorrupt: ExitCodes.Validation,
  InvalidInput: ExitCodes.Usage,
  Conflict: ExitCodes.Conflict,
  VcsFailure: ExitCodes.Failure
};

export class ConfsyncError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: ExitCode;
  /** Text of the underlying failure, when there is one. */
  public readonly detail?: string;

  constructor(kind: ErrorKind, message: string, detail?: string) {
    super(detail ? `${message}: ${detail}` : message);
    this.name = "ConfsyncError";
    this.kind = kind;
    this.code = KIND_EXIT_CODES[kind];
    this.detail = detail;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

export function describeError(error: unknown): string {
  if (isErrnoException(error) && typeof error.code === "string") {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function ioFailure(message: string, error: unknown): ConfsyncError {
  if (error instanceof ConfsyncError) {
    return error;
  }
  return new ConfsyncError("IoFailure", message, describeError(error));
}
