/**
 * Well-defined error kinds for the application.
 */
export type ErrorKind =
  // File system errors
  | "FileNotFound"
  | "InvalidPath"
  | "PermissionDenied"
  | "FileAlreadyExists"
  | "IoError"

  // Data format errors
  | "DecodeError"

  // Tree validation errors
  | "InvalidName"
  | "NameCollision"
  | "InvalidParent"
  | "CyclicMove"
  | "DeleteRoot"
  | "NodeNotFound"
  | "NotARequest"
  | "InvalidValue"
  | "InvalidHeader"

  // Collection lifecycle errors
  | "CollectionNotOpen"
  | "UnsavedChanges"
  | "FlushFailed"
  | "LockTimeout"

/**
 * Main error structure for the application.
 */
export class AppError extends Error {
  /** The classification of the error. */
  readonly kind: ErrorKind
  /**
   * Optional contextual key/value data that can help diagnose the issue.
   */
  readonly context?: Record<string, string>
  /**
   * ISO 8601 timestamp of when the error was recorded.
   */
  readonly timestamp: string

  constructor(kind: ErrorKind, message: string, context?: Record<string, string>, options?: ErrorOptions) {
    super(message, options)
    this.name = "AppError"
    this.kind = kind
    this.context = context
    this.timestamp = new Date().toISOString()
  }
}

/**
 * Type guard: is a value an AppError, optionally of one of the given kinds?
 */
export function isAppError(e: unknown, kind?: ErrorKind | ErrorKind[]): e is AppError {
  if (!(e instanceof AppError)) {
    return false
  }
  if (kind) {
    return (Array.isArray(kind) ? kind : [kind]).includes(e.kind)
  }
  return true
}

const errnoKinds: Record<string, ErrorKind> = {
  ENOENT: "FileNotFound",
  EACCES: "PermissionDenied",
  EPERM: "PermissionDenied",
  EEXIST: "FileAlreadyExists",
  ENOTDIR: "InvalidPath",
  EISDIR: "InvalidPath",
}

const errnoCode = (e: unknown): string | undefined => {
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return e.code
  }
  return undefined
}

/**
 * Normalize an error thrown by a file system call into an AppError.
 */
export function toAppError(e: unknown, path: string): AppError {
  if (e instanceof AppError) {
    return e
  }
  const code = errnoCode(e)
  const kind = (code && errnoKinds[code]) || "IoError"
  const message = e instanceof Error ? e.message : String(e)
  return new AppError(kind, `${path}: ${message}`, code ? { path, code } : { path }, { cause: e })
}
