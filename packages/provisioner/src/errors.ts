export type InstallerErrorCode =
  | "NOT_PRIVILEGED"
  | "INVALID_CONFIG"
  | "INVALID_ENVIRONMENT"
  | "INSUFFICIENT_DISK"
  | "INSUFFICIENT_MEMORY"
  | "STEP_FAILED"
  | "SECRET_NOT_PROTECTED"
  | "SECRET_MISSING"
  | "RANDOM_SOURCE_UNAVAILABLE"
  | "INVALID_FIELD"
  | "OPERATOR_ABORT"
  | "INTERACTIVE_INPUT_REQUIRED"
  | "IDENTITY_UNRESOLVED"
  | "INVALID_TRANSITION"
  | "DUPLICATE_STEP"
  | "VERIFICATION_FAILED"
  | "UNKNOWN"

export class InstallerError extends Error {
  readonly code: InstallerErrorCode

  constructor(code: InstallerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "InstallerError"
    this.code = code
  }

  /** Generic error for conditions without a dedicated code */
  static generic(message: string): InstallerError {
    return new InstallerError("UNKNOWN", message)
  }
}

/**
 * A condition that must hold before the run touches the host.
 * A wrong host OS is only a warning and never raised as this error.
 */
export class PreconditionError extends InstallerError {
  constructor(code: InstallerErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options)
    this.name = "PreconditionError"
  }

  static notPrivileged(): PreconditionError {
    return new PreconditionError("NOT_PRIVILEGED", "This installer must be run as root")
  }

  static invalidEnvironment(message: string): PreconditionError {
    return new PreconditionError("INVALID_ENVIRONMENT", message)
  }
}

/** The config file exists but does not parse or validate */
export class ConfigError extends PreconditionError {
  readonly path: string

  constructor(path: string, cause: unknown) {
    super("INVALID_CONFIG", cause instanceof Error ? cause.message : `Invalid config in ${path}`, { cause })
    this.name = "ConfigError"
    this.path = path
  }
}

export class ResourceError extends InstallerError {
  constructor(code: InstallerErrorCode, message: string) {
    super(code, message)
    this.name = "ResourceError"
  }

  static insufficientDisk(freeGb: number, requiredGb: number): ResourceError {
    return new ResourceError(
      "INSUFFICIENT_DISK",
      `Insufficient disk space. Need ${requiredGb}GB+, have ${freeGb.toFixed(1)}GB`,
    )
  }

  static insufficientMemory(totalGb: number, requiredGb: number): ResourceError {
    return new ResourceError(
      "INSUFFICIENT_MEMORY",
      `System has ${totalGb.toFixed(1)}GB RAM. Recommended: ${requiredGb}GB+`,
    )
  }
}

export type FailureSeverity = "fatal" | "recoverable"

/** A step's apply (or precheck) raised. Severity decides whether the run goes on. */
export class StepFailure extends InstallerError {
  readonly step: string
  readonly severity: FailureSeverity

  constructor(step: string, severity: FailureSeverity, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super("STEP_FAILED", `Step ${step} failed: ${reason}`, { cause })
    this.name = "StepFailure"
    this.step = step
    this.severity = severity
  }

  static fatal(step: string, cause: unknown): StepFailure {
    return new StepFailure(step, "fatal", cause)
  }

  static recoverable(step: string, cause: unknown): StepFailure {
    return new StepFailure(step, "recoverable", cause)
  }
}

/** A secret could not be stored with owner-only access. Always fatal. */
export class PersistenceError extends InstallerError {
  readonly path: string

  constructor(path: string, message: string, cause?: unknown) {
    super("SECRET_NOT_PROTECTED", message, { cause })
    this.name = "PersistenceError"
    this.path = path
  }

  static directory(path: string, cause: unknown): PersistenceError {
    return new PersistenceError(path, `Cannot create protected credentials directory ${path}`, cause)
  }

  static write(path: string, cause: unknown): PersistenceError {
    return new PersistenceError(path, `Cannot write protected credential file ${path}`, cause)
  }

  static permissions(path: string, mode: number): PersistenceError {
    return new PersistenceError(path, `${path} has mode ${mode.toString(8)}, expected owner-only access`)
  }
}

/** Malformed field input. Handled inside the validation layer, never escapes it. */
export class ValidationError extends InstallerError {
  readonly field: string

  constructor(field: string, message: string) {
    super("INVALID_FIELD", message)
    this.name = "ValidationError"
    this.field = field
  }
}

/** The operator cancelled a prompt (Ctrl-C / Esc). Stops the run without rollback. */
export class OperatorAbortError extends InstallerError {
  constructor(message = "Installation aborted by operator") {
    super("OPERATOR_ABORT", message)
    this.name = "OperatorAbortError"
  }
}
