export class OrchestratorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

// =============================================================================
// ADMISSION
// =============================================================================

export type AdmissionErrorKind = "QueueFull" | "InvalidRequest" | "CatalogUnavailable";

// Raised synchronously by submit; no Build exists when this is thrown.
export class AdmissionError extends OrchestratorError {
  constructor(
    public readonly kind: AdmissionErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "AdmissionError";
  }
}

export class CatalogUnavailableError extends OrchestratorError {
  readonly kind = "CatalogUnavailable";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CatalogUnavailableError";
  }
}

// =============================================================================
// BUILD FAILURES
// =============================================================================

export type BuildConfigErrorKind = "IncompatibleFeatures" | "UnresolvableRef";

export class BuildConfigError extends OrchestratorError {
  constructor(
    public readonly kind: BuildConfigErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "BuildConfigError";
  }
}

export type CheckoutErrorKind = "GitFailure" | "CorruptWorkspace";

export class CheckoutError extends OrchestratorError {
  constructor(
    public readonly kind: CheckoutErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "CheckoutError";
  }
}

export type ToolchainErrorKind = "NonZeroExit" | "Timeout";

export class ToolchainError extends OrchestratorError {
  constructor(
    public readonly kind: ToolchainErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ToolchainError";
  }
}

export class MissingArtifactError extends OrchestratorError {
  readonly kind = "MissingArtifact";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "MissingArtifactError";
  }
}

// =============================================================================
// STORAGE
// =============================================================================

// Fatal: the orchestrator halts rather than continue with an unknown persisted state.
export class StatusStoreError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "StatusStoreError";
  }
}

export class ArtifactStoreError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ArtifactStoreError";
  }
}

export class InvalidTransitionError extends OrchestratorError {
  constructor(
    public readonly buildId: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Build ${buildId} cannot move from ${from} to ${to}.`);
    this.name = "InvalidTransitionError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  build: "BUILD_ERROR",
  store: "STORE_ERROR",
  lock: "LOCK_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends OrchestratorError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
