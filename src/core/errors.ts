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

export class SvnError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SvnError";
  }
}

// =============================================================================
// BRIDGE ERRORS
// =============================================================================

export const BRIDGE_ERROR_KINDS = [
  "MalformedConfig",
  "NotABridgeRepository",
  "NoBridgeMarker",
  "CheckoutBlocked",
  "LinkError",
  "RevisionUnavailable",
  "PartialSwitch",
  "UnknownReference",
  "AmbiguousReference",
  "NotInRepository",
  "DestinationExists",
  "InvalidArguments",
  "MissingGitSvn",
  "Locked",
] as const;

export type BridgeErrorKind = (typeof BRIDGE_ERROR_KINDS)[number];

// Stable per kind; scripts branch on these.
export const BRIDGE_EXIT_CODES: Record<BridgeErrorKind, number> = {
  NotABridgeRepository: 1,
  NotInRepository: 2,
  DestinationExists: 3,
  CheckoutBlocked: 4,
  AmbiguousReference: 5,
  UnknownReference: 6,
  NoBridgeMarker: 7,
  InvalidArguments: 8,
  MissingGitSvn: 9,
  RevisionUnavailable: 10,
  LinkError: 11,
  MalformedConfig: 12,
  PartialSwitch: 13,
  Locked: 14,
};

export class BridgeError extends OrchestratorError {
  readonly exitCode: number;

  constructor(
    public readonly kind: BridgeErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = kind.endsWith("Error") ? kind : `${kind}Error`;
    this.exitCode = BRIDGE_EXIT_CODES[kind];
  }
}

export function isBridgeError(error: unknown, kind?: BridgeErrorKind): error is BridgeError {
  if (!(error instanceof BridgeError)) return false;
  return kind === undefined || error.kind === kind;
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  svn: "SVN_ERROR",
  usage: "USAGE_ERROR",
  unknown: "UNKNOWN_ERROR",
  malformedConfig: "MALFORMED_CONFIG",
  notABridgeRepository: "NOT_A_BRIDGE_REPOSITORY",
  noBridgeMarker: "NO_BRIDGE_MARKER",
  checkoutBlocked: "CHECKOUT_BLOCKED",
  linkError: "LINK_ERROR",
  revisionUnavailable: "REVISION_UNAVAILABLE",
  partialSwitch: "PARTIAL_SWITCH",
  unknownReference: "UNKNOWN_REFERENCE",
  ambiguousReference: "AMBIGUOUS_REFERENCE",
  notInRepository: "NOT_IN_REPOSITORY",
  destinationExists: "DESTINATION_EXISTS",
  invalidArguments: "INVALID_ARGUMENTS",
  missingGitSvn: "MISSING_GIT_SVN",
  locked: "LOCKED",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

const KIND_TO_CODE: Record<BridgeErrorKind, UserFacingErrorCode> = {
  MalformedConfig: USER_FACING_ERROR_CODES.malformedConfig,
  NotABridgeRepository: USER_FACING_ERROR_CODES.notABridgeRepository,
  NoBridgeMarker: USER_FACING_ERROR_CODES.noBridgeMarker,
  CheckoutBlocked: USER_FACING_ERROR_CODES.checkoutBlocked,
  LinkError: USER_FACING_ERROR_CODES.linkError,
  RevisionUnavailable: USER_FACING_ERROR_CODES.revisionUnavailable,
  PartialSwitch: USER_FACING_ERROR_CODES.partialSwitch,
  UnknownReference: USER_FACING_ERROR_CODES.unknownReference,
  AmbiguousReference: USER_FACING_ERROR_CODES.ambiguousReference,
  NotInRepository: USER_FACING_ERROR_CODES.notInRepository,
  DestinationExists: USER_FACING_ERROR_CODES.destinationExists,
  InvalidArguments: USER_FACING_ERROR_CODES.invalidArguments,
  MissingGitSvn: USER_FACING_ERROR_CODES.missingGitSvn,
  Locked: USER_FACING_ERROR_CODES.locked,
};

export function userFacingCodeForKind(kind: BridgeErrorKind): UserFacingErrorCode {
  return KIND_TO_CODE[kind];
}

export type UserFacingErrorOptions = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
  details?: string[];
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;
  readonly exitCode: number;
  readonly details: string[];

  constructor(options: UserFacingErrorOptions) {
    super(options.message);
    this.name = "UserFacingError";
    this.code = options.code;
    this.title = options.title;
    this.hint = options.hint;
    this.next = options.next;
    this.cause = options.cause;
    this.exitCode = options.exitCode ?? 1;
    this.details = options.details ?? [];
  }
}
