import type { ZodError } from "zod";

export class ControlPlaneError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly retrySafe: boolean;

  constructor(code: string, message: string, statusCode: number, retrySafe = true) {
    super(message);
    this.name = "ControlPlaneError";
    this.code = code;
    this.statusCode = statusCode;
    this.retrySafe = retrySafe;
  }
}

export class ValidationError extends ControlPlaneError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("VALIDATION_ERROR", `Validation failed: ${issues.join("; ")}`, 400);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export function validationErrorFrom(error: ZodError): ValidationError {
  return new ValidationError(
    error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)),
  );
}

export class AlreadyInitializedError extends ControlPlaneError {
  constructor(detail = "a cluster already exists in this store") {
    super("ALREADY_INITIALIZED", `Cluster already initialized: ${detail}`, 409);
    this.name = "AlreadyInitializedError";
  }
}

export class NotInitializedError extends ControlPlaneError {
  constructor() {
    super("NOT_INITIALIZED", "No cluster has been bootstrapped yet", 404);
    this.name = "NotInitializedError";
  }
}

export class NotLeaderError extends ControlPlaneError {
  constructor(operation: string) {
    super("NOT_LEADER", `Refusing "${operation}": this process is not the cluster leader`, 403);
    this.name = "NotLeaderError";
  }
}

export class CryptoFailureError extends ControlPlaneError {
  constructor(operation: string, cause: unknown) {
    super(
      "CRYPTO_FAILURE",
      `Cryptographic operation "${operation}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      500,
    );
    this.name = "CryptoFailureError";
  }
}

export class TokenNotFoundError extends ControlPlaneError {
  constructor() {
    super("TOKEN_NOT_FOUND", "Bootstrap token is not valid", 401);
    this.name = "TokenNotFoundError";
  }
}

export class TokenExpiredError extends ControlPlaneError {
  public readonly expiredAt: Date;

  constructor(expiredAt: Date) {
    super("TOKEN_EXPIRED", `Bootstrap token expired at ${expiredAt.toISOString()}`, 403);
    this.name = "TokenExpiredError";
    this.expiredAt = expiredAt;
  }
}

export class TokenUsedError extends ControlPlaneError {
  constructor() {
    super("TOKEN_USED", "Bootstrap token has already been used", 403);
    this.name = "TokenUsedError";
  }
}

export class NodeNotFoundError extends ControlPlaneError {
  constructor(nodeId: string) {
    super("NODE_NOT_FOUND", `Node "${nodeId}" not found`, 404);
    this.name = "NodeNotFoundError";
  }
}

export class NodeAccessDeniedError extends ControlPlaneError {
  constructor(caller: string, hostname: string) {
    super("NODE_ACCESS_DENIED", `Certificate for "${caller}" may not act on node ${hostname}`, 403);
    this.name = "NodeAccessDeniedError";
  }
}

export class LeaderCertificateRequiredError extends ControlPlaneError {
  constructor(caller: string) {
    super("LEADER_CERTIFICATE_REQUIRED", `Certificate for "${caller}" is not the leader's; only the leader may administer the cluster`, 403);
    this.name = "LeaderCertificateRequiredError";
  }
}

export class DuplicateNodeError extends ControlPlaneError {
  constructor(detail: string) {
    super("DUPLICATE_NODE", `Node identity already registered: ${detail}`, 409);
    this.name = "DuplicateNodeError";
  }
}

export type ExternalOperationName = "bootstrap" | "join" | "leave" | "status";

export class ExternalOperationFailure extends ControlPlaneError {
  public readonly subsystem: string;
  public readonly operation: ExternalOperationName;
  public readonly timedOut: boolean;

  constructor(opts: { subsystem: string; operation: ExternalOperationName; reason: string; timedOut?: boolean }) {
    super(
      "EXTERNAL_OPERATION_FAILURE",
      `${opts.subsystem} ${opts.operation} failed: ${opts.reason}`,
      502,
    );
    this.name = "ExternalOperationFailure";
    this.subsystem = opts.subsystem;
    this.operation = opts.operation;
    this.timedOut = opts.timedOut ?? false;
  }
}

/**
 * External subsystems were bootstrapped but the cluster records could not be
 * committed. Their state may now be stale; an operator has to inspect it
 * before retrying.
 */
export class PersistenceFailedAfterExternalBootstrapError extends ControlPlaneError {
  public readonly bootstrappedSubsystems: readonly string[];

  constructor(bootstrappedSubsystems: readonly string[], cause: unknown) {
    super(
      "PERSISTENCE_FAILED_AFTER_EXTERNAL_BOOTSTRAP",
      `Cluster records could not be persisted after bootstrapping [${bootstrappedSubsystems.join(", ")}]: ${
        cause instanceof Error ? cause.message : String(cause)
      }. External subsystem state may be stale and requires manual inspection before retrying.`,
      500,
      false,
    );
    this.name = "PersistenceFailedAfterExternalBootstrapError";
    this.bootstrappedSubsystems = bootstrappedSubsystems;
  }
}

export class InvalidPhaseTransitionError extends ControlPlaneError {
  constructor(pipeline: string, from: string, to: string) {
    super("INVALID_PHASE_TRANSITION", `Invalid ${pipeline} phase transition: ${from} → ${to}`, 500);
    this.name = "InvalidPhaseTransitionError";
  }
}

export class NodeStateConflictError extends ControlPlaneError {
  constructor(path: string) {
    super("NODE_STATE_CONFLICT", `Node state at ${path} is already initialized; an administrative reset is required`, 409);
    this.name = "NodeStateConflictError";
  }
}

export function toErrorBody(err: ControlPlaneError): { message: string; code: string; retry_safe: boolean } {
  return { message: err.message, code: err.code, retry_safe: err.retrySafe };
}
