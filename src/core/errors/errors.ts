export type CollaboratorName = "session_store" | "candidate_supplier";

export class RecoverableCollaboratorFailure extends Error {
  readonly kind = "RecoverableCollaboratorFailure";
  readonly collaborator: CollaboratorName;

  constructor(
    collaborator: CollaboratorName,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RecoverableCollaboratorFailure";
    this.collaborator = collaborator;
  }
}

export class InvalidRequestError extends Error {
  readonly kind = "InvalidRequest";

  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export class ConfigurationError extends Error {
  readonly kind = "ConfigurationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** An optional capability (native module, feature flag) is not present in this process. */
export class MissingCapabilityError extends Error {
  readonly kind = "MissingCapability";
  readonly capability: string;

  constructor(capability: string, options?: { cause?: unknown }) {
    super(`MISSING_CAPABILITY ${capability}`, options);
    this.name = "MissingCapabilityError";
    this.capability = capability;
  }
}

export function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
