export type AccessErrorKind =
  | "PermissionDenied"
  | "NotFound"
  | "InvalidState"
  | "Expired"
  | "InvalidRecipient"
  | "InvalidInput"
  | "DuplicatePending"
  | "DuplicateCollaborator"
  | "AlreadyCollaborator"
  | "OwnerConflict";

const STATUS: Record<AccessErrorKind, number> = {
  PermissionDenied: 403,
  NotFound: 404,
  InvalidState: 409,
  Expired: 410,
  InvalidRecipient: 400,
  InvalidInput: 400,
  DuplicatePending: 409,
  DuplicateCollaborator: 409,
  AlreadyCollaborator: 409,
  OwnerConflict: 409,
};

/**
 * Failure of a membership or invitation operation. Thrown before anything
 * is committed, or by the store when a unique index rejects the write.
 */
export class AccessError extends Error {
  readonly kind: AccessErrorKind;

  constructor(kind: AccessErrorKind, message: string) {
    super(message);
    this.name = "AccessError";
    this.kind = kind;
  }

  get status(): number {
    return STATUS[this.kind];
  }
}

export function isAccessError(err: unknown, kind?: AccessErrorKind): err is AccessError {
  return err instanceof AccessError && (kind === undefined || err.kind === kind);
}

/** Mongo duplicate-key error (E11000), as raised by a unique index. */
export function isDuplicateKeyError(err: unknown): err is { code: number; keyPattern?: Record<string, unknown> } {
  return typeof err === "object" && err !== null && "code" in err && err.code === 11000;
}
