/** Reason codes for values the expression model rejects. */
export type DomainErrorReason =
  | "negative constant"
  | "non-integer constant"
  | "non-integer literal"
  | "empty variable name"
  | "invalid variable name"
  | "division by zero"
  | "integer overflow";

/**
 * Thrown when a value violates an invariant of the expression model.
 * Nothing is allocated when construction fails.
 */
export class DomainError extends Error {
  constructor(
    readonly reason: DomainErrorReason,
    message: string = reason,
  ) {
    super(message);
    this.name = "DomainError";
  }
}

/**
 * Thrown when an operation is applied to a node that does not offer it,
 * or when a rewrite would break tree ownership.
 */
export class CapabilityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CapabilityError";
  }
}
