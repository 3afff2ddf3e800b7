export type SettlementErrorKind =
  | "DeadlineExpired"
  | "InsufficientOutputAmount"
  | "InsufficientInputAmount"
  | "PairNotFound"
  | "TransferFailed"
  | "InvalidToken"
  | "UnexpectedReentry"
  | "Unauthorized";

/**
 * Failure raised by the settlement core. `kind` identifies the cause so callers
 * can branch on it without parsing messages.
 */
export class SettlementError extends Error {
  public readonly kind: SettlementErrorKind;

  constructor(kind: SettlementErrorKind, detail?: string) {
    super(detail ? `${kind}: ${detail}` : kind);
    this.name = "SettlementError";
    this.kind = kind;
  }
}

export function isSettlementError(e: unknown, kind?: SettlementErrorKind): e is SettlementError {
  return e instanceof SettlementError && (kind === undefined || e.kind === kind);
}
