import { SettlementError } from "./errors";
import Helpers from "./lib/Helpers";

export function requireDeadline(deadline: bigint, now: bigint): void {
  if (deadline < now) {
    throw new SettlementError("DeadlineExpired", `deadline ${deadline} is before ${now}`);
  }
}

export function requireOutput(desiredOutput: bigint): void {
  if (desiredOutput <= 0n) {
    throw new SettlementError("InsufficientOutputAmount", "desired output must be positive");
  }
}

/** The output token may be neither the zero address nor the wrapped base asset itself. */
export function requireToken(token: string, baseAsset: string): void {
  if (Helpers.isZeroAddress(token) || Helpers.sameAddress(token, baseAsset)) {
    throw new SettlementError("InvalidToken", token);
  }
}

export function requireSecondaryDeposit(amount: bigint): void {
  if (amount <= 0n) {
    throw new SettlementError("InsufficientInputAmount", "secondary deposit must be positive");
  }
}
