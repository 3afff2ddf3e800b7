import Constants from "../lib/Constants";
import { SettlementError } from "../errors";

/**
 * Constant-product pricing for a two-asset pair charging a 0.3% fee on the input side.
 * All amounts are raw token units.
 */
export default class ConstantProduct {
  /**
   * Input needed to take exactly `amountOut` out of the pair.
   *
   * Rounds up by one unit so that after the fee is withheld the pair's product of
   * reserves never decreases.
   */
  static getAmountIn(amountOut: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    if (amountOut <= 0n) {
      throw new SettlementError("InsufficientOutputAmount", "output amount must be positive");
    }
    if (reserveIn <= 0n || reserveOut <= 0n) {
      throw new SettlementError("InsufficientInputAmount", "pair has no liquidity");
    }
    // reserveOut - amountOut must stay positive, otherwise the denominator collapses
    if (amountOut >= reserveOut) {
      throw new SettlementError(
        "InsufficientInputAmount",
        `output ${amountOut} exceeds reserve ${reserveOut}`,
      );
    }

    const numerator = reserveIn * amountOut * Constants.FEE_DENOMINATOR;
    const denominator = (reserveOut - amountOut) * Constants.FEE_NUMERATOR;
    return numerator / denominator + 1n;
  }

  /**
   * Output received for selling exactly `amountIn` into the pair.
   */
  static getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    if (amountIn <= 0n) {
      throw new SettlementError("InsufficientInputAmount", "input amount must be positive");
    }
    if (reserveIn <= 0n || reserveOut <= 0n) {
      throw new SettlementError("InsufficientInputAmount", "pair has no liquidity");
    }

    const amountInWithFee = amountIn * Constants.FEE_NUMERATOR;
    const numerator = amountInWithFee * reserveOut;
    const denominator = reserveIn * Constants.FEE_DENOMINATOR + amountInWithFee;
    return numerator / denominator;
  }

  /**
   * Amount of B worth `amountA` of A at the current reserve ratio (no fee).
   */
  static quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
    if (amountA <= 0n) {
      throw new SettlementError("InsufficientInputAmount", "amount must be positive");
    }
    if (reserveA <= 0n || reserveB <= 0n) {
      throw new SettlementError("InsufficientInputAmount", "pair has no liquidity");
    }
    return (amountA * reserveB) / reserveA;
  }
}
