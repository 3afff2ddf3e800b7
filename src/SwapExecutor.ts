import Constants from "./lib/Constants";
import ConstantProduct from "./logic/ConstantProduct";
import { SettlementError } from "./errors";
import { ReserveOracle } from "./ReserveOracle";
import { AssetWrapper, Pool } from "./types";

export interface SwapOrder {
  tokenOut: string;
  desiredOutput: bigint;
  recipient: string;
  /** most native funds the swap may consume */
  budget: bigint;
}

/**
 * Buys an exact amount of a token from its pair against the wrapped base asset,
 * paying the pair directly and calling its low-level swap.
 */
export class SwapExecutor {
  constructor(
    private readonly oracle: ReserveOracle<Pool>,
    private readonly wrapper: AssetWrapper,
  ) {}

  get baseAsset(): string {
    return this.wrapper.address;
  }

  /**
   * Returns the native amount spent. The caller must already hold at least
   * `order.budget` of native funds.
   */
  async executeSwap(order: SwapOrder): Promise<bigint> {
    const { pool, reserveIn, reserveOut, inputIsToken0 } = await this.oracle.getReserves(
      this.baseAsset,
      order.tokenOut,
    );
    const amountIn = ConstantProduct.getAmountIn(order.desiredOutput, reserveIn, reserveOut);
    if (amountIn > order.budget) {
      throw new SettlementError(
        "InsufficientInputAmount",
        `swap needs ${amountIn}, only ${order.budget} available`,
      );
    }

    await this.wrapper.wrap(amountIn);
    if (!(await this.wrapper.transfer(pool.address, amountIn))) {
      throw new SettlementError("TransferFailed", `wrapped transfer to ${pool.address}`);
    }

    const [amount0Out, amount1Out] = inputIsToken0
      ? [0n, order.desiredOutput]
      : [order.desiredOutput, 0n];
    await pool.exchange(amount0Out, amount1Out, order.recipient, Constants.EMPTY_PAYLOAD);

    return amountIn;
  }
}
