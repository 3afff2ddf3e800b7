import ConstantProduct from "./logic/ConstantProduct";
import { ReserveOracle } from "./ReserveOracle";
import { PoolView } from "./types";
import { requireOutput, requireSecondaryDeposit, requireToken } from "./validation";

export interface Quote {
  readonly token: string;
  readonly desiredOutput: bigint;
  readonly requiredInput: bigint;
}

/**
 * Read-only pricing against current reserves. Nothing is cached: every call
 * reads the pair again.
 */
export class QuoteService<P extends PoolView = PoolView> {
  constructor(
    private readonly oracle: ReserveOracle<P>,
    public readonly baseAsset: string,
  ) {}

  async quote(desiredOutput: bigint, token: string): Promise<Quote> {
    requireOutput(desiredOutput);
    requireToken(token, this.baseAsset);
    return this.price(desiredOutput, token);
  }

  async quoteRequiredInput(desiredOutput: bigint, token: string): Promise<bigint> {
    return (await this.quote(desiredOutput, token)).requiredInput;
  }

  async quoteTotalFundsNeeded(
    desiredOutput: bigint,
    token: string,
    secondaryDeposit: bigint,
  ): Promise<bigint> {
    requireOutput(desiredOutput);
    requireToken(token, this.baseAsset);
    requireSecondaryDeposit(secondaryDeposit);
    const { requiredInput } = await this.price(desiredOutput, token);
    return requiredInput + secondaryDeposit;
  }

  private async price(desiredOutput: bigint, token: string): Promise<Quote> {
    const { reserveIn, reserveOut } = await this.oracle.getReserves(this.baseAsset, token);
    const requiredInput = ConstantProduct.getAmountIn(desiredOutput, reserveIn, reserveOut);
    return Object.freeze({ token, desiredOutput, requiredInput });
  }
}
