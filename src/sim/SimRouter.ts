import ConstantProduct from "../logic/ConstantProduct";
import Helpers from "../lib/Helpers";
import { DepositParams, DepositResult, DepositRouter } from "../types";
import { SimChain } from "./SimChain";
import { SimFactory } from "./SimFactory";
import { SimWrappedNative } from "./SimWrappedNative";

/**
 * Liquidity router for token/native pairs. Deposits at the pair's current ratio,
 * creating the pair on first use, and sends unused native funds back.
 */
export class SimRouter {
  public readonly address: string;

  constructor(
    private readonly chain: SimChain,
    private readonly factory: SimFactory,
    private readonly wrapped: SimWrappedNative,
  ) {
    this.address = chain.newAddress();
  }

  /** Native funds for `params.baseAmount` must already be held by the router. */
  addLiquidityNative(sender: string, params: DepositParams): DepositResult {
    if (params.deadline < this.chain.timestamp) throw new Error("SimRouter: EXPIRED");

    const token = this.chain.tokenAt(params.token);
    const pair =
      this.factory.getPair(token.address, this.wrapped.address) ??
      this.factory.createPair(token, this.wrapped);
    const tokenIs0 = Helpers.sameAddress(pair.token0.address, token.address);
    const reserveToken = tokenIs0 ? pair.reserve0 : pair.reserve1;
    const reserveBase = tokenIs0 ? pair.reserve1 : pair.reserve0;

    let tokenUsed = params.tokenAmount;
    let baseUsed = params.baseAmount;
    if (reserveToken !== 0n || reserveBase !== 0n) {
      const baseOptimal = ConstantProduct.quote(params.tokenAmount, reserveToken, reserveBase);
      if (baseOptimal <= params.baseAmount) {
        if (baseOptimal < params.minBase) throw new Error("SimRouter: INSUFFICIENT_B_AMOUNT");
        baseUsed = baseOptimal;
      } else {
        const tokenOptimal = ConstantProduct.quote(params.baseAmount, reserveBase, reserveToken);
        Helpers.assert(tokenOptimal <= params.tokenAmount, "SimRouter: token optimum exceeds desired");
        if (tokenOptimal < params.minToken) throw new Error("SimRouter: INSUFFICIENT_A_AMOUNT");
        tokenUsed = tokenOptimal;
      }
    }

    if (!token.transferFrom(this.address, sender, pair.address, tokenUsed)) {
      throw new Error("SimRouter: TRANSFER_FROM_FAILED");
    }
    this.wrapped.deposit(this.address, baseUsed);
    if (!this.wrapped.transfer(this.address, pair.address, baseUsed)) {
      throw new Error("SimRouter: wrapped transfer failed");
    }
    const liquidity = pair.mintLiquidity(params.recipient);

    const dust = params.baseAmount - baseUsed;
    if (dust > 0n && !this.chain.moveNative(this.address, sender, dust)) {
      throw new Error("SimRouter: native refund failed");
    }
    return { tokenUsed, baseUsed, liquidity };
  }

  connect(sender: string): DepositRouter {
    return {
      address: this.address,
      depositTokenAndBase: async (params) => {
        if (!this.chain.moveNative(sender, this.address, params.baseAmount)) {
          throw new Error("SimRouter: insufficient native value");
        }
        return this.addLiquidityNative(sender, params);
      },
    };
  }
}
