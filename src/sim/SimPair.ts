import Constants from "../lib/Constants";
import Helpers from "../lib/Helpers";
import { Pool, PoolReserves } from "../types";
import { SimChain } from "./SimChain";
import { SimToken } from "./SimToken";

const FEE_REMAINDER = Constants.FEE_DENOMINATOR - Constants.FEE_NUMERATOR;

/**
 * Two-asset constant-product pair. The pair is its own liquidity token; swaps are
 * paid for up front by transferring the input to the pair before calling `swap`.
 */
export class SimPair extends SimToken {
  public readonly token0: SimToken;
  public readonly token1: SimToken;
  public reserve0 = 0n;
  public reserve1 = 0n;
  public blockTimestampLast = 0n;

  constructor(chain: SimChain, tokenA: SimToken, tokenB: SimToken) {
    super(chain, `LP-${tokenA.symbol}-${tokenB.symbol}`);
    const [first] = Helpers.sortAssets(tokenA.address, tokenB.address);
    const aFirst = Helpers.sameAddress(first, tokenA.address);
    this.token0 = aFirst ? tokenA : tokenB;
    this.token1 = aFirst ? tokenB : tokenA;
  }

  getReserves(): PoolReserves {
    return {
      reserve0: this.reserve0,
      reserve1: this.reserve1,
      blockTimestampLast: this.blockTimestampLast,
    };
  }

  /** Mints liquidity for whatever was transferred in since the last update. */
  mintLiquidity(to: string): bigint {
    const balance0 = this.token0.balanceOf(this.address);
    const balance1 = this.token1.balanceOf(this.address);
    const amount0 = balance0 - this.reserve0;
    const amount1 = balance1 - this.reserve1;

    let liquidity: bigint;
    if (this.totalSupply === 0n) {
      liquidity = Helpers.sqrt(amount0 * amount1) - Constants.MINIMUM_LIQUIDITY;
      this.mint(Constants.ZERO_ADDRESS, Constants.MINIMUM_LIQUIDITY);
    } else {
      const by0 = (amount0 * this.totalSupply) / this.reserve0;
      const by1 = (amount1 * this.totalSupply) / this.reserve1;
      liquidity = by0 < by1 ? by0 : by1;
    }
    if (liquidity <= 0n) throw new Error("SimPair: INSUFFICIENT_LIQUIDITY_MINTED");

    this.mint(to, liquidity);
    this.update(balance0, balance1);
    return liquidity;
  }

  swap(amount0Out: bigint, amount1Out: bigint, to: string, data: string): void {
    if (amount0Out <= 0n && amount1Out <= 0n) throw new Error("SimPair: INSUFFICIENT_OUTPUT_AMOUNT");
    if (amount0Out >= this.reserve0 || amount1Out >= this.reserve1) {
      throw new Error("SimPair: INSUFFICIENT_LIQUIDITY");
    }
    if (Helpers.sameAddress(to, this.token0.address) || Helpers.sameAddress(to, this.token1.address)) {
      throw new Error("SimPair: INVALID_TO");
    }
    if (data !== Constants.EMPTY_PAYLOAD) throw new Error("SimPair: callbacks unsupported");

    if (amount0Out > 0n) this.pay(this.token0, to, amount0Out);
    if (amount1Out > 0n) this.pay(this.token1, to, amount1Out);

    const balance0 = this.token0.balanceOf(this.address);
    const balance1 = this.token1.balanceOf(this.address);
    const kept0 = this.reserve0 - amount0Out;
    const kept1 = this.reserve1 - amount1Out;
    const amount0In = balance0 > kept0 ? balance0 - kept0 : 0n;
    const amount1In = balance1 > kept1 ? balance1 - kept1 : 0n;
    if (amount0In <= 0n && amount1In <= 0n) throw new Error("SimPair: INSUFFICIENT_INPUT_AMOUNT");

    const adjusted0 = balance0 * Constants.FEE_DENOMINATOR - amount0In * FEE_REMAINDER;
    const adjusted1 = balance1 * Constants.FEE_DENOMINATOR - amount1In * FEE_REMAINDER;
    if (adjusted0 * adjusted1 < this.reserve0 * this.reserve1 * Constants.FEE_DENOMINATOR ** 2n) {
      throw new Error("SimPair: K");
    }

    this.update(balance0, balance1);
  }

  override connect(sender: string): Pool {
    return {
      ...super.connect(sender),
      primaryAsset: async () => this.token0.address,
      reserves: async () => this.getReserves(),
      exchange: async (amount0Out, amount1Out, recipient, data) =>
        this.swap(amount0Out, amount1Out, recipient, data),
    };
  }

  protected override capture(): () => void {
    const restoreLedger = super.capture();
    const { reserve0, reserve1, blockTimestampLast } = this;
    return () => {
      restoreLedger();
      this.reserve0 = reserve0;
      this.reserve1 = reserve1;
      this.blockTimestampLast = blockTimestampLast;
    };
  }

  private pay(token: SimToken, to: string, amount: bigint): void {
    if (!token.transfer(this.address, to, amount)) throw new Error("SimPair: TRANSFER_FAILED");
  }

  private update(balance0: bigint, balance1: bigint): void {
    this.reserve0 = balance0;
    this.reserve1 = balance1;
    this.blockTimestampLast = this.chain.timestamp;
  }
}
