import Helpers from "../lib/Helpers";
import { Pool, PoolRegistry } from "../types";
import { SimChain } from "./SimChain";
import { SimPair } from "./SimPair";
import { SimToken } from "./SimToken";

export class SimFactory {
  public readonly address: string;
  private readonly pairs = new Map<string, SimPair>();

  constructor(private readonly chain: SimChain) {
    this.address = chain.newAddress();
    chain.register(() => {
      const saved = new Map(this.pairs);
      return () => {
        this.pairs.clear();
        for (const [k, v] of saved) this.pairs.set(k, v);
      };
    });
  }

  getPair(assetA: string, assetB: string): SimPair | undefined {
    if (Helpers.sameAddress(assetA, assetB)) return undefined;
    return this.pairs.get(SimFactory.pairKey(assetA, assetB));
  }

  createPair(tokenA: SimToken, tokenB: SimToken): SimPair {
    if (this.getPair(tokenA.address, tokenB.address)) {
      throw new Error("SimFactory: PAIR_EXISTS");
    }
    const pair = new SimPair(this.chain, tokenA, tokenB);
    this.pairs.set(SimFactory.pairKey(tokenA.address, tokenB.address), pair);
    return pair;
  }

  /** Registry whose pool handles act as `sender`. */
  registry(sender: string): PoolRegistry<Pool> {
    return {
      lookupPool: async (assetA, assetB) => this.getPair(assetA, assetB)?.connect(sender) ?? null,
    };
  }

  private static pairKey(assetA: string, assetB: string): string {
    const [token0, token1] = Helpers.sortAssets(assetA, assetB);
    return `${SimChain.key(token0)}:${SimChain.key(token1)}`;
  }
}
