import { SettlementError } from "./errors";
import Helpers from "./lib/Helpers";
import { PoolRegistry, PoolView } from "./types";

export interface OrderedReserves<P extends PoolView> {
  pool: P;
  reserveIn: bigint;
  reserveOut: bigint;
  inputIsToken0: boolean;
}

/**
 * Reads a pair's reserves and orders them by trade direction.
 */
export class ReserveOracle<P extends PoolView> {
  constructor(private readonly registry: PoolRegistry<P>) {}

  async getPool(assetA: string, assetB: string): Promise<P> {
    const pool = await this.registry.lookupPool(assetA, assetB);
    if (!pool) {
      throw new SettlementError("PairNotFound", `no pair for ${assetA}/${assetB}`);
    }
    return pool;
  }

  async hasPool(assetA: string, assetB: string): Promise<boolean> {
    return (await this.registry.lookupPool(assetA, assetB)) !== null;
  }

  async getReserves(assetIn: string, assetOut: string): Promise<OrderedReserves<P>> {
    const pool = await this.getPool(assetIn, assetOut);
    const [primary, { reserve0, reserve1 }] = await Promise.all([
      pool.primaryAsset(),
      pool.reserves(),
    ]);

    const inputIsToken0 = Helpers.sameAddress(primary, assetIn);
    Helpers.assert(
      inputIsToken0 || Helpers.sameAddress(primary, assetOut),
      `pair ${pool.address} does not hold ${assetIn}/${assetOut}`,
    );

    return inputIsToken0
      ? { pool, reserveIn: reserve0, reserveOut: reserve1, inputIsToken0 }
      : { pool, reserveIn: reserve1, reserveOut: reserve0, inputIsToken0 };
  }
}
