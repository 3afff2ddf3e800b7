import { ContractRunner, JsonRpcProvider } from "ethers";
import { ChainAddresses, ChainConfig } from "./lib/ChainConfig";
import { QuoteService } from "./QuoteService";
import { ReserveOracle } from "./ReserveOracle";
import { V2FactoryReader } from "./readers/V2FactoryReader";
import { V2PairReader } from "./readers/V2PairReader";
import { PoolReserves } from "./types";

export interface PairSnapshot extends PoolReserves {
  pair: string;
  token0: string;
}

/**
 * PairState reads live token/native pairs from chain and prices exact-output
 * buys against them.
 */
export class PairState {
  public readonly factory: V2FactoryReader;
  public readonly quotes: QuoteService<V2PairReader>;
  private readonly oracle: ReserveOracle<V2PairReader>;
  private _lastFetchedData: PairSnapshot | null = null;

  constructor(addresses: ChainAddresses, runner: ContractRunner) {
    this.factory = new V2FactoryReader(addresses.factory, runner);
    this.oracle = new ReserveOracle(this.factory);
    this.quotes = new QuoteService(this.oracle, addresses.wrappedNative);
  }

  static fromRpcUrl(addresses: ChainAddresses, rpcUrl: string): PairState {
    return new PairState(addresses, new JsonRpcProvider(rpcUrl));
  }

  static fromChainId(chainId: number): PairState {
    return PairState.fromRpcUrl(ChainConfig.getAddresses(chainId), ChainConfig.getRPCUrl(chainId));
  }

  get baseAsset(): string {
    return this.quotes.baseAsset;
  }

  /**
   * Fetch the current reserves of the token/native pair
   */
  async sync(token: string): Promise<PairSnapshot> {
    const pool = await this.oracle.getPool(token, this.baseAsset);
    const [token0, reserves] = await Promise.all([pool.primaryAsset(), pool.reserves()]);
    this._lastFetchedData = { pair: pool.address, token0, ...reserves };
    return this._lastFetchedData;
  }

  async pairExists(token: string): Promise<boolean> {
    return this.oracle.hasPool(token, this.baseAsset);
  }

  /**
   * Get the last fetched pair data
   */
  get lastFetchedData(): PairSnapshot | null {
    return this._lastFetchedData;
  }
}
