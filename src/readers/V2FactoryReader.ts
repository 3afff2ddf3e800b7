import { Contract, ContractRunner, JsonRpcProvider, ZeroAddress } from "ethers";
import { PoolRegistry } from "../types";
import { V2PairReader } from "./V2PairReader";

export const V2_FACTORY_ABI = [
  "function getPair(address tokenA, address tokenB) view returns (address pair)",
  "function allPairsLength() view returns (uint256)",
];

export class V2FactoryReader implements PoolRegistry<V2PairReader> {
  private contract: Contract;
  public readonly address: string;

  constructor(factoryAddress: string, private readonly runner: ContractRunner) {
    this.address = factoryAddress;
    this.contract = new Contract(factoryAddress, V2_FACTORY_ABI, runner);
  }

  static fromRpcUrl(factoryAddress: string, rpcUrl: string): V2FactoryReader {
    return new V2FactoryReader(factoryAddress, new JsonRpcProvider(rpcUrl));
  }

  /**
   * Pair address for two assets, or the zero address when none was created
   */
  async getPair(assetA: string, assetB: string): Promise<string> {
    return await this.contract.getPair(assetA, assetB);
  }

  async getPairCount(): Promise<number> {
    const n = await this.contract.allPairsLength();
    return Number(n);
  }

  async lookupPool(assetA: string, assetB: string): Promise<V2PairReader | null> {
    const pair = await this.getPair(assetA, assetB);
    if (pair === ZeroAddress) return null;
    return new V2PairReader(pair, this.runner);
  }
}
