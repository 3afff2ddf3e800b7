import { Contract, ContractRunner, JsonRpcProvider } from "ethers";
import { PoolReserves, PoolView } from "../types";

export const V2_PAIR_ABI = [
  "function token0() view returns (address)",
  "function token1() view returns (address)",
  "function getReserves() view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)",
  "function totalSupply() view returns (uint256)",
];

/**
 * Read-only view of an on-chain constant-product pair.
 */
export class V2PairReader implements PoolView {
  private contract: Contract;
  public readonly address: string;

  constructor(pairAddress: string, runner: ContractRunner) {
    this.address = pairAddress;
    this.contract = new Contract(pairAddress, V2_PAIR_ABI, runner);
  }

  static fromRpcUrl(pairAddress: string, rpcUrl: string): V2PairReader {
    return new V2PairReader(pairAddress, new JsonRpcProvider(rpcUrl));
  }

  async primaryAsset(): Promise<string> {
    return await this.contract.token0();
  }

  async secondaryAsset(): Promise<string> {
    return await this.contract.token1();
  }

  async reserves(): Promise<PoolReserves> {
    const [reserve0, reserve1, blockTimestampLast] = await this.contract.getReserves();
    return { reserve0, reserve1, blockTimestampLast };
  }

  /**
   * Total liquidity units in circulation
   */
  async getTotalSupply(): Promise<bigint> {
    return await this.contract.totalSupply();
  }
}
