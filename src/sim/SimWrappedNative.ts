import { AssetWrapper } from "../types";
import { SimChain } from "./SimChain";
import { SimToken } from "./SimToken";

export class SimWrappedNative extends SimToken {
  constructor(chain: SimChain, symbol = "WETH") {
    super(chain, symbol);
  }

  deposit(sender: string, amount: bigint): void {
    if (!this.chain.moveNative(sender, this.address, amount)) {
      throw new Error(`${this.symbol}: deposit exceeds native balance`);
    }
    this.mint(sender, amount);
  }

  withdraw(sender: string, amount: bigint): void {
    this.burn(sender, amount);
    if (!this.chain.moveNative(this.address, sender, amount)) {
      throw new Error(`${this.symbol}: native transfer failed`);
    }
  }

  override connect(sender: string): AssetWrapper {
    return {
      ...super.connect(sender),
      wrap: async (amount) => this.deposit(sender, amount),
      unwrap: async (amount) => this.withdraw(sender, amount),
    };
  }
}
