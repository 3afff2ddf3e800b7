import { FungibleToken } from "../types";
import { SimChain } from "./SimChain";

/**
 * Plain ERC-20 ledger. `transfer` reports failure with `false` instead of throwing,
 * like the tokens the zap has to guard against.
 */
export class SimToken {
  public readonly address: string;
  public totalSupply = 0n;

  protected readonly balances = new Map<string, bigint>();
  protected readonly allowances = new Map<string, bigint>();

  constructor(
    protected readonly chain: SimChain,
    public readonly symbol: string,
  ) {
    this.address = chain.newAddress();
    chain.addToken(this);
    chain.register(() => this.capture());
  }

  balanceOf(holder: string): bigint {
    return this.balances.get(SimChain.key(holder)) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(this.allowanceKey(owner, spender)) ?? 0n;
  }

  mint(to: string, amount: bigint): void {
    this.balances.set(SimChain.key(to), this.balanceOf(to) + amount);
    this.totalSupply += amount;
  }

  burn(from: string, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) throw new Error(`${this.symbol}: burn exceeds balance`);
    this.balances.set(SimChain.key(from), balance - amount);
    this.totalSupply -= amount;
  }

  transfer(from: string, to: string, amount: bigint): boolean {
    const balance = this.balanceOf(from);
    if (amount < 0n || balance < amount) return false;
    this.balances.set(SimChain.key(from), balance - amount);
    this.balances.set(SimChain.key(to), this.balanceOf(to) + amount);
    return true;
  }

  approve(owner: string, spender: string, amount: bigint): boolean {
    this.allowances.set(this.allowanceKey(owner, spender), amount);
    return true;
  }

  transferFrom(spender: string, from: string, to: string, amount: bigint): boolean {
    const allowed = this.allowance(from, spender);
    if (allowed < amount) return false;
    if (!this.transfer(from, to, amount)) return false;
    this.allowances.set(this.allowanceKey(from, spender), allowed - amount);
    return true;
  }

  /** Handle acting as `sender`. */
  connect(sender: string): FungibleToken {
    return {
      address: this.address,
      transfer: async (to, amount) => this.transfer(sender, to, amount),
      approve: async (spender, amount) => this.approve(sender, spender, amount),
      balanceOf: async (holder) => this.balanceOf(holder),
    };
  }

  protected capture(): () => void {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    const totalSupply = this.totalSupply;
    return () => {
      this.balances.clear();
      for (const [k, v] of balances) this.balances.set(k, v);
      this.allowances.clear();
      for (const [k, v] of allowances) this.allowances.set(k, v);
      this.totalSupply = totalSupply;
    };
  }

  private allowanceKey(owner: string, spender: string): string {
    return `${SimChain.key(owner)}:${SimChain.key(spender)}`;
  }
}
