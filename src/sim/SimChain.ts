import { ethers } from "ethers";
import { CallContext, NativeLedger } from "../types";
import type { SimToken } from "./SimToken";

type Capture = () => () => void;

/**
 * In-process stand-in for an EVM host: native balances, a clock, a token
 * directory and an all-or-nothing transaction boundary.
 */
export class SimChain {
  public timestamp: bigint;

  private readonly native = new Map<string, bigint>();
  private readonly tokens = new Map<string, SimToken>();
  private readonly captures: Capture[] = [];
  private nextId = 0x1000n;

  constructor(timestamp = 1_700_000_000n) {
    this.timestamp = timestamp;
  }

  static key(address: string): string {
    return address.toLowerCase();
  }

  newAddress(): string {
    const address = ethers.zeroPadValue(ethers.toBeHex(this.nextId), 20);
    this.nextId += 1n;
    return address;
  }

  advance(seconds: bigint): void {
    this.timestamp += seconds;
  }

  /** Registers state that `transact` must roll back on failure. */
  register(capture: Capture): void {
    this.captures.push(capture);
  }

  addToken(token: SimToken): void {
    this.tokens.set(SimChain.key(token.address), token);
  }

  tokenAt(address: string): SimToken {
    const token = this.tokens.get(SimChain.key(address));
    if (!token) throw new Error(`SimChain: no token at ${address}`);
    return token;
  }

  nativeBalance(holder: string): bigint {
    return this.native.get(SimChain.key(holder)) ?? 0n;
  }

  deal(holder: string, amount: bigint): void {
    this.native.set(SimChain.key(holder), this.nativeBalance(holder) + amount);
  }

  moveNative(from: string, to: string, amount: bigint): boolean {
    if (amount < 0n || this.nativeBalance(from) < amount) return false;
    this.native.set(SimChain.key(from), this.nativeBalance(from) - amount);
    this.native.set(SimChain.key(to), this.nativeBalance(to) + amount);
    return true;
  }

  ledger(bound: string): NativeLedger {
    return {
      balanceOf: async (holder) => this.nativeBalance(holder),
      send: async (to, amount) => this.moveNative(bound, to, amount),
    };
  }

  /**
   * Runs `fn` as one transaction from `sender` to `to` carrying `value`.
   * Every registered ledger and the token directory are restored when `fn`
   * throws; tokens deployed inside the transaction are forgotten.
   */
  async transact<T>(
    sender: string,
    to: string,
    value: bigint,
    fn: (ctx: CallContext) => Promise<T>,
  ): Promise<T> {
    const restores = [
      this.captureNative(),
      this.captureDirectory(),
      ...this.captures.map((capture) => capture()),
    ];
    try {
      if (!this.moveNative(sender, to, value)) {
        throw new Error(`SimChain: ${sender} cannot pay ${value}`);
      }
      return await fn({ sender, value, timestamp: this.timestamp });
    } catch (e) {
      for (const restore of restores) restore();
      throw e;
    }
  }

  private captureDirectory(): () => void {
    const tokens = new Map(this.tokens);
    const registered = this.captures.length;
    return () => {
      this.tokens.clear();
      for (const [key, token] of tokens) this.tokens.set(key, token);
      this.captures.length = registered;
    };
  }

  private captureNative(): () => void {
    const saved = new Map(this.native);
    return () => {
      this.native.clear();
      for (const [holder, amount] of saved) this.native.set(holder, amount);
    };
  }
}
