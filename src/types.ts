/**
 * Collaborator contracts consumed by the settlement core.
 *
 * Handles are bound to a caller: a token handle given to `DirectZap` moves the
 * zap's own balance, the same way an ethers `Contract` connected to a signer does.
 */

export interface CallContext {
  sender: string;
  /** native funds attached to the call, already credited to the callee */
  value: bigint;
  timestamp: bigint;
}

export interface PoolReserves {
  reserve0: bigint;
  reserve1: bigint;
  blockTimestampLast: bigint;
}

export interface PoolView {
  readonly address: string;
  /** slot-0 asset of the pair */
  primaryAsset(): Promise<string>;
  reserves(): Promise<PoolReserves>;
}

export interface FungibleToken {
  readonly address: string;
  transfer(to: string, amount: bigint): Promise<boolean>;
  approve(spender: string, amount: bigint): Promise<boolean>;
  balanceOf(holder: string): Promise<bigint>;
}

export interface Pool extends PoolView, FungibleToken {
  exchange(amount0Out: bigint, amount1Out: bigint, recipient: string, data: string): Promise<void>;
}

export interface PoolRegistry<P extends PoolView = Pool> {
  lookupPool(assetA: string, assetB: string): Promise<P | null>;
}

export interface AssetWrapper extends FungibleToken {
  /** payable: converts `amount` of the bound caller's native funds */
  wrap(amount: bigint): Promise<void>;
  unwrap(amount: bigint): Promise<void>;
}

export interface DepositParams {
  token: string;
  tokenAmount: bigint;
  baseAmount: bigint;
  minToken: bigint;
  minBase: bigint;
  recipient: string;
  deadline: bigint;
}

export interface DepositResult {
  tokenUsed: bigint;
  baseUsed: bigint;
  liquidity: bigint;
}

export interface DepositRouter {
  readonly address: string;
  /** payable: `params.baseAmount` of native funds is attached and unused funds come back to the caller */
  depositTokenAndBase(params: DepositParams): Promise<DepositResult>;
}

export interface NativeLedger {
  balanceOf(holder: string): Promise<bigint>;
  send(to: string, amount: bigint): Promise<boolean>;
}

export type TokenResolver = (address: string) => FungibleToken;

export type Logger = Pick<Console, "log" | "warn">;
