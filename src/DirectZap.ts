import Helpers from "./lib/Helpers";
import { SettlementError } from "./errors";
import { QuoteService } from "./QuoteService";
import { ReserveOracle } from "./ReserveOracle";
import { SwapExecutor } from "./SwapExecutor";
import {
  AssetWrapper,
  CallContext,
  DepositRouter,
  Logger,
  NativeLedger,
  Pool,
  PoolRegistry,
  TokenResolver,
} from "./types";
import {
  requireDeadline,
  requireOutput,
  requireSecondaryDeposit,
  requireToken,
} from "./validation";

export interface DirectZapDeps {
  /** address the zap's balances live under; every handle below is bound to it */
  address: string;
  owner: string;
  registry: PoolRegistry<Pool>;
  wrapper: AssetWrapper;
  router: DepositRouter;
  native: NativeLedger;
  tokenAt: TokenResolver;
  logger?: Logger;
}

export interface SwapRequest {
  token: string;
  desiredOutput: bigint;
  deadline: bigint;
}

export interface SwapAndDepositRequest extends SwapRequest {
  secondaryDeposit: bigint;
  minTokenDeposit: bigint;
  minBaseDeposit: bigint;
}

export interface SettlementResult {
  baseSpent: bigint;
  tokenDeposited: bigint;
  baseDeposited: bigint;
  liquidityReceived: bigint;
}

export type ZapEvent =
  | { type: "SwapExecuted"; caller: string; token: string; amountSpent: bigint; amountOut: bigint }
  | {
      type: "LiquidityAdded";
      caller: string;
      token: string;
      tokenDeposited: bigint;
      baseDeposited: bigint;
      liquidity: bigint;
    };

export type ZapListener = (event: ZapEvent) => void;

/**
 * Buys an exact amount of a token with native funds straight from its pair and
 * optionally deposits it back as liquidity together with more native funds.
 *
 * Funds attached to a call are expected to be credited to `address` by the host
 * before the call runs; whatever is not spent is refunded before it returns. The
 * host is also responsible for discarding every effect when a call throws.
 */
export class DirectZap {
  public readonly address: string;
  public readonly owner: string;
  public readonly quotes: QuoteService<Pool>;

  private readonly oracle: ReserveOracle<Pool>;
  private readonly executor: SwapExecutor;
  private readonly deps: DirectZapDeps;
  private readonly logger: Logger;
  private readonly listeners = new Set<ZapListener>();
  private readonly _events: ZapEvent[] = [];
  private busy = false;

  constructor(deps: DirectZapDeps) {
    this.deps = deps;
    this.address = deps.address;
    this.owner = deps.owner;
    this.logger = deps.logger ?? console;
    this.oracle = new ReserveOracle(deps.registry);
    this.executor = new SwapExecutor(this.oracle, deps.wrapper);
    this.quotes = new QuoteService(this.oracle, deps.wrapper.address);
  }

  get baseAsset(): string {
    return this.deps.wrapper.address;
  }

  get events(): readonly ZapEvent[] {
    return this._events;
  }

  on(listener: ZapListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async pairExists(token: string): Promise<boolean> {
    return this.oracle.hasPool(token, this.baseAsset);
  }

  quoteRequiredInput(desiredOutput: bigint, token: string): Promise<bigint> {
    return this.quotes.quoteRequiredInput(desiredOutput, token);
  }

  quoteTotalFundsNeeded(desiredOutput: bigint, token: string, secondaryDeposit: bigint): Promise<bigint> {
    return this.quotes.quoteTotalFundsNeeded(desiredOutput, token, secondaryDeposit);
  }

  /**
   * Buys exactly `desiredOutput` of `token` for the caller and refunds the unspent funds.
   */
  async swapExactOut(request: SwapRequest, ctx: CallContext): Promise<SettlementResult> {
    return this.nonReentrant(async (emit) => {
      requireDeadline(request.deadline, ctx.timestamp);
      requireOutput(request.desiredOutput);
      requireToken(request.token, this.baseAsset);

      const amountSpent = await this.executor.executeSwap({
        tokenOut: request.token,
        desiredOutput: request.desiredOutput,
        recipient: ctx.sender,
        budget: ctx.value,
      });
      await this.refund(ctx.sender, ctx.value - amountSpent);

      emit({
        type: "SwapExecuted",
        caller: ctx.sender,
        token: request.token,
        amountSpent,
        amountOut: request.desiredOutput,
      });
      this.logger.log(
        `[DirectZap] swap ${ctx.sender}: ${amountSpent} base -> ${request.desiredOutput} of ${request.token}`,
      );

      return { baseSpent: amountSpent, tokenDeposited: 0n, baseDeposited: 0n, liquidityReceived: 0n };
    });
  }

  /**
   * Buys exactly `desiredOutput` of `token`, then deposits it with `secondaryDeposit`
   * of native funds through the router. Liquidity goes to the caller, as do any
   * tokens and native funds the router did not take.
   */
  async swapAndAddLiquidity(request: SwapAndDepositRequest, ctx: CallContext): Promise<SettlementResult> {
    return this.nonReentrant(async (emit) => {
      requireDeadline(request.deadline, ctx.timestamp);
      requireOutput(request.desiredOutput);
      requireToken(request.token, this.baseAsset);
      requireSecondaryDeposit(request.secondaryDeposit);

      // tokens must sit with the zap before the router can pull them
      const amountSpent = await this.executor.executeSwap({
        tokenOut: request.token,
        desiredOutput: request.desiredOutput,
        recipient: this.address,
        budget: ctx.value - request.secondaryDeposit,
      });

      const token = this.deps.tokenAt(request.token);
      if (!(await token.approve(this.deps.router.address, request.desiredOutput))) {
        throw new SettlementError("TransferFailed", `approve ${request.token} for router`);
      }

      const deposit = await this.deps.router.depositTokenAndBase({
        token: request.token,
        tokenAmount: request.desiredOutput,
        baseAmount: request.secondaryDeposit,
        minToken: request.minTokenDeposit,
        minBase: request.minBaseDeposit,
        recipient: ctx.sender,
        deadline: request.deadline,
      });
      Helpers.assert(
        deposit.tokenUsed <= request.desiredOutput && deposit.baseUsed <= request.secondaryDeposit,
        "router used more than it was given",
      );

      const tokenLeftover = request.desiredOutput - deposit.tokenUsed;
      if (tokenLeftover > 0n && !(await token.transfer(ctx.sender, tokenLeftover))) {
        throw new SettlementError("TransferFailed", `return ${tokenLeftover} of ${request.token}`);
      }
      await this.refund(ctx.sender, ctx.value - amountSpent - deposit.baseUsed);

      emit({
        type: "SwapExecuted",
        caller: ctx.sender,
        token: request.token,
        amountSpent,
        amountOut: request.desiredOutput,
      });
      emit({
        type: "LiquidityAdded",
        caller: ctx.sender,
        token: request.token,
        tokenDeposited: deposit.tokenUsed,
        baseDeposited: deposit.baseUsed,
        liquidity: deposit.liquidity,
      });
      this.logger.log(
        `[DirectZap] zap ${ctx.sender}: ${amountSpent} base swapped, deposited ${deposit.tokenUsed} token + ${deposit.baseUsed} base for ${deposit.liquidity} LP`,
      );

      return {
        baseSpent: amountSpent,
        tokenDeposited: deposit.tokenUsed,
        baseDeposited: deposit.baseUsed,
        liquidityReceived: deposit.liquidity,
      };
    });
  }

  /**
   * Sends tokens stuck at the zap to the owner. The wrapped base asset is never recoverable.
   */
  async recoverAsset(tokenAddress: string, amount: bigint, ctx: CallContext): Promise<void> {
    return this.nonReentrant(async () => {
      if (!Helpers.sameAddress(ctx.sender, this.owner)) {
        throw new SettlementError("Unauthorized", `${ctx.sender} is not the owner`);
      }
      requireToken(tokenAddress, this.baseAsset);

      if (!(await this.deps.tokenAt(tokenAddress).transfer(this.owner, amount))) {
        throw new SettlementError("TransferFailed", `recover ${amount} of ${tokenAddress}`);
      }
      this.logger.warn(`[DirectZap] recovered ${amount} of ${tokenAddress} to ${this.owner}`);
    });
  }

  /**
   * Runs `body` under the reentrancy guard. Events it emits are recorded and
   * handed to listeners only once it has returned.
   */
  private async nonReentrant<T>(body: (emit: (event: ZapEvent) => void) => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new SettlementError("UnexpectedReentry", "an operation is already in progress");
    }
    this.busy = true;
    const pending: ZapEvent[] = [];
    let result: T;
    try {
      result = await body((event) => {
        pending.push(event);
      });
    } finally {
      this.busy = false;
    }
    this.publish(pending);
    return result;
  }

  private async refund(to: string, amount: bigint): Promise<void> {
    Helpers.assert(amount >= 0n, "refund: negative amount");
    if (amount === 0n) return;
    if (!(await this.deps.native.send(to, amount))) {
      throw new SettlementError("TransferFailed", `refund ${amount} to ${to}`);
    }
  }

  private publish(events: readonly ZapEvent[]): void {
    this._events.push(...events);
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (e) {
          const reason = e instanceof Error ? e.message : String(e);
          this.logger.warn(`[DirectZap] ${event.type} listener failed: ${reason}`);
        }
      }
    }
  }
}
