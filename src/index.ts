export { DirectZap } from "./DirectZap";
export type {
  DirectZapDeps,
  SettlementResult,
  SwapAndDepositRequest,
  SwapRequest,
  ZapEvent,
  ZapListener,
} from "./DirectZap";
export { SettlementError, isSettlementError } from "./errors";
export type { SettlementErrorKind } from "./errors";
export { default as ConstantProduct } from "./logic/ConstantProduct";
export { QuoteService } from "./QuoteService";
export type { Quote } from "./QuoteService";
export { ReserveOracle } from "./ReserveOracle";
export { SwapExecutor } from "./SwapExecutor";
export { PairState } from "./PairState";
export { V2FactoryReader } from "./readers/V2FactoryReader";
export { V2PairReader } from "./readers/V2PairReader";
export { ChainConfig } from "./lib/ChainConfig";
export * from "./types";
