import { DirectZap } from "../DirectZap";
import { Logger } from "../types";
import { SimChain } from "./SimChain";
import { SimFactory } from "./SimFactory";
import { SimPair } from "./SimPair";
import { SimRouter } from "./SimRouter";
import { SimToken } from "./SimToken";
import { SimWrappedNative } from "./SimWrappedNative";

export { SimChain, SimFactory, SimPair, SimRouter, SimToken, SimWrappedNative };

export interface SimDeployment {
  chain: SimChain;
  wrapped: SimWrappedNative;
  factory: SimFactory;
  router: SimRouter;
  zap: DirectZap;
}

/**
 * Deploys wrapper, factory, router and a zap owned by `owner` on a fresh chain.
 */
export function deploySimZap(owner: string, logger?: Logger, chain = new SimChain()): SimDeployment {
  const wrapped = new SimWrappedNative(chain);
  const factory = new SimFactory(chain);
  const router = new SimRouter(chain, factory, wrapped);
  const address = chain.newAddress();

  const zap = new DirectZap({
    address,
    owner,
    registry: factory.registry(address),
    wrapper: wrapped.connect(address),
    router: router.connect(address),
    native: chain.ledger(address),
    tokenAt: (token) => chain.tokenAt(token).connect(address),
    logger,
  });

  return { chain, wrapped, factory, router, zap };
}

/**
 * Seeds the token/native pair through the router on behalf of `provider`,
 * minting the token and dealing the native funds first.
 */
export async function seedPair(
  deployment: SimDeployment,
  token: SimToken,
  provider: string,
  tokenAmount: bigint,
  baseAmount: bigint,
): Promise<SimPair> {
  const { chain, router, factory, wrapped } = deployment;
  token.mint(provider, tokenAmount);
  chain.deal(provider, baseAmount);
  token.approve(provider, router.address, tokenAmount);

  await chain.transact(provider, provider, 0n, () =>
    router.connect(provider).depositTokenAndBase({
      token: token.address,
      tokenAmount,
      baseAmount,
      minToken: 0n,
      minBase: 0n,
      recipient: provider,
      deadline: chain.timestamp,
    }),
  );

  const pair = factory.getPair(token.address, wrapped.address);
  if (!pair) throw new Error("seedPair: pair was not created");
  return pair;
}
