import { expect } from "chai";
import { ContractRunner, Interface, TransactionRequest, ZeroAddress } from "ethers";
import { PairState } from "../src/PairState";
import { ChainConfig } from "../src/lib/ChainConfig";
import { V2FactoryReader, V2_FACTORY_ABI } from "../src/readers/V2FactoryReader";
import { V2PairReader, V2_PAIR_ABI } from "../src/readers/V2PairReader";
import { expectSettlementError } from "./helpers";

const FACTORY = "0x0000000000000000000000000000000000000f01";
const PAIR = "0x0000000000000000000000000000000000000c01";
const WRAPPED = "0x0000000000000000000000000000000000000a01";
const TOKEN = "0x0000000000000000000000000000000000000b01";
const OTHER = "0x0000000000000000000000000000000000000d01";

type Handler = (name: string, args: unknown[]) => unknown[];

/** Answers eth_call in process by decoding calldata against a mounted ABI. */
class FakeRunner implements ContractRunner {
  public readonly provider = null;
  private readonly contracts = new Map<string, { iface: Interface; handle: Handler }>();

  mount(address: string, abi: string[], handle: Handler): void {
    this.contracts.set(address.toLowerCase(), { iface: new Interface(abi), handle });
  }

  async call(tx: TransactionRequest): Promise<string> {
    if (typeof tx.to !== "string" || typeof tx.data !== "string") {
      throw new Error("FakeRunner: unresolved call");
    }
    const target = this.contracts.get(tx.to.toLowerCase());
    if (!target) throw new Error(`FakeRunner: no code at ${tx.to}`);
    const parsed = target.iface.parseTransaction({ data: tx.data });
    if (!parsed) throw new Error("FakeRunner: unknown selector");
    return target.iface.encodeFunctionResult(parsed.fragment, target.handle(parsed.name, parsed.args.toArray()));
  }
}

function liveChain(): FakeRunner {
  const runner = new FakeRunner();
  runner.mount(FACTORY, V2_FACTORY_ABI, (name, args) => {
    if (name === "allPairsLength") return [1n];
    const assets = args.map((a) => String(a).toLowerCase());
    return [assets.includes(WRAPPED) && assets.includes(TOKEN) ? PAIR : ZeroAddress];
  });
  runner.mount(PAIR, V2_PAIR_ABI, (name) => {
    switch (name) {
      case "token0":
        return [WRAPPED];
      case "token1":
        return [TOKEN];
      case "getReserves":
        return [20_000n, 10_000n, 1_700_000_000n];
      case "totalSupply":
        return [14_142n];
      default:
        throw new Error(`unexpected ${name}`);
    }
  });
  return runner;
}

describe("Chain readers", () => {
  let runner: FakeRunner;

  beforeEach(() => {
    runner = liveChain();
  });

  it("looks up pairs through the factory", async () => {
    const factory = new V2FactoryReader(FACTORY, runner);
    const pair = await factory.lookupPool(TOKEN, WRAPPED);
    expect(pair?.address.toLowerCase()).to.equal(PAIR);
    expect(await factory.lookupPool(OTHER, WRAPPED)).to.equal(null);
    expect(await factory.getPairCount()).to.equal(1);
  });

  it("reads reserves and slot order from the pair", async () => {
    const pair = new V2PairReader(PAIR, runner);
    expect((await pair.primaryAsset()).toLowerCase()).to.equal(WRAPPED);
    expect((await pair.secondaryAsset()).toLowerCase()).to.equal(TOKEN);
    expect(await pair.reserves()).to.deep.equal({
      reserve0: 20_000n,
      reserve1: 10_000n,
      blockTimestampLast: 1_700_000_000n,
    });
    expect(await pair.getTotalSupply()).to.equal(14_142n);
  });

  describe("PairState", () => {
    let state: PairState;

    beforeEach(() => {
      state = new PairState({ factory: FACTORY, wrappedNative: WRAPPED }, runner);
    });

    it("quotes against live reserves", async () => {
      // 20000 * 100 * 1000 / (9900 * 997) = 202.6..
      expect(await state.quotes.quoteRequiredInput(100n, TOKEN)).to.equal(203n);
      expect(await state.quotes.quoteTotalFundsNeeded(100n, TOKEN, 1_000n)).to.equal(1_203n);
    });

    it("keeps the last synced snapshot", async () => {
      expect(state.lastFetchedData).to.equal(null);
      const snapshot = await state.sync(TOKEN);
      expect(snapshot.pair.toLowerCase()).to.equal(PAIR);
      expect(snapshot.token0.toLowerCase()).to.equal(WRAPPED);
      expect(snapshot.reserve0).to.equal(20_000n);
      expect(snapshot.reserve1).to.equal(10_000n);
      expect(state.lastFetchedData).to.equal(snapshot);
    });

    it("reports missing pairs", async () => {
      expect(await state.pairExists(TOKEN)).to.equal(true);
      expect(await state.pairExists(OTHER)).to.equal(false);
      await expectSettlementError(state.quotes.quoteRequiredInput(100n, OTHER), "PairNotFound");
      await expectSettlementError(state.sync(OTHER), "PairNotFound");
    });
  });
});

describe("ChainConfig", () => {
  const keys = ["RPC_31337", "FACTORY_31337", "WRAPPED_NATIVE_31337"];

  afterEach(() => {
    for (const key of keys) delete process.env[key];
  });

  it("explains which variable is missing", () => {
    expect(() => ChainConfig.getRPCUrl(31337)).to.throw(
      "RPC_31337 not set in env. Add one as RPC_31337=<url>",
    );
    expect(ChainConfig.getOptionalRPCUrl(31337)).to.equal(undefined);
  });

  it("reads and checksums addresses", () => {
    process.env.FACTORY_31337 = FACTORY;
    process.env.WRAPPED_NATIVE_31337 = WRAPPED;
    const addresses = ChainConfig.getAddresses(31337);
    expect(addresses.factory.toLowerCase()).to.equal(FACTORY);
    expect(addresses.wrappedNative.toLowerCase()).to.equal(WRAPPED);
  });
});
