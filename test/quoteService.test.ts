import { expect } from "chai";
import { ethers } from "ethers";
import { SimDeployment, SimToken, deploySimZap, seedPair } from "../src/sim";
import { expectSettlementError, silent } from "./helpers";

const OWNER = "0x00000000000000000000000000000000000000f0";
const ALICE = "0x0000000000000000000000000000000000a11ce0";
const LP = "0x00000000000000000000000000000000000001b0";

describe("QuoteService", () => {
  let dep: SimDeployment;
  let token: SimToken;

  beforeEach(async () => {
    dep = deploySimZap(OWNER, silent);
    token = new SimToken(dep.chain, "TKN");
    await seedPair(dep, token, LP, 10_000n, 10_000n);
  });

  it("quotes the input an exact output needs", async () => {
    expect(await dep.zap.quoteRequiredInput(100n, token.address)).to.equal(102n);

    const quote = await dep.zap.quotes.quote(100n, token.address);
    expect(quote).to.deep.equal({ token: token.address, desiredOutput: 100n, requiredInput: 102n });
    expect(Object.isFrozen(quote)).to.equal(true);
  });

  it("adds the secondary deposit to the total", async () => {
    expect(await dep.zap.quoteTotalFundsNeeded(100n, token.address, 200n)).to.equal(302n);
    for (const out of [1n, 17n, 2_500n, 9_999n]) {
      for (const deposit of [1n, 333n, ethers.parseEther("1")]) {
        const total = await dep.zap.quoteTotalFundsNeeded(out, token.address, deposit);
        expect(total).to.equal((await dep.zap.quoteRequiredInput(out, token.address)) + deposit);
      }
    }
  });

  it("reads the reserves again on every call", async () => {
    const { chain, zap } = dep;
    chain.deal(ALICE, 500n);
    await chain.transact(ALICE, zap.address, 500n, (ctx) =>
      zap.swapExactOut({ token: token.address, desiredOutput: 100n, deadline: chain.timestamp }, ctx),
    );
    // reserves are now 10102 / 9900
    expect(await zap.quoteRequiredInput(100n, token.address)).to.equal(104n);
  });

  it("validates like the swap paths", async () => {
    const { zap } = dep;
    await expectSettlementError(zap.quoteRequiredInput(0n, token.address), "InsufficientOutputAmount");
    await expectSettlementError(zap.quoteTotalFundsNeeded(0n, token.address, 10n), "InsufficientOutputAmount");
    await expectSettlementError(zap.quoteRequiredInput(10_000n, token.address), "InsufficientInputAmount");
    await expectSettlementError(zap.quoteTotalFundsNeeded(100n, token.address, 0n), "InsufficientInputAmount");
    await expectSettlementError(zap.quoteRequiredInput(100n, ethers.ZeroAddress), "InvalidToken");
    await expectSettlementError(zap.quoteRequiredInput(100n, dep.wrapped.address), "InvalidToken");
  });

  it("fails for a token without a pair", async () => {
    const orphan = new SimToken(dep.chain, "NOPE");
    await expectSettlementError(dep.zap.quoteRequiredInput(100n, orphan.address), "PairNotFound");
    await expectSettlementError(dep.zap.quoteTotalFundsNeeded(100n, orphan.address, 5n), "PairNotFound");
  });

  it("checks the total's inputs in order before reading the pair", async () => {
    const orphan = new SimToken(dep.chain, "NOPE");
    const { zap } = dep;
    await expectSettlementError(zap.quoteTotalFundsNeeded(0n, ethers.ZeroAddress, 0n), "InsufficientOutputAmount");
    await expectSettlementError(zap.quoteTotalFundsNeeded(100n, ethers.ZeroAddress, 0n), "InvalidToken");
    await expectSettlementError(zap.quoteTotalFundsNeeded(100n, orphan.address, 0n), "InsufficientInputAmount");
  });
});
