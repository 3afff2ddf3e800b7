import "dotenv/config";
import { ethers } from "ethers";
import { PairState } from "../PairState";

// usage: TOKEN=<address> AMOUNT=<units> [DEPOSIT=<ether>] [CHAIN_ID=1] npm run quote
(async () => {
    const chainId = Number(process.env.CHAIN_ID ?? "1");
    const token = process.env.TOKEN;
    if (!token) throw new Error("TOKEN not set in env");
    const amountOut = BigInt(process.env.AMOUNT ?? "0");

    const state = PairState.fromChainId(chainId);
    if (!(await state.pairExists(token))) {
        console.log(`no pair for ${token} on chain ${chainId}`);
        return;
    }

    const snapshot = await state.sync(token);
    console.log(snapshot);

    const requiredInput = await state.quotes.quoteRequiredInput(amountOut, token);
    console.log(`buy ${amountOut} of ${token}: ${ethers.formatEther(requiredInput)} native`);

    if (process.env.DEPOSIT) {
        const deposit = ethers.parseEther(process.env.DEPOSIT);
        const total = await state.quotes.quoteTotalFundsNeeded(amountOut, token, deposit);
        console.log(`buy and deposit: ${ethers.formatEther(total)} native`);
    }
})().catch((e) => {
    console.error(e);
    process.exitCode = 1;
});
