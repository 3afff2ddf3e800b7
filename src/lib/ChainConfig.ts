import { getAddress } from "ethers";

export interface ChainAddresses {
    factory: string;
    wrappedNative: string;
}

/**
 * Per-chain settings read from the environment:
 * RPC_<chainId>, FACTORY_<chainId> and WRAPPED_NATIVE_<chainId>.
 */
export class ChainConfig {
    static getRPCUrl(chainId: number): string {
        return ChainConfig.require("RPC_", chainId, "url");
    }

    static getOptionalRPCUrl(chainId: number): string | undefined {
        return process.env["RPC_" + chainId];
    }

    static getAddresses(chainId: number): ChainAddresses {
        return {
            factory: getAddress(ChainConfig.require("FACTORY_", chainId, "address")),
            wrappedNative: getAddress(ChainConfig.require("WRAPPED_NATIVE_", chainId, "address")),
        };
    }

    private static require(prefix: string, chainId: number, what: string): string {
        const value = process.env[prefix + chainId];
        if (!value) {
            throw new Error(`${prefix}${chainId} not set in env. Add one as ${prefix}${chainId}=<${what}>`);
        }
        return value;
    }
}
