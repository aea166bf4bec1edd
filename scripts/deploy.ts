import { type Address, formatUnits, getAddress, isAddress, keccak256, stringToHex } from "viem";
import {
    DECIMALS,
    INITIAL_SUPPLY,
    OWNER_ADDRESS,
    TREASURY_WALLET_ADDRESS,
} from "../constants/contracts";
import { FeeToken } from "../contracts/FeeToken";
import { InMemoryLedger } from "../contracts/BalanceLedger";
import { type Clock, SystemClock } from "../utils/clock";
import { type Allocation, parseCSVToAllocationArray, totalAllocated } from "../utils/get-allocations";
import { Log } from "../utils/log";

const requireAddress = (name: string, value: string): Address => {
    if (!isAddress(value, { strict: false })) {
        throw new Error(`${name} is missing or not an address: "${value}"`);
    }
    return getAddress(value);
};

/** Deterministic account for the token itself, derived from its name. */
const tokenAddress = (name: string): Address => getAddress(`0x${keccak256(stringToHex(name)).slice(-40)}`);

export interface DeployOptions {
    owner?: string;
    treasury?: string;
    allocationsFile?: string;
    clock?: Clock;
}

export const deploy = async ({
    owner: ownerAddress = OWNER_ADDRESS,
    treasury: treasuryAddress = TREASURY_WALLET_ADDRESS,
    allocationsFile,
    clock = new SystemClock(),
}: DeployOptions = {}) => {
    const owner = requireAddress("OWNER_ADDRESS", ownerAddress);
    const treasury = requireAddress("TREASURY_WALLET_ADDRESS", treasuryAddress);

    const token = new FeeToken({
        address: tokenAddress("FeeToken"),
        owner,
        treasury,
        lpToken: new InMemoryLedger(),
        initialSupply: INITIAL_SUPPLY,
        clock,
    });

    Log.info(`Token deployed to: ${token.address} 🎉`);
    Log.info(`Owner address: ${owner}`);
    Log.info(`Max Supply: ${formatUnits(token.maxSupply, Number(DECIMALS))}`);
    Log.info(`Treasury Wallet: ${treasury}`);

    let allocations: Allocation[] = [];
    if (allocationsFile) {
        allocations = await parseCSVToAllocationArray(allocationsFile);
        for (const { address, amount } of allocations) {
            token.transfer(owner, address, amount);
        }
        Log.info(`${allocations.length} allocations distributed (${formatUnits(totalAllocated(allocations), Number(DECIMALS))} tokens) ✅`);
    }

    token.enableTrading(owner);
    Log.info("Trading enabled ✅");

    return { token, allocations };
};

if (require.main === module) {
    deploy({ allocationsFile: process.env.ALLOCATIONS_CSV || undefined }).catch((error) => {
        Log.warn(error);
        process.exitCode = 1;
    });
}
