import { ethers } from 'ethers';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { getBroadcastPath, getOklinkVerifierUrl } from '../network-config';
import { CommandOptions, CommandResult, CommandRunner, describeFailure, succeeded } from './run-command';

export interface BroadcastTransaction {
    hash?: string | null;
    transactionType?: string;
    contractName?: string | null;
    contractAddress?: string | null;
}

export interface BroadcastFile {
    transactions: BroadcastTransaction[];
}

export const registryContracts = ['IdentityRegistry', 'ReputationRegistry', 'ValidationRegistry'] as const;
export type RegistryContract = typeof registryContracts[number];

export type VerificationRequest = {
    contractName: RegistryContract;
    contractAddress: string;
    contractPath: string;
    chainId: number;
    verifierUrl: string;
    constructorArgs?: string;
};

export type VerificationSubmission = {
    request: VerificationRequest;
    result: CommandResult;
};

export type OklinkVerificationResult = {
    ok: boolean;
    reason?: string;
    submissions: VerificationSubmission[];
};

function isObject(value: unknown): value is object {
    return typeof value === 'object' && value !== null;
}

function isBroadcastFile(value: unknown): value is BroadcastFile {
    return isObject(value) && 'transactions' in value && Array.isArray(value.transactions) && value.transactions.every(isObject);
}

/**
 * Reads the latest deploy broadcast for a chain
 * @param chainId Chain the deploy script broadcast to
 * @param rootDir Project directory holding the broadcast/ folder
 * @returns Parsed broadcast data or null if not found
 */
export function readLatestBroadcast(chainId: number, rootDir: string = process.cwd()): BroadcastFile | null {
    const broadcastPath = join(rootDir, getBroadcastPath(chainId));

    if (!existsSync(broadcastPath)) {
        return null;
    }

    const parsed: unknown = JSON.parse(readFileSync(broadcastPath, 'utf8'));
    if (!isBroadcastFile(parsed)) {
        throw new Error(`Malformed broadcast file: ${broadcastPath} has no transactions array of objects`);
    }
    return parsed;
}

/**
 * Address of the first transaction deploying `contractName`.
 * Missing addresses and the literal "null" count as absent.
 */
export function findContractAddress(broadcast: BroadcastFile, contractName: string): string | undefined {
    const tx = broadcast.transactions.find(transaction => transaction.contractName === contractName);
    const address = tx?.contractAddress;

    if (!address || address === 'null') {
        return undefined;
    }
    return address;
}

/** ABI-encodes the arguments of `constructor(address)` */
export function encodeConstructorArgs(address: string): string {
    return ethers.utils.defaultAbiCoder.encode(['address'], [address]);
}

export function getContractPath(contractName: RegistryContract): string {
    return `src/${contractName}.sol:${contractName}`;
}

export function buildVerifyArgs(request: VerificationRequest): string[] {
    return [
        'verify-contract',
        request.contractAddress,
        request.contractPath,
        ...(request.constructorArgs ? ['--constructor-args', request.constructorArgs] : []),
        '--chain',
        request.chainId.toString(),
        '--verifier',
        'oklink',
        '--verifier-url',
        request.verifierUrl,
        '--watch',
    ];
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function failure(reason: string, hint?: string): OklinkVerificationResult {
    console.error(`❌ ${reason}`);
    if (hint) {
        console.log(`⚠️  ${hint}`);
    }
    return { ok: false, reason, submissions: [] };
}

/**
 * Verifies the registries of the latest deploy broadcast through the OKLink forge plugin.
 * IdentityRegistry takes no constructor arguments; the other two registries take its address.
 * A failed submission is logged and the remaining ones still run.
 * @param chainId Chain id of the broadcast (196 or 1952)
 * @param chainShortName OKLink chain short name (XLAYER or XLAYER_TESTNET)
 * @param options Project directory holding broadcast/ and the environment handed to forge
 */
export async function verifyOklinkContracts(
    chainId: number,
    chainShortName: string,
    runner: CommandRunner,
    options: CommandOptions = {},
): Promise<OklinkVerificationResult> {
    const rootDir = options.cwd ?? process.cwd();
    if (!chainShortName) {
        return failure(`OKLink chain short name missing for chain ${chainId}.`);
    }

    const verifierUrl = getOklinkVerifierUrl(chainShortName);
    const broadcastPath = getBroadcastPath(chainId);

    let broadcast: BroadcastFile | null;
    try {
        broadcast = readLatestBroadcast(chainId, rootDir);
    } catch (error) {
        return failure(`Error reading broadcast file: ${errorMessage(error)}`);
    }

    if (!broadcast) {
        return failure(`Broadcast file not found: ${broadcastPath}`, 'Run deployment first so we can pick up addresses to verify.');
    }

    const identityAddress = findContractAddress(broadcast, 'IdentityRegistry');
    if (!identityAddress) {
        return failure(`Could not find IdentityRegistry address in ${broadcastPath}`);
    }

    let constructorArgs: string;
    try {
        constructorArgs = encodeConstructorArgs(identityAddress);
    } catch (error) {
        return failure(`Invalid IdentityRegistry address ${identityAddress}: ${errorMessage(error)}`);
    }

    const requests: VerificationRequest[] = [];
    for (const contractName of registryContracts) {
        const contractAddress = contractName === 'IdentityRegistry' ? identityAddress : findContractAddress(broadcast, contractName);
        if (!contractAddress) {
            continue;
        }
        requests.push({
            contractName,
            contractAddress,
            contractPath: getContractPath(contractName),
            chainId,
            verifierUrl,
            constructorArgs: contractName === 'IdentityRegistry' ? undefined : constructorArgs,
        });
    }

    console.log(`\n🔍 Verifying on OKLink (${chainShortName}) using ${verifierUrl}`);

    const submissions: VerificationSubmission[] = [];
    for (const request of requests) {
        const position = registryContracts.indexOf(request.contractName) + 1;
        console.log(`📄 [${position}/${registryContracts.length}] Verifying ${request.contractName} at ${request.contractAddress} ...`);

        const result = await runner('forge', buildVerifyArgs(request), { cwd: rootDir, env: options.env });
        if (succeeded(result)) {
            console.log(`✅ ${request.contractName} verification submitted`);
        } else {
            console.error(`❌ ${request.contractName} verification failed: ${describeFailure(result)}`);
        }
        submissions.push({ request, result });
    }

    console.log("✅ OKLink verification commands submitted. Use --watch logs above or run 'forge verify-check' with your GUID if needed.");

    return { ok: true, submissions };
}
