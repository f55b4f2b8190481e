import * as dotenv from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { allNetworks, getNetwork, NetworkId } from './network-config';

export const DEFAULT_ENV_PATH = '.env';

/** Configuration read once from the env file and shared by every step */
export type DeployConfig = Readonly<{
    envPath: string;
    privateKey: string;
    values: Readonly<Record<string, string>>;
}>;

export class ConfigError extends Error {
    constructor(message: string, readonly hints: readonly string[] = []) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function isValidPrivateKey(privateKey: string): boolean {
    return /^(0x)?[a-fA-F0-9]{64}$/.test(privateKey);
}

/**
 * Loads the deployment configuration from a dotenv file without touching process.env
 * @param envPath Path of the env file
 * @throws ConfigError if the file is missing or PRIVATE_KEY is empty or malformed
 */
export function loadDeployConfig(envPath: string = DEFAULT_ENV_PATH): DeployConfig {
    if (!existsSync(envPath)) {
        throw new ConfigError(`${envPath} file not found!`, [
            'Please create a .env file with:',
            '  PRIVATE_KEY=your_private_key',
            ...allNetworks.map(network => `  ${getNetwork(network).rpcEnvVar}=...`),
        ]);
    }

    const values = dotenv.parse(readFileSync(envPath));
    const privateKey = (values.PRIVATE_KEY ?? '').trim();

    if (!privateKey) {
        throw new ConfigError(`PRIVATE_KEY not set in ${envPath}`);
    }
    if (!isValidPrivateKey(privateKey)) {
        throw new ConfigError('Invalid PRIVATE_KEY format. Should be 64 hex characters (with or without 0x prefix)');
    }

    return Object.freeze({
        envPath,
        privateKey,
        values: Object.freeze({ ...values }),
    });
}

/**
 * RPC URL configured for a network, undefined when the variable is unset or blank
 */
export function getRpcUrl(config: DeployConfig, network: NetworkId): string | undefined {
    const rpcUrl = config.values[getNetwork(network).rpcEnvVar]?.trim();
    return rpcUrl ? rpcUrl : undefined;
}

// forge resolves `--rpc-url <alias>` and the deployer key through these variables
export function toForgeEnv(config: DeployConfig, baseEnv: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    return { ...baseEnv, ...config.values };
}
