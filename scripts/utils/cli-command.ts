import { isNetworkId, NetworkId } from '../network-config';

/** Networks that also support a separate verify-only pass */
export type VerifiableNetworkId = Extract<NetworkId, 'xlayer' | 'xlayer_testnet'>;

export type DeployCommand =
    | { kind: 'deploy'; network: NetworkId }
    | { kind: 'verify-only'; network: VerifiableNetworkId }
    | { kind: 'all' }
    | { kind: 'help'; unknown?: string };

export function assertNever(value: never): never {
    throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

/**
 * Maps the positional argument, matched as given, to a command; absent or unrecognized input falls back to help
 */
export function parseCommand(value: string | undefined): DeployCommand {
    if (!value || value === 'help') {
        return { kind: 'help' };
    }
    if (value === 'all') {
        return { kind: 'all' };
    }
    if (value === 'verify_xlayer') {
        return { kind: 'verify-only', network: 'xlayer' };
    }
    if (value === 'verify_xlayer_testnet') {
        return { kind: 'verify-only', network: 'xlayer_testnet' };
    }
    if (isNetworkId(value)) {
        return { kind: 'deploy', network: value };
    }
    return { kind: 'help', unknown: value };
}

export const usageLines: readonly string[] = [
    'ERC-8004 Registry Deployment',
    '',
    'Usage: npm run deploy -- <network>',
    '',
    'Available networks:',
    '  sepolia                - Ethereum Sepolia testnet',
    '  base_sepolia           - Base Sepolia testnet',
    '  optimism_sepolia       - Optimism Sepolia testnet',
    '  mode_testnet           - Mode Testnet',
    '  zg_testnet             - 0G testnet',
    '  xlayer_testnet         - X Layer Testnet (chainId 1952)',
    '  xlayer                 - X Layer Mainnet (chainId 196)',
    '  verify_xlayer_testnet  - Verify latest X Layer Testnet deployment on OKLink',
    '  verify_xlayer          - Verify latest X Layer Mainnet deployment on OKLink',
    '  all                    - Deploy to all testnets + X Layer',
    '',
    'Examples:',
    '  npm run deploy -- sepolia',
    '  npm run deploy -- xlayer_testnet',
    '  npm run deploy -- all',
    '',
    'Prerequisites:',
    '  1. Create .env file with PRIVATE_KEY and RPC URLs',
    '  2. Ensure deployer wallet has testnet tokens',
    '  3. Set block explorer API keys for verification',
];

export function printUsage(): void {
    for (const line of usageLines) {
        console.log(line);
    }
}
