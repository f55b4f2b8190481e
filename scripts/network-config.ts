// Network descriptors for the registry deployment scripts

// ============================================================================
// Types
// ============================================================================

export const allNetworks = [
    'sepolia',
    'base_sepolia',
    'optimism_sepolia',
    'mode_testnet',
    'zg_testnet',
    'xlayer_testnet',
    'xlayer',
] as const;
export type NetworkId = typeof allNetworks[number];

/** How contracts get verified after `forge script` broadcasts them */
export type VerificationMode =
    | { kind: 'verify' }
    | { kind: 'no-verify' }
    | { kind: 'oklink'; chainId: number; chainShortName: string };

export type NetworkDescriptor = {
    id: NetworkId;
    rpcEnvVar: string;
    displayName: string;
    verification: VerificationMode;
    /** Printed before deploying */
    note?: string;
};

export const OKLINK_VERIFIER_BASE_URL = 'https://www.oklink.com/api/v5/explorer/contract/verify-source-code-plugin';
export const DEPLOY_SCRIPT_NAME = 'Deploy.s.sol';
export const DEPLOY_SCRIPT_TARGET = `script/${DEPLOY_SCRIPT_NAME}:Deploy`;

// ============================================================================
// Network Descriptors
// ============================================================================

const descriptors: Record<NetworkId, NetworkDescriptor> = {
    sepolia: {
        id: 'sepolia',
        rpcEnvVar: 'SEPOLIA_RPC_URL',
        displayName: 'Ethereum Sepolia',
        verification: { kind: 'verify' },
    },
    base_sepolia: {
        id: 'base_sepolia',
        rpcEnvVar: 'BASE_SEPOLIA_RPC_URL',
        displayName: 'Base Sepolia',
        verification: { kind: 'verify' },
    },
    optimism_sepolia: {
        id: 'optimism_sepolia',
        rpcEnvVar: 'OPTIMISM_SEPOLIA_RPC_URL',
        displayName: 'Optimism Sepolia',
        verification: { kind: 'verify' },
    },
    mode_testnet: {
        id: 'mode_testnet',
        rpcEnvVar: 'MODE_TESTNET_RPC_URL',
        displayName: 'Mode Testnet',
        verification: { kind: 'verify' },
    },
    zg_testnet: {
        id: 'zg_testnet',
        rpcEnvVar: 'ZG_TESTNET_RPC_URL',
        displayName: '0G Testnet',
        verification: { kind: 'no-verify' },
        note: 'Note: 0G testnet verification not yet supported via forge',
    },
    xlayer_testnet: {
        id: 'xlayer_testnet',
        rpcEnvVar: 'XLAYER_TESTNET_RPC_URL',
        displayName: 'X Layer Testnet',
        verification: { kind: 'oklink', chainId: 1952, chainShortName: 'XLAYER_TESTNET' },
        note: 'X Layer Testnet: using OKLink plugin verification',
    },
    xlayer: {
        id: 'xlayer',
        rpcEnvVar: 'XLAYER_RPC_URL',
        displayName: 'X Layer Mainnet',
        verification: { kind: 'oklink', chainId: 196, chainShortName: 'XLAYER' },
        note: 'X Layer: using OKLink plugin verification',
    },
};

for (const descriptor of Object.values(descriptors)) {
    Object.freeze(descriptor.verification);
    Object.freeze(descriptor);
}

export const networkDescriptors: Readonly<Record<NetworkId, Readonly<NetworkDescriptor>>> = Object.freeze(descriptors);

// ============================================================================
// Helper Functions
// ============================================================================

export function isNetworkId(value: string): value is NetworkId {
    return allNetworks.some(network => network === value);
}

export function getNetwork(network: NetworkId): Readonly<NetworkDescriptor> {
    return networkDescriptors[network];
}

export function getAvailableNetworks(): NetworkId[] {
    return [...allNetworks];
}

/**
 * Verifier URL of the OKLink Foundry plugin for a chain
 * @param chainShortName OKLink chain short name (e.g. XLAYER)
 */
export function getOklinkVerifierUrl(chainShortName: string): string {
    return `${OKLINK_VERIFIER_BASE_URL}/${chainShortName}`;
}

/**
 * Path of the latest broadcast file forge writes for the deploy script
 */
export function getBroadcastPath(chainId: number): string {
    return `broadcast/${DEPLOY_SCRIPT_NAME}/${chainId}/run-latest.json`;
}
