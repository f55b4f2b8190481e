import { DeployConfig, getRpcUrl, toForgeEnv } from '../env-config';
import { DEPLOY_SCRIPT_TARGET, getNetwork, NetworkId } from '../network-config';
import { CommandResult, CommandRunner, describeFailure, succeeded } from './run-command';
import { OklinkVerificationResult, verifyOklinkContracts } from './verify-forge';

export type DeployOutcome =
    | { status: 'skipped'; network: NetworkId; reason: string }
    | { status: 'failed'; network: NetworkId; result: CommandResult }
    | { status: 'deployed'; network: NetworkId; result: CommandResult; verification?: OklinkVerificationResult };

export type DeployOptions = {
    runner: CommandRunner;
    /** Project directory forge runs in and writes broadcast/ to */
    cwd?: string;
};

const BANNER = '═'.repeat(40);

/**
 * Arguments of `forge script` for a network; `--verify` only where forge can verify inline
 */
export function buildDeployArgs(network: NetworkId): string[] {
    const { verification } = getNetwork(network);
    return [
        'script',
        DEPLOY_SCRIPT_TARGET,
        '--rpc-url',
        network,
        '--broadcast',
        ...(verification.kind === 'verify' ? ['--verify'] : []),
        '-vvv',
    ];
}

/**
 * Deploys the registries to one network. An unset RPC variable skips the network;
 * forge failures are reported in the outcome and never retried.
 */
export async function deployNetwork(network: NetworkId, config: DeployConfig, options: DeployOptions): Promise<DeployOutcome> {
    const descriptor = getNetwork(network);
    const cwd = options.cwd ?? process.cwd();

    console.log(`\n${BANNER}`);
    console.log(`🚀 Deploying to ${descriptor.displayName}`);
    console.log(`${BANNER}\n`);

    if (!getRpcUrl(config, network)) {
        const reason = `${descriptor.rpcEnvVar} not set, skipping ${descriptor.displayName}`;
        console.warn(`⚠️  Warning: ${reason}`);
        return { status: 'skipped', network, reason };
    }

    const args = buildDeployArgs(network);
    console.log('🔧 Running forge script...');
    console.log(`📄 Script: ${DEPLOY_SCRIPT_TARGET}`);
    console.log(`🌐 Network: ${network}`);
    console.log(`🔍 Verification: ${descriptor.verification.kind}\n`);

    const env = toForgeEnv(config);
    const result = await options.runner('forge', args, { env, cwd });

    if (!succeeded(result)) {
        console.error(`❌ Deployment to ${descriptor.displayName} failed: ${describeFailure(result)}`);
        return { status: 'failed', network, result };
    }

    // X Layer deploys first, then verifies through the OKLink plugin using the broadcast data
    let verification: OklinkVerificationResult | undefined;
    if (descriptor.verification.kind === 'oklink') {
        const { chainId, chainShortName } = descriptor.verification;
        verification = await verifyOklinkContracts(chainId, chainShortName, options.runner, { cwd, env });
        if (!verification.ok) {
            console.warn(`⚠️  Verification on ${descriptor.displayName} was not submitted. Retry with: verify_${network}`);
        }
    }

    console.log(`✅ Successfully deployed to ${descriptor.displayName}! (${(result.durationMs / 1000).toFixed(1)}s)`);
    return { status: 'deployed', network, result, verification };
}
