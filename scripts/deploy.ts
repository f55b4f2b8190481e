#!/usr/bin/env node
import { join } from 'path';
import { ConfigError, DEFAULT_ENV_PATH, DeployConfig, loadDeployConfig, toForgeEnv } from './env-config';
import { allNetworks, getNetwork, NetworkId } from './network-config';
import { assertNever, DeployCommand, parseCommand, printUsage } from './utils/cli-command';
import { DeployOutcome, deployNetwork } from './utils/deploy-forge';
import { CommandRunner, spawnCommand } from './utils/run-command';
import { verifyOklinkContracts } from './utils/verify-forge';

export type RunDeployOptions = {
    envPath?: string;
    cwd?: string;
    runner?: CommandRunner;
};

function outcomeIcon(outcome: DeployOutcome): string {
    switch (outcome.status) {
        case 'deployed':
            return '✅';
        case 'skipped':
            return '⚠️ ';
        case 'failed':
            return '❌';
        default:
            return assertNever(outcome);
    }
}

// Single-network runs announce the network's verification caveat before the banner
function printNote(network: NetworkId): void {
    const { note } = getNetwork(network);
    if (note) {
        console.log(`ℹ️  ${note}`);
    }
}

async function deployAll(config: DeployConfig, runner: CommandRunner, cwd: string): Promise<number> {
    console.log('🚀 Deploying to all testnets + X Layer...');

    // Every network is attempted; a failure on one does not stop the rest
    const outcomes: DeployOutcome[] = [];
    for (const network of allNetworks) {
        if (network === 'xlayer_testnet') {
            console.log('🚀 Deploying to X Layer networks...');
        }
        outcomes.push(await deployNetwork(network, config, { runner, cwd }));
    }

    console.log('\n📝 Summary:');
    for (const outcome of outcomes) {
        console.log(`   ${outcomeIcon(outcome)} ${getNetwork(outcome.network).displayName}: ${outcome.status}`);
    }

    const failed = outcomes.filter(outcome => outcome.status === 'failed');
    if (failed.length > 0) {
        console.error(`\n❌ ${failed.length} of ${outcomes.length} deployment(s) failed`);
        return 1;
    }

    console.log('\n✅ All deployments complete!');
    return 0;
}

async function dispatch(
    command: Exclude<DeployCommand, { kind: 'help' }>,
    config: DeployConfig,
    runner: CommandRunner,
    cwd: string,
): Promise<number> {
    switch (command.kind) {
        case 'deploy': {
            printNote(command.network);
            const outcome = await deployNetwork(command.network, config, { runner, cwd });
            return outcome.status === 'failed' ? 1 : 0;
        }
        case 'verify-only': {
            const descriptor = getNetwork(command.network);
            if (descriptor.verification.kind !== 'oklink') {
                console.error(`❌ ${descriptor.displayName} has no separate verification step`);
                return 1;
            }
            console.log(`🔍 Verify only: ${descriptor.displayName} via OKLink`);
            const { chainId, chainShortName } = descriptor.verification;
            const verification = await verifyOklinkContracts(chainId, chainShortName, runner, { cwd, env: toForgeEnv(config) });
            return verification.ok ? 0 : 1;
        }
        case 'all':
            return deployAll(config, runner, cwd);
        default:
            return assertNever(command);
    }
}

/**
 * Runs the deployment command named by the first argument and returns the process exit code
 * @param argv Arguments after the script name
 */
export async function runDeploy(argv: readonly string[], options: RunDeployOptions = {}): Promise<number> {
    const command = parseCommand(argv[0]);
    const runner = options.runner ?? spawnCommand;
    const cwd = options.cwd ?? process.cwd();

    // The env file is checked before anything else, help included
    let config: DeployConfig;
    try {
        config = loadDeployConfig(options.envPath ?? join(cwd, DEFAULT_ENV_PATH));
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`❌ Error: ${error.message}`);
            error.hints.forEach(hint => console.error(hint));
            return 1;
        }
        throw error;
    }

    if (command.kind === 'help') {
        if (command.unknown !== undefined) {
            console.error(`❌ Unknown network: ${command.unknown}\n`);
        }
        printUsage();
        return 0;
    }

    return dispatch(command, config, runner, cwd);
}

async function main(): Promise<void> {
    try {
        const exitCode = await runDeploy(process.argv.slice(2));
        process.exit(exitCode);
    } catch (error: unknown) {
        console.error('❌ Deployment error:', error instanceof Error ? error.message : error);
        process.exit(1);
    }
}

// Only run if this script is run directly
if (require.main === module) {
    process.on('SIGINT', () => {
        console.log('\n\n⚠️  Deployment interrupted by user');
        process.exit(130);
    });
    void main();
}
