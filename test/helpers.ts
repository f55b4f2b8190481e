import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { getBroadcastPath } from '../scripts/network-config';
import { CommandOptions, CommandResult, CommandRunner } from '../scripts/utils/run-command';

export const TEST_PRIVATE_KEY = `0x${'1'.repeat(64)}`;

export const ALL_RPC_VALUES: Record<string, string> = {
    SEPOLIA_RPC_URL: 'http://localhost:8545/sepolia',
    BASE_SEPOLIA_RPC_URL: 'http://localhost:8545/base-sepolia',
    OPTIMISM_SEPOLIA_RPC_URL: 'http://localhost:8545/optimism-sepolia',
    MODE_TESTNET_RPC_URL: 'http://localhost:8545/mode',
    ZG_TESTNET_RPC_URL: 'http://localhost:8545/zg',
    XLAYER_TESTNET_RPC_URL: 'http://localhost:8545/xlayer-testnet',
    XLAYER_RPC_URL: 'http://localhost:8545/xlayer',
};

export type RecordedCall = {
    command: string;
    args: string[];
    options?: CommandOptions;
};

export type FakeRunner = {
    runner: CommandRunner;
    calls: RecordedCall[];
};

/**
 * In-process stand-in for spawning forge; `exitCodeFor` decides each call's exit code
 */
export function createFakeRunner(exitCodeFor: (call: RecordedCall) => number = () => 0): FakeRunner {
    const calls: RecordedCall[] = [];
    const runner: CommandRunner = async (command, args, options) => {
        const call = { command, args, options };
        calls.push(call);
        const result: CommandResult = {
            command,
            args,
            exitCode: exitCodeFor(call),
            signal: null,
            output: '',
            durationMs: 5,
        };
        return result;
    };
    return { runner, calls };
}

export type CapturedConsole = {
    lines: string[];
    restore: () => void;
};

export function captureConsole(): CapturedConsole {
    const original = { log: console.log, warn: console.warn, error: console.error };
    const lines: string[] = [];
    const record = (...parts: unknown[]) => {
        lines.push(parts.map(part => String(part)).join(' '));
    };

    console.log = record;
    console.warn = record;
    console.error = record;

    return {
        lines,
        restore: () => {
            console.log = original.log;
            console.warn = original.warn;
            console.error = original.error;
        },
    };
}

export type TestProject = {
    dir: string;
    envPath: string;
    writeEnv: (values: Record<string, string>) => void;
    writeBroadcast: (chainId: number, broadcast: unknown) => void;
    cleanup: () => void;
};

export function createTestProject(): TestProject {
    const dir = mkdtempSync(join(tmpdir(), 'registry-deploy-'));
    const envPath = join(dir, '.env');

    return {
        dir,
        envPath,
        writeEnv: values => {
            const content = Object.entries(values)
                .map(([key, value]) => `${key}=${value}`)
                .join('\n');
            writeFileSync(envPath, `${content}\n`);
        },
        writeBroadcast: (chainId, broadcast) => {
            const path = join(dir, getBroadcastPath(chainId));
            mkdirSync(dirname(path), { recursive: true });
            writeFileSync(path, JSON.stringify(broadcast, null, 2));
        },
        cleanup: () => rmSync(dir, { recursive: true, force: true }),
    };
}
