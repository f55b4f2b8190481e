import { spawn } from 'child_process';

export type CommandResult = {
    command: string;
    args: string[];
    /** null when the process never started or was killed by a signal */
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    output: string;
    durationMs: number;
    error?: string;
};

export type CommandOptions = {
    env?: NodeJS.ProcessEnv;
    cwd?: string;
};

/** Runs one external command to completion; never rejects */
export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

export function succeeded(result: CommandResult): boolean {
    return result.exitCode === 0 && !result.error;
}

export function describeFailure(result: CommandResult): string {
    if (result.error) {
        return result.error;
    }
    if (result.signal) {
        return `${result.command} terminated by ${result.signal}`;
    }
    return `${result.command} exited with code ${result.exitCode}`;
}

/**
 * Spawns a command, echoing its output to the console while capturing it
 */
export const spawnCommand: CommandRunner = (command, args, options = {}) => {
    const startedAt = Date.now();
    const chunks: string[] = [];

    return new Promise(resolve => {
        const child = spawn(command, args, {
            env: options.env ?? process.env,
            cwd: options.cwd ?? process.cwd(),
            stdio: ['inherit', 'pipe', 'pipe'],
        });

        // Decoding on the stream keeps multi-byte characters split across chunks intact
        child.stdout?.setEncoding('utf8');
        child.stderr?.setEncoding('utf8');
        child.stdout?.on('data', (chunk: string) => {
            chunks.push(chunk);
            process.stdout.write(chunk);
        });
        child.stderr?.on('data', (chunk: string) => {
            chunks.push(chunk);
            process.stderr.write(chunk);
        });

        child.on('error', (error: NodeJS.ErrnoException) => {
            resolve({
                command,
                args,
                exitCode: null,
                signal: null,
                output: chunks.join(''),
                durationMs: Date.now() - startedAt,
                error:
                    error.code === 'ENOENT'
                        ? `${command} not found. Make sure Foundry is installed and in your PATH.`
                        : `Failed to start ${command}: ${error.message}`,
            });
        });

        child.on('close', (code, signal) => {
            resolve({
                command,
                args,
                exitCode: code,
                signal,
                output: chunks.join(''),
                durationMs: Date.now() - startedAt,
            });
        });
    });
};
