import { spawn } from 'child_process';
import { ProcessLaunchError } from '../errors.js';

export interface ProcessResult {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
    durationMs: number;
    timedOut: boolean;
}

export interface RunOptions {
    /** 0 (default) waits indefinitely. */
    timeoutMs?: number;
    env?: NodeJS.ProcessEnv;
}

/**
 * Runs `exec` with `args` (no shell) and resolves once it exits. Rejects only
 * when the process could not be started.
 */
export function runProgram(exec: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    const { timeoutMs = 0, env } = options;

    return new Promise((resolve, reject) => {
        const start = performance.now();
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let timedOut = false;
        let settled = false;

        const child = spawn(exec, args, {
            env: { ...process.env, ...env },
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        const timer = timeoutMs > 0
            ? setTimeout(() => {
                timedOut = true;
                child.kill('SIGKILL');
            }, timeoutMs)
            : null;

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

        child.on('error', (err) => {
            if (timer) clearTimeout(timer);
            if (settled) return;
            settled = true;
            reject(new ProcessLaunchError(exec, err));
        });

        child.on('close', (code, signal) => {
            if (timer) clearTimeout(timer);
            if (settled) return;
            settled = true;
            resolve({
                exitCode: code,
                signal,
                stdout: Buffer.concat(stdout).toString('utf8'),
                stderr: Buffer.concat(stderr).toString('utf8'),
                durationMs: performance.now() - start,
                timedOut,
            });
        });
    });
}
