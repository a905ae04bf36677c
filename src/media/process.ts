/**
 * External command execution with a wall-clock timeout
 */
import { spawn } from 'child_process';
import { CommandTimeoutError } from '../errors.js';

export interface CommandResult {
    code: number | null;
    stdout: string;
    stderr: string;
}

export type CommandRunner = (
    command: string,
    args: string[],
    options: { timeoutMs: number }
) => Promise<CommandResult>;

/**
 * Run a command to completion, collecting its output.
 * Rejects on spawn failure (e.g. command not found) and on timeout;
 * a non-zero exit code is reported, not thrown.
 */
export const runCommand: CommandRunner = (command, args, { timeoutMs }) => {
    return new Promise((resolve, reject) => {
        const proc = spawn(command, args, {
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        let stdout = '';
        let stderr = '';
        let timedOut = false;

        const timer = setTimeout(() => {
            timedOut = true;
            proc.kill('SIGKILL');
        }, timeoutMs);

        proc.stdout.on('data', (data: Buffer) => {
            stdout += data.toString();
        });

        proc.stderr.on('data', (data: Buffer) => {
            stderr += data.toString();
        });

        proc.on('close', (code) => {
            clearTimeout(timer);
            if (timedOut) {
                reject(new CommandTimeoutError([command, ...args].join(' '), timeoutMs));
                return;
            }
            resolve({ code, stdout, stderr });
        });

        proc.on('error', (error) => {
            clearTimeout(timer);
            reject(error);
        });
    });
};
