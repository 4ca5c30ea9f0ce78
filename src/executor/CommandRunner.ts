import { spawn } from 'child_process';
import logger from '../utils/logger';

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    duration: number;
    timedOut: boolean;
}

export interface CommandOptions {
    timeout?: number;
    signal?: AbortSignal;
}

/**
 * Executes shell commands and captures output
 */
export class CommandRunner {
    /**
     * Execute a command. A timeout or an abort kills the process group and resolves with `timedOut`.
     */
    async execute(command: string, cwd: string, options: CommandOptions = {}): Promise<CommandResult> {
        const { timeout = 300000, signal } = options;
        const startTime = Date.now();

        logger.info(`Executing command: ${command} in ${cwd}`);

        return new Promise((resolve, reject) => {
            const detached = process.platform !== 'win32';
            const child = spawn(command, {
                cwd,
                shell: true,
                detached,
                env: { ...process.env, FORCE_COLOR: '0', CI: 'true' },
            });

            let stdout = '';
            let stderr = '';
            let timedOut = false;
            let settled = false;

            child.stdout?.on('data', (data: Buffer) => {
                stdout += data.toString();
            });

            child.stderr?.on('data', (data: Buffer) => {
                stderr += data.toString();
            });

            const kill = () => {
                if (child.exitCode !== null || child.signalCode !== null) return;
                timedOut = true;
                try {
                    if (detached && child.pid !== undefined) {
                        process.kill(-child.pid, 'SIGKILL');
                    } else {
                        child.kill('SIGKILL');
                    }
                } catch (error) {
                    logger.warn(`Could not kill command "${command}": ${error}`);
                }
            };

            const timeoutId = setTimeout(() => {
                logger.warn(`Command timed out after ${timeout}ms: ${command}`);
                kill();
            }, timeout);

            const onAbort = () => {
                logger.warn(`Command aborted: ${command}`);
                kill();
            };
            if (signal?.aborted) {
                onAbort();
            } else {
                signal?.addEventListener('abort', onAbort, { once: true });
            }

            const cleanup = () => {
                clearTimeout(timeoutId);
                signal?.removeEventListener('abort', onAbort);
            };

            child.on('close', (code) => {
                if (settled) return;
                settled = true;
                cleanup();
                const duration = Date.now() - startTime;

                const result: CommandResult = {
                    exitCode: code ?? (timedOut ? 124 : 1),
                    stdout,
                    stderr,
                    duration,
                    timedOut,
                };

                logger.info(`Command completed with exit code ${result.exitCode} in ${duration}ms`);
                resolve(result);
            });

            child.on('error', (error) => {
                if (settled) return;
                settled = true;
                cleanup();
                logger.error(`Command execution error: ${error}`);
                reject(error);
            });
        });
    }
}
