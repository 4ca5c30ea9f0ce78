import { CommandRunner } from '../../executor/CommandRunner';
import { CheckResult, GateCheck } from './GateCheck';

const SUMMARY_LINES = 3;
const SUMMARY_CHARS = 400;

/**
 * First few non-empty lines of a command's output, stderr first
 */
export function summarizeOutput(stdout: string, stderr: string): string {
    const content = stderr.trim() ? `${stderr.trim()}\n${stdout.trim()}` : stdout.trim();
    return content
        .split('\n')
        .map(line => line.trim())
        .filter(line => line.length > 0)
        .slice(0, SUMMARY_LINES)
        .join(' | ')
        .slice(0, SUMMARY_CHARS);
}

/**
 * Passes when a shell command exits with 0
 */
export class CommandCheck implements GateCheck {
    constructor(
        readonly name: string,
        readonly command: string,
        private readonly cwd: string,
        readonly timeout: number,
        private readonly runner: CommandRunner = new CommandRunner()
    ) {}

    async run(signal: AbortSignal): Promise<CheckResult> {
        const result = await this.runner.execute(this.command, this.cwd, { timeout: this.timeout, signal });
        if (result.timedOut) {
            return { passed: false, detail: `${this.command} timed out after ${this.timeout}ms` };
        }
        if (result.exitCode === 0) {
            return { passed: true };
        }
        const summary = summarizeOutput(result.stdout, result.stderr);
        return {
            passed: false,
            detail: summary ? `exit ${result.exitCode}: ${summary}` : `exit ${result.exitCode}`,
        };
    }
}
