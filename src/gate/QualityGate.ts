import { CheckOutcome, GatePolicy, GateRecord, GateRunResult, GateState } from '../models/GateRecord';
import logger from '../utils/logger';
import { GateCheck } from './checks/GateCheck';
import { decideGate, evaluateHalt } from './GateDecision';
import { GateStateStore } from './GateStateStore';

const TRANSITIONS: Record<GateState, readonly GateState[]> = {
    idle: ['running', 'halted', 'bypassed'],
    running: ['passed', 'failed'],
    passed: ['idle'],
    failed: ['idle'],
    halted: ['idle'],
    bypassed: ['idle'],
};

export interface GateRunOptions {
    bypass?: boolean;
    blastRadiusSize?: number;
}

type Attempt =
    | { kind: 'done'; passed: boolean; detail?: string }
    | { kind: 'error'; error: unknown }
    | { kind: 'timeout' };

/**
 * Circuit breaker around the project's checks.
 *
 * Reads the stored streak, halts before any check once the threshold is reached,
 * runs each check under its own timeout and writes the new record once.
 */
export class QualityGate {
    private state: GateState = 'idle';

    constructor(
        private readonly store: GateStateStore,
        private readonly checks: GateCheck[],
        private readonly policy: GatePolicy,
        private readonly now: () => Date = () => new Date()
    ) {}

    getState(): GateState {
        return this.state;
    }

    async run(options: GateRunOptions = {}): Promise<GateRunResult> {
        if (this.state === 'running') {
            throw new Error('Gate is already running');
        }
        if (this.state !== 'idle') {
            this.setState('idle');
        }

        const warnings: string[] = [];
        const { record: previous, recovered } = await this.store.read();
        if (recovered) {
            warnings.push(`Gate state at ${this.store.filePath} was corrupt and has been reset`);
        }

        let checks: CheckOutcome[] = [];
        if (options.bypass) {
            this.setState('bypassed');
            logger.warn('Gate bypassed; checks skipped');
        } else if (evaluateHalt(previous.consecutive_failures, this.policy)) {
            this.setState('halted');
        } else {
            this.setState('running');
            checks = await this.runChecks();
        }

        const decision = decideGate({
            previousFailures: previous.consecutive_failures,
            results: checks,
            policy: this.policy,
            bypass: options.bypass,
            blastRadiusSize: options.blastRadiusSize,
        });
        if (this.getState() === 'running') {
            this.setState(decision.outcome);
        }

        const record: GateRecord = {
            consecutive_failures: decision.consecutiveFailures,
            last_outcome: decision.outcome,
            last_run_at: this.now().toISOString(),
        };
        try {
            await this.store.write(record);
        } catch (error) {
            const message = `Failed to persist gate state: ${error}`;
            logger.error(message);
            warnings.push(message);
        }

        if (decision.outcome === 'passed' || decision.outcome === 'bypassed') {
            logger.info(decision.summary);
        } else {
            logger.warn(decision.summary);
        }

        return { decision, checks, record, recoveredFromCorruptState: recovered, warnings };
    }

    private async runChecks(): Promise<CheckOutcome[]> {
        const outcomes: CheckOutcome[] = [];
        for (const check of this.checks) {
            outcomes.push(await this.runCheck(check));
        }
        return outcomes;
    }

    private async runCheck(check: GateCheck): Promise<CheckOutcome> {
        const controller = new AbortController();
        const started = Date.now();
        let timer: NodeJS.Timeout | undefined;

        const attempt: Promise<Attempt> = Promise.resolve().then(() => check.run(controller.signal)).then(
            (result): Attempt => ({ kind: 'done', passed: result.passed, detail: result.detail }),
            (error: unknown): Attempt => ({ kind: 'error', error })
        );
        const deadline = new Promise<Attempt>(resolve => {
            timer = setTimeout(() => resolve({ kind: 'timeout' }), check.timeout);
        });

        const outcome = await Promise.race([attempt, deadline]);
        clearTimeout(timer);
        const durationMs = Date.now() - started;

        switch (outcome.kind) {
            case 'timeout':
                controller.abort();
                logger.error(`Check ${check.name} timed out after ${check.timeout}ms`);
                return { name: check.name, status: 'timed_out', detail: `timed out after ${check.timeout}ms`, durationMs };
            case 'error': {
                const detail = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
                logger.warn(`Check ${check.name} errored: ${detail}`);
                return { name: check.name, status: 'errored', detail, durationMs };
            }
            case 'done': {
                const status = outcome.passed ? 'passed' : 'failed';
                logger.info(`Check ${check.name} ${status} in ${durationMs}ms`);
                return outcome.detail === undefined
                    ? { name: check.name, status, durationMs }
                    : { name: check.name, status, detail: outcome.detail, durationMs };
            }
        }
    }

    private setState(next: GateState): void {
        if (!TRANSITIONS[this.state].includes(next)) {
            throw new Error(`Illegal gate transition: ${this.state} -> ${next}`);
        }
        this.state = next;
        logger.info(`Gate state: ${next}`);
    }
}
