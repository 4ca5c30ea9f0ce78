import { decideGate, evaluateHalt, GateInputs } from '../GateDecision';
import { CheckOutcome } from '../../models/GateRecord';

const policy = { threshold: 3, escalationThreshold: 20 };

const outcome = (name: string, status: CheckOutcome['status']): CheckOutcome => ({ name, status, durationMs: 5 });

describe('evaluateHalt', () => {
    it('halts once the stored streak reaches the threshold', () => {
        expect(evaluateHalt(2, policy)).toBeNull();
        expect(evaluateHalt(3, policy)).toEqual({ code: 'FAILURE_THRESHOLD_REACHED', current: 3, threshold: 3 });
        expect(evaluateHalt(7, policy)).toEqual({ code: 'FAILURE_THRESHOLD_REACHED', current: 7, threshold: 3 });
    });
});

describe('decideGate', () => {
    it('gives the same decision for the same inputs', () => {
        const inputs: GateInputs = {
            previousFailures: 1,
            results: [outcome('lint', 'passed'), outcome('test', 'failed')],
            policy,
            blastRadiusSize: 4,
        };
        const copy = JSON.parse(JSON.stringify(inputs));

        expect(decideGate(inputs)).toEqual(decideGate(inputs));
        expect(inputs).toEqual(copy);
    });

    it('increments the streak on failure', () => {
        const decision = decideGate({
            previousFailures: 1,
            results: [outcome('lint', 'passed'), outcome('test', 'failed')],
            policy,
        });

        expect(decision).toEqual({
            outcome: 'failed',
            consecutiveFailures: 2,
            threshold: 3,
            escalate: false,
            failedChecks: ['test'],
            timedOutChecks: [],
            summary: 'Gate failed: test; 2/3 consecutive failures',
        });
    });

    it('resets the streak on a pass', () => {
        const decision = decideGate({ previousFailures: 2, results: [outcome('lint', 'passed')], policy });

        expect(decision.outcome).toBe('passed');
        expect(decision.consecutiveFailures).toBe(0);
        expect(decision.summary).toBe('Gate passed: 1 check(s) green');
    });

    it('counts timeouts and errors as failures and lists timeouts apart', () => {
        const decision = decideGate({
            previousFailures: 0,
            results: [outcome('lint', 'errored'), outcome('test', 'timed_out')],
            policy,
        });

        expect(decision.failedChecks).toEqual(['lint', 'test']);
        expect(decision.timedOutChecks).toEqual(['test']);
        expect(decision.summary).toBe('Gate failed: lint, test (1 timed out); 1/3 consecutive failures');
    });

    it('halts without looking at results and keeps the counter', () => {
        const decision = decideGate({ previousFailures: 3, results: [outcome('lint', 'passed')], policy });

        expect(decision.outcome).toBe('halted');
        expect(decision.consecutiveFailures).toBe(3);
        expect(decision.reason).toEqual({ code: 'FAILURE_THRESHOLD_REACHED', current: 3, threshold: 3 });
        expect(decision.failedChecks).toEqual([]);
    });

    it('keeps the counter on bypass, even past the threshold', () => {
        const decision = decideGate({ previousFailures: 5, results: [], policy, bypass: true });

        expect(decision.outcome).toBe('bypassed');
        expect(decision.consecutiveFailures).toBe(5);
        expect(decision.reason).toBeUndefined();
    });

    it('flags escalation only above the threshold', () => {
        const atThreshold = decideGate({ previousFailures: 0, results: [], policy, blastRadiusSize: 20 });
        const above = decideGate({ previousFailures: 0, results: [], policy, blastRadiusSize: 21 });

        expect(atThreshold.escalate).toBe(false);
        expect(above.escalate).toBe(true);
        expect(above.outcome).toBe('passed');
        expect(above.summary).toBe('Gate passed: 0 check(s) green; escalate: blast radius 21 exceeds 20');
    });
});
