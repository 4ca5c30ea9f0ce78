import { CheckOutcome, GateDecision, GatePolicy, HaltReason } from '../models/GateRecord';

export interface GateInputs {
    previousFailures: number;
    results: CheckOutcome[];
    policy: GatePolicy;
    bypass?: boolean;
    blastRadiusSize?: number;
}

/**
 * Halt reason when the stored failure streak has reached the threshold, otherwise null
 */
export function evaluateHalt(previousFailures: number, policy: GatePolicy): HaltReason | null {
    if (previousFailures >= policy.threshold) {
        return {
            code: 'FAILURE_THRESHOLD_REACHED',
            current: previousFailures,
            threshold: policy.threshold,
        };
    }
    return null;
}

/**
 * Pure gate decision. Same inputs, same decision.
 *
 * Bypass wins over a halt, a halt ignores check results, and any check that
 * did not pass fails the gate.
 */
export function decideGate(inputs: GateInputs): GateDecision {
    const { previousFailures, results, policy } = inputs;
    const blastRadiusSize = inputs.blastRadiusSize ?? 0;
    const escalate = blastRadiusSize > policy.escalationThreshold;
    const escalation = escalate
        ? `; escalate: blast radius ${blastRadiusSize} exceeds ${policy.escalationThreshold}`
        : '';

    if (inputs.bypass) {
        return {
            outcome: 'bypassed',
            consecutiveFailures: previousFailures,
            threshold: policy.threshold,
            escalate,
            failedChecks: [],
            timedOutChecks: [],
            summary: `Gate bypassed; ${previousFailures}/${policy.threshold} consecutive failures kept${escalation}`,
        };
    }

    const reason = evaluateHalt(previousFailures, policy);
    if (reason) {
        return {
            outcome: 'halted',
            consecutiveFailures: previousFailures,
            threshold: policy.threshold,
            escalate,
            reason,
            failedChecks: [],
            timedOutChecks: [],
            summary: `Gate halted: ${reason.current} consecutive failures reached the threshold of ${reason.threshold}; run gate-reset after fixing the cause${escalation}`,
        };
    }

    const failedChecks = results.filter(result => result.status !== 'passed').map(result => result.name);
    const timedOutChecks = results.filter(result => result.status === 'timed_out').map(result => result.name);

    if (failedChecks.length > 0) {
        const failures = previousFailures + 1;
        const timedOut = timedOutChecks.length > 0 ? ` (${timedOutChecks.length} timed out)` : '';
        return {
            outcome: 'failed',
            consecutiveFailures: failures,
            threshold: policy.threshold,
            escalate,
            failedChecks,
            timedOutChecks,
            summary: `Gate failed: ${failedChecks.join(', ')}${timedOut}; ${failures}/${policy.threshold} consecutive failures${escalation}`,
        };
    }

    return {
        outcome: 'passed',
        consecutiveFailures: 0,
        threshold: policy.threshold,
        escalate,
        failedChecks: [],
        timedOutChecks: [],
        summary: `Gate passed: ${results.length} check(s) green${escalation}`,
    };
}
