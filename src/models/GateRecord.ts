/**
 * Gate data models
 */

export type GateOutcome = 'passed' | 'failed' | 'halted' | 'bypassed';

export type GateState = 'idle' | 'running' | GateOutcome;

/**
 * Persisted failure streak, one per project root
 */
export interface GateRecord {
    consecutive_failures: number;
    last_outcome: GateOutcome | 'reset' | null;
    last_run_at: string | null;
}

export type CheckStatus = 'passed' | 'failed' | 'timed_out' | 'errored';

/**
 * Result of a single check within one gate run
 */
export interface CheckOutcome {
    name: string;
    status: CheckStatus;
    detail?: string;
    durationMs: number;
}

export interface GatePolicy {
    threshold: number;
    escalationThreshold: number;
}

export interface HaltReason {
    code: 'FAILURE_THRESHOLD_REACHED';
    current: number;
    threshold: number;
}

export interface GateDecision {
    outcome: GateOutcome;
    consecutiveFailures: number;
    threshold: number;
    /** Blast radius exceeded the escalation threshold */
    escalate: boolean;
    reason?: HaltReason;
    failedChecks: string[];
    timedOutChecks: string[];
    summary: string;
}

export interface GateRunResult {
    decision: GateDecision;
    checks: CheckOutcome[];
    record: GateRecord;
    /** The stored record was unreadable and replaced by a fresh one */
    recoveredFromCorruptState: boolean;
    warnings: string[];
}
