export interface CheckResult {
    passed: boolean;
    detail?: string;
}

/**
 * A single verification the gate runs. The gate enforces `timeout` and aborts `signal` when it expires.
 */
export interface GateCheck {
    readonly name: string;
    readonly timeout: number;
    run(signal: AbortSignal): Promise<CheckResult>;
}
