import fs from 'fs';
import os from 'os';
import path from 'path';
import { QualityGate } from '../QualityGate';
import { GateStateStore } from '../GateStateStore';
import { CheckResult, GateCheck } from '../checks/GateCheck';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const policy = { threshold: 3, escalationThreshold: 20 };
const clock = () => new Date('2026-01-01T00:00:00.000Z');

function check(name: string, result: CheckResult, timeout = 1000) {
    const run = jest.fn(async (_signal: AbortSignal): Promise<CheckResult> => result);
    const gateCheck: GateCheck = { name, timeout, run };
    return { gateCheck, run };
}

describe('QualityGate', () => {
    let dir: string;
    let store: GateStateStore;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gate-'));
        store = new GateStateStore(path.join(dir, 'state', 'gate_state.json'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    const stored = () => JSON.parse(fs.readFileSync(store.filePath, 'utf-8'));

    it('halts after three failures without running the checks again', async () => {
        const { gateCheck, run } = check('test', { passed: false, detail: 'boom' });
        const gate = new QualityGate(store, [gateCheck], policy, clock);

        const outcomes: string[] = [];
        for (let i = 0; i < 4; i++) {
            outcomes.push((await gate.run()).decision.outcome);
        }

        expect(outcomes).toEqual(['failed', 'failed', 'failed', 'halted']);
        expect(run).toHaveBeenCalledTimes(3);
        expect(stored()).toEqual({
            consecutive_failures: 3,
            last_outcome: 'halted',
            last_run_at: '2026-01-01T00:00:00.000Z',
        });
        expect(gate.getState()).toBe('halted');
    });

    it('resets the streak when the checks pass', async () => {
        await store.write({ consecutive_failures: 2, last_outcome: 'failed', last_run_at: null });
        const gate = new QualityGate(store, [check('lint', { passed: true }).gateCheck], policy, clock);

        const result = await gate.run();

        expect(result.decision.outcome).toBe('passed');
        expect(result.checks).toEqual([{ name: 'lint', status: 'passed', durationMs: expect.any(Number) }]);
        expect(stored().consecutive_failures).toBe(0);
    });

    it('settles into the outcome of the checks it ran', async () => {
        const gate = new QualityGate(store, [check('test', { passed: false }).gateCheck], policy, clock);
        expect(gate.getState()).toBe('idle');

        await gate.run();
        expect(gate.getState()).toBe('failed');

        await store.reset(clock());
        const passing = new QualityGate(store, [check('test', { passed: true }).gateCheck], policy, clock);
        await passing.run();
        expect(passing.getState()).toBe('passed');
    });

    it('resumes after an explicit reset', async () => {
        await store.write({ consecutive_failures: 3, last_outcome: 'halted', last_run_at: null });
        const { gateCheck, run } = check('lint', { passed: true });
        const gate = new QualityGate(store, [gateCheck], policy, clock);

        expect((await gate.run()).decision.outcome).toBe('halted');
        await store.reset(clock());
        expect(stored()).toEqual({ consecutive_failures: 0, last_outcome: 'reset', last_run_at: '2026-01-01T00:00:00.000Z' });
        expect((await gate.run()).decision.outcome).toBe('passed');
        expect(run).toHaveBeenCalledTimes(1);
    });

    it('keeps the counter and skips checks on bypass', async () => {
        await store.write({ consecutive_failures: 4, last_outcome: 'halted', last_run_at: null });
        const { gateCheck, run } = check('lint', { passed: false });

        const result = await new QualityGate(store, [gateCheck], policy, clock).run({ bypass: true });

        expect(result.decision.outcome).toBe('bypassed');
        expect(run).not.toHaveBeenCalled();
        expect(stored().consecutive_failures).toBe(4);
    });

    it('starts fresh from a corrupt record', async () => {
        fs.mkdirSync(path.dirname(store.filePath), { recursive: true });
        fs.writeFileSync(store.filePath, '{ not json');

        const result = await new QualityGate(store, [check('lint', { passed: false }).gateCheck], policy, clock).run();

        expect(result.recoveredFromCorruptState).toBe(true);
        expect(result.warnings).toEqual([`Gate state at ${store.filePath} was corrupt and has been reset`]);
        expect(result.decision.consecutiveFailures).toBe(1);
    });

    it('records a check that outlives its timeout as timed out', async () => {
        const slow: GateCheck = {
            name: 'test',
            timeout: 50,
            run: signal => new Promise(resolve => {
                signal.addEventListener('abort', () => resolve({ passed: true }));
            }),
        };

        const result = await new QualityGate(store, [slow], policy, clock).run();

        expect(result.checks[0].status).toBe('timed_out');
        expect(result.decision.outcome).toBe('failed');
        expect(result.decision.timedOutChecks).toEqual(['test']);
    });

    it('records a throwing check as errored', async () => {
        const broken: GateCheck = {
            name: 'lint',
            timeout: 1000,
            run: async () => {
                throw new Error('spawn eslint ENOENT');
            },
        };

        const result = await new QualityGate(store, [broken], policy, clock).run();

        expect(result.checks[0]).toEqual({ name: 'lint', status: 'errored', detail: 'spawn eslint ENOENT', durationMs: expect.any(Number) });
        expect(result.decision.failedChecks).toEqual(['lint']);
    });
});

describe('GateStateStore', () => {
    it('treats a record of the wrong shape as corrupt', async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gate-store-'));
        const filePath = path.join(dir, 'gate_state.json');
        fs.writeFileSync(filePath, JSON.stringify({ consecutive_failures: -1 }));

        const { record, recovered } = await new GateStateStore(filePath).read();

        expect(recovered).toBe(true);
        expect(record).toEqual({ consecutive_failures: 0, last_outcome: null, last_run_at: null });
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('starts fresh when nothing is stored', async () => {
        const { record, recovered } = await new GateStateStore(path.join(os.tmpdir(), 'missing-gate', 'x.json')).read();

        expect(recovered).toBe(false);
        expect(record.consecutive_failures).toBe(0);
    });
});
