import path from 'path';
import { GateRecord } from '../models/GateRecord';
import { ensureDir, fileExists, readFile, writeFileAtomic } from '../utils/fileUtils';
import logger from '../utils/logger';

const OUTCOMES = new Set(['passed', 'failed', 'halted', 'bypassed', 'reset']);

export interface StoredRecord {
    record: GateRecord;
    /** The file existed but could not be used */
    recovered: boolean;
}

export function freshRecord(): GateRecord {
    return { consecutive_failures: 0, last_outcome: null, last_run_at: null };
}

function isRecord(value: unknown): value is GateRecord {
    if (typeof value !== 'object' || value === null || !('consecutive_failures' in value)) return false;
    const failures = value.consecutive_failures;
    const outcome = 'last_outcome' in value ? value.last_outcome ?? null : null;
    const runAt = 'last_run_at' in value ? value.last_run_at ?? null : null;
    return typeof failures === 'number'
        && Number.isInteger(failures)
        && failures >= 0
        && (outcome === null || (typeof outcome === 'string' && OUTCOMES.has(outcome)))
        && (runAt === null || typeof runAt === 'string');
}

/**
 * Persists the gate's failure streak as JSON
 */
export class GateStateStore {
    constructor(readonly filePath: string) {}

    async read(): Promise<StoredRecord> {
        if (!(await fileExists(this.filePath))) {
            return { record: freshRecord(), recovered: false };
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(await readFile(this.filePath));
        } catch (error) {
            logger.error(`Gate state ${this.filePath} is unreadable, starting fresh: ${error}`);
            return { record: freshRecord(), recovered: true };
        }

        if (!isRecord(parsed)) {
            logger.error(`Gate state ${this.filePath} has an invalid shape, starting fresh`);
            return { record: freshRecord(), recovered: true };
        }

        return {
            record: {
                consecutive_failures: parsed.consecutive_failures,
                last_outcome: parsed.last_outcome ?? null,
                last_run_at: parsed.last_run_at ?? null,
            },
            recovered: false,
        };
    }

    async write(record: GateRecord): Promise<void> {
        await ensureDir(path.dirname(this.filePath));
        await writeFileAtomic(this.filePath, `${JSON.stringify(record, null, 2)}\n`);
    }

    async reset(now: Date = new Date()): Promise<GateRecord> {
        const record: GateRecord = { consecutive_failures: 0, last_outcome: 'reset', last_run_at: now.toISOString() };
        await this.write(record);
        logger.info(`Gate state reset: ${this.filePath}`);
        return record;
    }
}
