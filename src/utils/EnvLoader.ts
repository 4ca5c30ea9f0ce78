import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import logger from './logger';

export interface EnvLoadResult {
    loadedFrom: string[];
    tried: string[];
    errors: string[];
}

/**
 * Loads .env files for the tool itself from predictable locations.
 * The analyzed project's own .env is never read.
 */
export class EnvLoader {
    constructor(private readonly homeDir: string = os.homedir()) {}

    load(extraPaths: string[] = []): EnvLoadResult {
        const tried: string[] = [];
        const loadedFrom: string[] = [];
        const errors: string[] = [];

        for (const candidate of this.buildCandidatePaths(extraPaths)) {
            if (tried.includes(candidate)) continue;
            tried.push(candidate);

            if (!fs.existsSync(candidate)) {
                continue;
            }

            const result = dotenv.config({ path: candidate });
            if (result.error) {
                errors.push(result.error.message);
                logger.warn(`Failed to load env file ${candidate}: ${result.error.message}`);
                continue;
            }
            loadedFrom.push(candidate);
            logger.debug(`Loaded environment variables from ${candidate}`);
        }

        return { loadedFrom, tried, errors };
    }

    private buildCandidatePaths(extraPaths: string[]): string[] {
        return [
            ...extraPaths.map(p => path.resolve(p)),
            path.resolve(process.cwd(), '.env'),
            // Package root, when running from dist/
            path.resolve(__dirname, '../../.env'),
            path.join(this.homeDir, '.repogenome.env'),
        ];
    }
}
