import path from 'path';
import { AnalysisRun } from '../orchestrator/AnalysisOrchestrator';
import { ProfileDocument } from '../models/Profile';
import { ensureDir, getModifiedTime, removeDir, writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';

export interface ReportOptions {
    /** Rewrite the profile even when it is newer than every scanned file */
    force?: boolean;
}

export interface ReportPaths {
    graphPath?: string;
    profilePath?: string;
    modulePaths: string[];
    /** The existing profile was newer than every scanned file and was left alone */
    profileSkipped: boolean;
}

/**
 * File name for a module map, `Module: api/v1` -> `api_v1.md`
 */
export function moduleMapFileName(doc: ProfileDocument): string {
    const name = doc.title.replace(/^Module:\s*/, '').replace(/[^A-Za-z0-9._-]+/g, '_');
    return `${name || 'module'}.md`;
}

/**
 * Writes analysis outputs under the output directory
 */
export class ReportGenerator {
    constructor(private readonly outputDir: string) {}

    async generateReports(run: AnalysisRun, options: ReportOptions = {}): Promise<ReportPaths> {
        const paths: ReportPaths = { modulePaths: [], profileSkipped: false };
        if (run.result.status === 'error') {
            logger.warn('Analysis failed; no reports written');
            return paths;
        }

        await ensureDir(this.outputDir);
        paths.graphPath = await this.generateGraphJSON(run);

        if (!run.result.profile) {
            return paths;
        }
        if (!options.force && await this.isProfileFresh(run.latestModifiedMs)) {
            logger.info('Profile is newer than every scanned file; skipping regeneration');
            paths.profileSkipped = true;
            return paths;
        }

        paths.profilePath = path.join(this.outputDir, 'profile.md');
        await writeFile(paths.profilePath, run.result.profile.primary.text);
        logger.info(`Profile generated: ${paths.profilePath}`);

        // Maps from earlier runs may name modules that no longer qualify
        const modulesDir = path.join(this.outputDir, 'modules');
        await removeDir(modulesDir);
        for (const doc of run.result.profile.moduleMaps) {
            const mapPath = path.join(modulesDir, moduleMapFileName(doc));
            await writeFile(mapPath, doc.text);
            paths.modulePaths.push(mapPath);
        }
        if (paths.modulePaths.length > 0) {
            logger.info(`Module maps generated: ${paths.modulePaths.length}`);
        }

        return paths;
    }

    /**
     * Generate the graph and signals JSON
     */
    private async generateGraphJSON(run: AnalysisRun): Promise<string> {
        const { result } = run;
        const jsonPath = path.join(this.outputDir, 'graph.json');
        const content = JSON.stringify({
            root: result.root,
            generatedAt: result.endTime,
            graph: result.graph,
            signals: result.signals,
            routes: result.routes,
            models: result.models,
            cycles: result.cycles,
        }, null, 2);
        await writeFile(jsonPath, `${content}\n`);
        logger.info(`JSON report generated: ${jsonPath}`);
        return jsonPath;
    }

    private async isProfileFresh(latestModifiedMs: number): Promise<boolean> {
        const profileTime = await getModifiedTime(path.join(this.outputDir, 'profile.md'));
        return profileTime !== null && profileTime >= latestModifiedMs;
    }
}
