import path from 'path';
import { DEFAULT_ESCALATION_THRESHOLD, DIRECT_CYCLE_MAX_LENGTH } from '../config/schema';
import { ModuleGraph } from '../graph/ModuleGraph';
import { BlastRadius, ChangeSource, ImpactLevel, ImpactReport, SeedImpact } from '../models/ImpactReport';
import logger from '../utils/logger';
import { PathNormalizer } from '../utils/PathNormalizer';
import { AffectedTestSelector } from './AffectedTestSelector';
import { detectCycles } from './CycleDetector';

const ENTRYPOINT_HINTS = new Set([
    'src/index.js', 'src/index.ts', 'src/main.js', 'src/main.ts',
    'index.js', 'index.ts', 'main.py', 'app.py', 'server.js', 'server.ts',
]);

const CONFIG_FILE_NAMES = new Set([
    'package.json', 'tsconfig.json', 'pyproject.toml', 'requirements.txt', '.env', '.env.local',
    'vite.config.js', 'vite.config.ts', 'webpack.config.js', 'next.config.js', 'next.config.mjs',
]);

/** Tried in order when a changed path has no extension */
const EXPANSION_SUFFIXES = [
    '.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.vue', '.svelte', '.py',
    '/index.ts', '/index.tsx', '/index.js', '/index.jsx', '/__init__.py',
];

export interface ImpactOptions {
    escalationThreshold?: number;
    maxDepth?: number | null;
    directCycleMaxLength?: number;
}

export interface ImpactRequest {
    rootPath: string;
    changedFiles: string[];
    changeSource: ChangeSource;
}

export interface ImpactOutcome {
    report: ImpactReport;
    warnings: string[];
}

/**
 * True for entry points and project-level configuration
 */
export function isEntryOrConfig(moduleId: string): boolean {
    const lowered = moduleId.toLowerCase();
    if (ENTRYPOINT_HINTS.has(lowered)) return true;
    if (CONFIG_FILE_NAMES.has(path.posix.basename(lowered))) return true;
    return lowered.includes('/config/')
        || lowered.startsWith('config/')
        || lowered.endsWith('.config.js')
        || lowered.endsWith('.config.ts');
}

export function classifyLevel(directDependents: number, critical: boolean): ImpactLevel {
    if (critical || directDependents > 10) return 'critical';
    if (directDependents >= 5) return 'high';
    if (directDependents >= 2) return 'medium';
    return 'low';
}

/**
 * Modules reachable from the seeds along "is depended upon by" edges.
 *
 * A seed is part of the set only when some seed reaches it through at least one edge.
 */
export function blastRadius(graph: ModuleGraph, seeds: string[], maxDepth: number | null = null): BlastRadius {
    const orderedSeeds = [...new Set(seeds.filter(seed => graph.has(seed)))].sort();
    const union = new Set<string>();
    const perSeed: SeedImpact[] = [];

    for (const seed of orderedSeeds) {
        const reached = new Set<string>();
        const depths = new Map<string, number>([[seed, 0]]);
        const queue = [seed];

        for (let head = 0; head < queue.length; head++) {
            const current = queue[head];
            const depth = depths.get(current) ?? 0;
            if (maxDepth !== null && depth >= maxDepth) continue;

            for (const dependent of graph.dependentsOf(current)) {
                reached.add(dependent);
                if (!depths.has(dependent)) {
                    depths.set(dependent, depth + 1);
                    queue.push(dependent);
                }
            }
        }

        const direct = maxDepth === 0 ? [] : [...graph.dependentsOf(seed)];
        const directSet = new Set(direct);
        perSeed.push({
            module: seed,
            direct,
            indirect: [...reached].filter(id => id !== seed && !directSet.has(id)).sort(),
        });
        reached.forEach(id => union.add(id));
    }

    const seedSet = new Set(orderedSeeds);
    return {
        seeds: orderedSeeds,
        modules: [...union].sort(),
        size: [...union].filter(id => !seedSet.has(id)).length,
        maxDepth,
        perSeed,
    };
}

/**
 * Change-impact report for a change set
 */
export class ImpactAnalyzer {
    private readonly escalationThreshold: number;
    private readonly maxDepth: number | null;
    private readonly directCycleMaxLength: number;

    constructor(
        options: ImpactOptions = {},
        private readonly testSelector: AffectedTestSelector = new AffectedTestSelector()
    ) {
        this.escalationThreshold = options.escalationThreshold ?? DEFAULT_ESCALATION_THRESHOLD;
        this.maxDepth = options.maxDepth ?? null;
        this.directCycleMaxLength = options.directCycleMaxLength ?? DIRECT_CYCLE_MAX_LENGTH;
    }

    /**
     * Map changed paths onto graph modules. Paths outside the root or the graph are reported.
     */
    normalizeChangedFiles(graph: ModuleGraph, rootPath: string, changedFiles: string[]): {
        changed: string[];
        seeds: string[];
        ignored: string[];
        warnings: string[];
    } {
        const changed = new Set<string>();
        const seeds = new Set<string>();
        const ignored = new Set<string>();
        const warnings: string[] = [];

        for (const raw of changedFiles) {
            const trimmed = raw.trim();
            if (!trimmed) continue;
            const id = PathNormalizer.toModuleId(rootPath, PathNormalizer.toUnixPath(trimmed).replace(/^\.\//, ''));
            if (id === null) {
                warnings.push(`Changed path ${trimmed} is outside ${rootPath}`);
                continue;
            }

            const target = graph.has(id) ? id : EXPANSION_SUFFIXES.map(suffix => `${id}${suffix}`).find(candidate => graph.has(candidate));
            changed.add(target ?? id);
            if (target) {
                seeds.add(target);
            } else {
                ignored.add(id);
                warnings.push(`Changed path ${id} is not a module of the graph`);
            }
        }

        return {
            changed: [...changed].sort(),
            seeds: [...seeds].sort(),
            ignored: [...ignored].sort(),
            warnings,
        };
    }

    async analyze(graph: ModuleGraph, request: ImpactRequest): Promise<ImpactOutcome> {
        const { changed, seeds, ignored, warnings } = this.normalizeChangedFiles(graph, request.rootPath, request.changedFiles);
        warnings.forEach(warning => logger.warn(warning));

        const radius = blastRadius(graph, seeds, this.maxDepth);
        const directDependents = new Set(radius.perSeed.flatMap(seed => seed.direct));
        const criticalSeeds = changed.filter(isEntryOrConfig);
        const impacted = new Set([...radius.seeds, ...radius.modules]);
        const cycles = detectCycles(graph, this.directCycleMaxLength)
            .filter(cycle => cycle.modules.some(id => impacted.has(id)));

        let affectedTests: string[] = [];
        try {
            affectedTests = await this.testSelector.select(request.rootPath, changed);
        } catch (error) {
            const message = `Affected test selection failed: ${error}`;
            logger.warn(message);
            warnings.push(message);
        }

        const escalate = radius.size > this.escalationThreshold;
        if (escalate) {
            logger.warn(`Blast radius ${radius.size} exceeds escalation threshold ${this.escalationThreshold}`);
        }

        return {
            report: {
                changeSource: request.changeSource,
                changedFiles: changed,
                ignoredFiles: ignored,
                blastRadius: radius,
                escalate,
                escalationThreshold: this.escalationThreshold,
                level: classifyLevel(directDependents.size, criticalSeeds.length > 0),
                criticalSeeds,
                affectedTests,
                cycles,
            },
            warnings,
        };
    }
}
