export type CycleClassification = 'direct' | 'indirect';

/**
 * A representative simple cycle of one strongly connected component
 */
export interface Cycle {
    /** Cycle order, starting at the smallest module id */
    modules: string[];
    length: number;
    componentSize: number;
    classification: CycleClassification;
}

export type ImpactLevel = 'low' | 'medium' | 'high' | 'critical';

export interface SeedImpact {
    module: string;
    direct: string[];
    indirect: string[];
}

export interface BlastRadius {
    seeds: string[];
    /** Sorted union of everything reached from any seed */
    modules: string[];
    /** Reached modules that are not seeds */
    size: number;
    maxDepth: number | null;
    perSeed: SeedImpact[];
}

export type ChangeSource = 'explicit' | 'staged' | 'unstaged' | 'last-commit';

export interface ImpactReport {
    changeSource: ChangeSource;
    changedFiles: string[];
    /** Changed paths that are not modules of the graph */
    ignoredFiles: string[];
    blastRadius: BlastRadius;
    escalate: boolean;
    escalationThreshold: number;
    level: ImpactLevel;
    criticalSeeds: string[];
    affectedTests: string[];
    cycles: Cycle[];
}
