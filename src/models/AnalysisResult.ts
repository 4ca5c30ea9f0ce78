import { SerializedGraph } from './ModuleGraph';
import { Cycle, ImpactReport } from './ImpactReport';
import { Profile } from './Profile';
import { DataModel, RouteEntry } from './SourceFile';

export type IssueSeverity = 'info' | 'warning' | 'error';

export type IssueStage = 'config' | 'scan' | 'extract' | 'graph' | 'impact' | 'gate' | 'profile' | 'report';

/**
 * Represents a structured issue raised during a run
 *
 * Common issue kinds:
 * - ROOT_NOT_FOUND: the root path is missing or not a directory
 * - NO_FILES_MATCHED: the walker found nothing to analyze
 * - DIRECTORY_UNREADABLE: a directory was skipped during the walk
 * - FILE_UNREADABLE: a file could not be read for extraction
 * - UNRESOLVED_REFERENCES: local references that matched no module
 * - CHANGED_FILE_UNKNOWN: a changed path is not part of the graph
 * - NO_CHANGE_CONTEXT: no change set was given and none could be found
 * - CONFIG_FALLBACK_APPLIED: an invalid configuration value was replaced
 */
export interface AnalysisIssue {
    stage: IssueStage;
    kind: string;
    severity: IssueSeverity;
    message: string;
    suggestion: string;
    details?: string;
}

/**
 * Category -> value -> files where it was observed
 */
export type SignalSummary = Record<string, Record<string, string[]>>;

export interface FileStats {
    total: number;
    source: number;
    lines: number;
}

export interface DirectoryStats {
    path: string;
    total: number;
    source: number;
}

/**
 * Result of one analysis run
 */
export interface AnalysisResult {
    status: 'ok' | 'degraded' | 'error';
    root: string;
    startTime: string;
    endTime: string;
    duration: number;
    files: FileStats;
    directories: DirectoryStats[];
    graph?: SerializedGraph;
    signals: SignalSummary;
    routes: RouteEntry[];
    models: DataModel[];
    cycles: Cycle[];
    impact?: ImpactReport;
    profile?: Profile;
    warningCount: number;
    issues: AnalysisIssue[];
}
