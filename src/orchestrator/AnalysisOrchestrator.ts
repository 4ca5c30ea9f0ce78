import path from 'path';
import { AnalyzerConfig, DEFAULT_CONFIG } from '../config/schema';
import { ConfigDiagnostics } from '../config/ConfigLoader';
import { FileWalker } from '../walker/FileWalker';
import { SignalExtractor } from '../analyzer/SignalExtractor';
import { SignalIndex } from '../analyzer/SignalIndex';
import { isSourceFile } from '../analyzer/FileClassifier';
import { joinRoutePath } from '../analyzer/RouteExtractor';
import { GraphBuilder } from '../graph/GraphBuilder';
import { ModuleGraph } from '../graph/ModuleGraph';
import { ModuleResolver } from '../graph/ModuleResolver';
import { detectCycles } from '../impact/CycleDetector';
import { ImpactAnalyzer } from '../impact/ImpactAnalyzer';
import { AffectedTestSelector } from '../impact/AffectedTestSelector';
import { ChangeSet, ChangeSetProvider } from '../repo/ChangeSetProvider';
import { ProfileSummarizer } from '../summarizer/ProfileSummarizer';
import { AnalysisIssue, AnalysisResult, DirectoryStats, FileStats } from '../models/AnalysisResult';
import { ImpactReport } from '../models/ImpactReport';
import { FileDescriptor, FileExtraction, RouteEntry } from '../models/SourceFile';
import { dirExists, readFile } from '../utils/fileUtils';
import logger from '../utils/logger';

/**
 * Analysis state
 */
export type AnalysisState =
    | 'INIT'
    | 'SCAN'
    | 'EXTRACT'
    | 'GRAPH'
    | 'IMPACT'
    | 'SUMMARIZE'
    | 'COMPLETE'
    | 'FAILED';

export interface AnalysisOptions {
    /** Explicit change set; when absent the repository is asked */
    changedFiles?: string[];
    /** Ask version control for a change set when none is given (default: true) */
    detectChanges?: boolean;
    /** Build the profile documents (default: true) */
    profile?: boolean;
    projectName?: string;
}

/**
 * Result of a run together with the in-memory pieces the report writer and the CLI reuse
 */
export interface AnalysisRun {
    result: AnalysisResult;
    graph?: ModuleGraph;
    signals: SignalIndex;
    /** Newest modification time among scanned files */
    latestModifiedMs: number;
}

export type ChangeSetProviderFactory = (rootPath: string) => ChangeSetProvider;

function topDirectory(id: string): string {
    const slash = id.indexOf('/');
    return slash === -1 ? '.' : id.slice(0, slash);
}

/**
 * Routes with the prefix of every router mount that points at their file.
 * A file mounted twice lists its routes under both prefixes.
 */
export function applyMountPrefixes(extractions: FileExtraction[], resolver: ModuleResolver): RouteEntry[] {
    const prefixes = new Map<string, string[]>();
    for (const file of extractions) {
        for (const mount of file.routeMounts) {
            const resolution = resolver.resolve(file.path, mount.specifier, file.language);
            if (resolution.status !== 'resolved') continue;
            const list = prefixes.get(resolution.target) ?? [];
            if (!list.includes(mount.prefix)) list.push(mount.prefix);
            prefixes.set(resolution.target, list);
        }
    }

    const routes: RouteEntry[] = [];
    for (const file of extractions) {
        const mounted = prefixes.get(file.path);
        for (const route of file.routes) {
            if (!mounted) {
                routes.push(route);
                continue;
            }
            for (const prefix of mounted) {
                routes.push({ ...route, path: joinRoutePath(prefix, route.path) });
            }
        }
    }
    return routes;
}

/**
 * Runs one analysis: walk, extract, build the graph, then impact and profile
 */
export class AnalysisOrchestrator {
    private state: AnalysisState = 'INIT';
    private issues: AnalysisIssue[] = [];
    private readonly extractor = new SignalExtractor();

    constructor(
        private readonly config: AnalyzerConfig = DEFAULT_CONFIG,
        private readonly configDiagnostics?: ConfigDiagnostics,
        private readonly changeSets: ChangeSetProviderFactory = rootPath => new ChangeSetProvider(rootPath)
    ) {}

    getState(): AnalysisState {
        return this.state;
    }

    async analyze(rootInput: string, options: AnalysisOptions = {}): Promise<AnalysisRun> {
        const startTime = new Date().toISOString();
        const startTimestamp = Date.now();
        const root = path.resolve(rootInput);
        const signals = new SignalIndex();
        this.issues = [...(this.configDiagnostics?.issues ?? [])];
        this.setState('INIT');

        try {
            if (!(await dirExists(root))) {
                this.addIssue({
                    stage: 'scan',
                    kind: 'ROOT_NOT_FOUND',
                    severity: 'error',
                    message: `Root path ${root} does not exist or is not a directory`,
                    suggestion: 'Pass the path of an existing project directory',
                });
                logger.error(`Root path not found: ${root}`);
                return this.failedRun(root, startTime, startTimestamp, signals);
            }

            // SCAN
            this.setState('SCAN');
            const walker = FileWalker.fromConfig(root, this.config.walker);
            const files = await walker.collect();
            for (const warning of walker.warnings) {
                this.addIssue({
                    stage: 'scan',
                    kind: 'DIRECTORY_UNREADABLE',
                    severity: warning.path === '.' ? 'error' : 'warning',
                    message: `Directory ${warning.path} could not be read`,
                    suggestion: 'Check the directory permissions',
                    details: warning.message,
                });
            }
            if (walker.warnings.some(warning => warning.path === '.')) {
                return this.failedRun(root, startTime, startTimestamp, signals);
            }
            if (files.length === 0) {
                this.addIssue({
                    stage: 'scan',
                    kind: 'NO_FILES_MATCHED',
                    severity: 'error',
                    message: `No files under ${root} matched the walker filters`,
                    suggestion: 'Check walker.include_extensions and walker.exclude_dirs',
                });
                logger.error(`No files matched under ${root}`);
                return this.failedRun(root, startTime, startTimestamp, signals);
            }
            logger.info(`Scanned ${files.length} files under ${root}`);

            // EXTRACT
            this.setState('EXTRACT');
            const extractions = await this.extractAll(files);
            extractions.forEach(file => signals.addAll(file.signals));

            // GRAPH
            this.setState('GRAPH');
            const { graph, diagnostics, resolver } = new GraphBuilder({
                aliasPrefixes: this.config.graph.alias_prefixes,
                includeTests: this.config.graph.include_tests,
                maxUnresolvedSamples: this.config.graph.max_unresolved_samples,
            }).build(extractions, files.map(file => file.path));

            if (diagnostics.unresolved > 0) {
                this.addIssue({
                    stage: 'graph',
                    kind: 'UNRESOLVED_REFERENCES',
                    severity: 'info',
                    message: `${diagnostics.unresolved} local reference(s) matched no module`,
                    suggestion: 'Add missing alias prefixes under graph.alias_prefixes',
                    details: diagnostics.unresolvedSamples.map(sample => `${sample.from}: ${sample.specifier}`).join(', '),
                });
            }
            const routes = applyMountPrefixes(extractions, resolver);
            const models = extractions.flatMap(file => file.models);
            const cycles = detectCycles(graph, this.config.impact.direct_cycle_max_length);

            // IMPACT
            let impact: ImpactReport | undefined;
            if (options.changedFiles !== undefined || options.detectChanges !== false) {
                this.setState('IMPACT');
                impact = await this.analyzeImpact(root, graph, options.changedFiles);
            }

            const result: AnalysisResult = {
                status: 'ok',
                root,
                startTime,
                endTime: '',
                duration: 0,
                files: this.fileStats(files, extractions),
                directories: this.directoryStats(files),
                graph: graph.serialize(diagnostics),
                signals: signals.toJSON(),
                routes,
                models,
                cycles,
                impact,
                warningCount: 0,
                issues: this.issues,
            };

            // SUMMARIZE
            if (options.profile !== false) {
                this.setState('SUMMARIZE');
                result.profile = new ProfileSummarizer({
                    budget: this.config.profile.budget_chars,
                    maxModuleMaps: this.config.profile.max_module_maps,
                    minModuleFiles: this.config.profile.min_module_files,
                    slots: this.config.profile.slots,
                }).summarize({
                    projectName: options.projectName ?? path.basename(root),
                    generatedAt: startTime,
                    files: result.files,
                    directories: result.directories,
                    signals,
                    graph,
                    routes,
                    models,
                    cycles,
                    impact,
                    notes: this.profileNotes(),
                });
            }

            this.finish(result, startTimestamp);
            this.setState('COMPLETE');
            logger.info(`Analysis of ${root} completed with status: ${result.status}`);

            return {
                result,
                graph,
                signals,
                latestModifiedMs: files.reduce((latest, file) => Math.max(latest, file.mtimeMs), 0),
            };
        } catch (error) {
            logger.error(`Analysis failed: ${error}`);
            this.addIssue({
                stage: this.stageOf(this.state),
                kind: 'ANALYSIS_FAILED',
                severity: 'error',
                message: error instanceof Error ? error.message : String(error),
                suggestion: 'Run again with LOG_LEVEL=debug to see where it stopped',
            });
            return this.failedRun(root, startTime, startTimestamp, signals);
        }
    }

    private async extractAll(files: FileDescriptor[]): Promise<FileExtraction[]> {
        const extractions: FileExtraction[] = [];
        for (const file of files) {
            let content: string;
            try {
                content = await readFile(file.absolutePath);
            } catch (error) {
                logger.warn(`Skipping unreadable file ${file.path}: ${error}`);
                this.addIssue({
                    stage: 'extract',
                    kind: 'FILE_UNREADABLE',
                    severity: 'warning',
                    message: `File ${file.path} could not be read`,
                    suggestion: 'Check the file permissions',
                    details: error instanceof Error ? error.message : String(error),
                });
                continue;
            }
            extractions.push(this.extractor.extract(file.path, content));
        }
        return extractions;
    }

    private async analyzeImpact(root: string, graph: ModuleGraph, changedFiles?: string[]): Promise<ImpactReport | undefined> {
        let changeSet: ChangeSet;
        try {
            changeSet = await this.changeSets(root).resolve(changedFiles);
        } catch (error) {
            logger.warn(`Change set lookup failed: ${error}`);
            this.addIssue({
                stage: 'impact',
                kind: 'NO_CHANGE_CONTEXT',
                severity: 'warning',
                message: 'Version control could not be queried; impact analysis skipped',
                suggestion: 'Pass the changed files explicitly',
                details: error instanceof Error ? error.message : String(error),
            });
            return undefined;
        }
        if (changeSet.outcome === 'no-vcs' || changeSet.outcome === 'no-changes') {
            this.addIssue({
                stage: 'impact',
                kind: 'NO_CHANGE_CONTEXT',
                severity: 'info',
                message: changeSet.outcome === 'no-vcs'
                    ? 'No version control found; impact analysis skipped'
                    : 'No staged, unstaged or committed changes found; impact analysis skipped',
                suggestion: 'Pass the changed files explicitly',
            });
            logger.info(`Impact analysis skipped: ${changeSet.outcome}`);
            return undefined;
        }

        const analyzer = new ImpactAnalyzer(
            {
                escalationThreshold: this.config.impact.escalation_threshold,
                maxDepth: this.config.impact.max_depth,
                directCycleMaxLength: this.config.impact.direct_cycle_max_length,
            },
            new AffectedTestSelector(this.config.walker.exclude_dirs)
        );
        const { report, warnings } = await analyzer.analyze(graph, {
            rootPath: root,
            changedFiles: changeSet.files,
            changeSource: changeSet.outcome,
        });

        for (const warning of warnings) {
            this.addIssue({
                stage: 'impact',
                kind: 'CHANGED_FILE_UNKNOWN',
                severity: 'warning',
                message: warning,
                suggestion: 'Pass paths of scanned source files relative to the root',
            });
        }
        return report;
    }

    private fileStats(files: FileDescriptor[], extractions: FileExtraction[]): FileStats {
        const sources = extractions.filter(file => isSourceFile(file.path));
        return {
            total: files.length,
            source: sources.length,
            lines: sources.reduce((sum, file) => sum + file.lines, 0),
        };
    }

    private directoryStats(files: FileDescriptor[]): DirectoryStats[] {
        const stats = new Map<string, DirectoryStats>();
        for (const file of files) {
            const dir = topDirectory(file.path);
            const entry = stats.get(dir) ?? { path: dir, total: 0, source: 0 };
            entry.total++;
            if (isSourceFile(file.path)) entry.source++;
            stats.set(dir, entry);
        }
        return [...stats.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    }

    private profileNotes(): string[] {
        return this.issues
            .filter(issue => issue.severity !== 'info' || issue.kind === 'UNRESOLVED_REFERENCES')
            .map(issue => issue.message);
    }

    private finish(result: AnalysisResult, startTimestamp: number): void {
        result.endTime = new Date().toISOString();
        result.duration = Date.now() - startTimestamp;
        result.warningCount = result.issues.filter(issue => issue.severity === 'warning').length;
        if (result.issues.some(issue => issue.severity === 'error')) {
            result.status = 'error';
        } else if (result.warningCount > 0) {
            result.status = 'degraded';
        }
    }

    private failedRun(root: string, startTime: string, startTimestamp: number, signals: SignalIndex): AnalysisRun {
        this.setState('FAILED');
        const result: AnalysisResult = {
            status: 'error',
            root,
            startTime,
            endTime: '',
            duration: 0,
            files: { total: 0, source: 0, lines: 0 },
            directories: [],
            signals: signals.toJSON(),
            routes: [],
            models: [],
            cycles: [],
            warningCount: 0,
            issues: this.issues,
        };
        this.finish(result, startTimestamp);
        return { result, signals, latestModifiedMs: 0 };
    }

    private stageOf(state: AnalysisState): AnalysisIssue['stage'] {
        switch (state) {
            case 'EXTRACT':
                return 'extract';
            case 'GRAPH':
                return 'graph';
            case 'IMPACT':
                return 'impact';
            case 'SUMMARIZE':
                return 'profile';
            default:
                return 'scan';
        }
    }

    private addIssue(issue: AnalysisIssue): void {
        this.issues.push(issue);
    }

    private setState(state: AnalysisState): void {
        this.state = state;
        logger.info(`Analysis state: ${state}`);
    }
}
