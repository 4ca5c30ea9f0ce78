import path from 'path';
import { ConfigLoader } from './config/ConfigLoader';
import { AnalysisOptions, AnalysisOrchestrator, AnalysisRun } from './orchestrator/AnalysisOrchestrator';
import { ReportGenerator, ReportOptions, ReportPaths } from './reporter/ReportGenerator';
import logger from './utils/logger';

export interface RunOptions extends AnalysisOptions, ReportOptions {
    configPath?: string;
    /** Skip writing graph.json and the profile files */
    dryRun?: boolean;
}

/**
 * Main entry point for programmatic usage
 */
export async function runAnalysis(rootPath: string, options: RunOptions = {}): Promise<{ run: AnalysisRun; reports?: ReportPaths }> {
    logger.info(`Starting analysis of ${rootPath}`);

    const configLoader = new ConfigLoader();
    const config = await configLoader.load(options.configPath, rootPath);

    const orchestrator = new AnalysisOrchestrator(config, configLoader.getDiagnostics());
    const run = await orchestrator.analyze(rootPath, options);

    if (options.dryRun) {
        return { run };
    }

    const outputDir = path.resolve(rootPath, config.profile.output_dir);
    const reports = await new ReportGenerator(outputDir).generateReports(run, { force: options.force });
    return { run, reports };
}

// Export main components for library usage
export { ConfigLoader, CONFIG_FILE_NAME } from './config/ConfigLoader';
export { FileWalker } from './walker/FileWalker';
export { SignalExtractor } from './analyzer/SignalExtractor';
export { SignalIndex } from './analyzer/SignalIndex';
export { GraphBuilder, logicalNameOf } from './graph/GraphBuilder';
export { ModuleGraph } from './graph/ModuleGraph';
export { ModuleResolver } from './graph/ModuleResolver';
export { blastRadius, classifyLevel, ImpactAnalyzer } from './impact/ImpactAnalyzer';
export { detectCycles, stronglyConnectedComponents } from './impact/CycleDetector';
export { AffectedTestSelector } from './impact/AffectedTestSelector';
export { ChangeSetProvider } from './repo/ChangeSetProvider';
export { decideGate, evaluateHalt } from './gate/GateDecision';
export { GateStateStore } from './gate/GateStateStore';
export { QualityGate } from './gate/QualityGate';
export { CheckDetector } from './gate/checks/CheckDetector';
export { CommandCheck } from './gate/checks/CommandCheck';
export { ProfileSummarizer } from './summarizer/ProfileSummarizer';
export { AnalysisOrchestrator } from './orchestrator/AnalysisOrchestrator';
export { ReportGenerator } from './reporter/ReportGenerator';
export type { GateCheck, CheckResult } from './gate/checks/GateCheck';
export * from './models/SourceFile';
export * from './models/ModuleGraph';
export * from './models/ImpactReport';
export * from './models/GateRecord';
export * from './models/Profile';
export * from './models/AnalysisResult';
export * from './config/schema';
