#!/usr/bin/env node

import path from 'path';
import { Command } from 'commander';
import { ConfigDiagnostics, ConfigLoader } from '../config/ConfigLoader';
import { AnalyzerConfig } from '../config/schema';
import { AnalysisOrchestrator, AnalysisRun } from '../orchestrator/AnalysisOrchestrator';
import { ReportGenerator } from '../reporter/ReportGenerator';
import { GateStateStore } from '../gate/GateStateStore';
import { QualityGate } from '../gate/QualityGate';
import { CheckDetector } from '../gate/checks/CheckDetector';
import { AnalysisIssue } from '../models/AnalysisResult';
import { GateOutcome } from '../models/GateRecord';
import { EnvLoader } from '../utils/EnvLoader';
import { dirExists } from '../utils/fileUtils';
import logger from '../utils/logger';

export interface CliOptions {
    config?: string;
    files?: string[];
    vcs?: boolean;
    output?: string;
    force?: boolean;
    budget?: string;
    maxDepth?: string;
    threshold?: string;
    bypass?: boolean;
    verbose?: boolean;
}

/** Exit codes: success, failure or input error, gate halted */
export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_HALTED = 2;

const program = new Command();

program
    .name('repogenome')
    .description('Dependency graph, change impact, quality gate and a bounded project profile')
    .version('1.0.0');

const withCommon = (command: Command): Command => command
    .argument('[root]', 'Project root', '.')
    .option('-c, --config <path>', 'Config file (default: .repogenome.yml in the root or cwd)')
    .option('-v, --verbose', 'Debug logging');

withCommon(program.command('analyze'))
    .description('Scan, build the graph, assess the change set and write the profile')
    .option('-f, --files <paths...>', 'Changed files; otherwise read from version control')
    .option('--no-vcs', 'Do not ask version control for a change set')
    .option('-o, --output <dir>', 'Output directory (default: profile.output_dir under the root)')
    .option('--force', 'Regenerate the profile even when it is up to date')
    .option('--budget <chars>', 'Character budget of each profile document')
    .option('--max-depth <n>', 'Blast radius depth limit')
    .action(analyzeAction);

withCommon(program.command('graph'))
    .description('Print the dependency graph and stack signals as JSON')
    .action(graphAction);

withCommon(program.command('impact'))
    .description('Print the blast radius and cycles of a change set as JSON')
    .option('-f, --files <paths...>', 'Changed files; otherwise read from version control')
    .option('--max-depth <n>', 'Blast radius depth limit')
    .action(impactAction);

withCommon(program.command('gate'))
    .description('Run the lint and test checks through the failure circuit breaker')
    .option('--bypass', 'Skip the checks and keep the failure count')
    .option('--threshold <n>', 'Consecutive failures before runs are halted')
    .option('-f, --files <paths...>', 'Changed files used for escalation')
    .action(gateAction);

withCommon(program.command('gate-reset'))
    .description('Clear the consecutive failure count')
    .action(gateResetAction);

withCommon(program.command('profile'))
    .description('Write the project profile and print it')
    .option('-o, --output <dir>', 'Output directory (default: profile.output_dir under the root)')
    .option('--force', 'Regenerate the profile even when it is up to date')
    .option('--budget <chars>', 'Character budget of each profile document')
    .action(profileAction);

function printJSON(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

function fail(error: unknown): void {
    logger.error(`repogenome failed: ${error}`);
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_FAILED;
}

function parseNumber(value: string | undefined, flag: string, min: number): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
        throw new Error(`${flag} must be an integer >= ${min}, got '${value}'`);
    }
    return parsed;
}

/**
 * Apply CLI options to config
 */
export function applyCliOptions(config: AnalyzerConfig, options: CliOptions): AnalyzerConfig {
    const budget = parseNumber(options.budget, '--budget', 200);
    if (budget !== undefined) {
        config.profile.budget_chars = budget;
    }
    const maxDepth = parseNumber(options.maxDepth, '--max-depth', 0);
    if (maxDepth !== undefined) {
        config.impact.max_depth = maxDepth;
    }
    const threshold = parseNumber(options.threshold, '--threshold', 1);
    if (threshold !== undefined) {
        config.gate.failure_threshold = threshold;
    }
    if (options.verbose) {
        config.output.verbose = true;
    }
    return config;
}

async function loadConfig(root: string, options: CliOptions): Promise<{ config: AnalyzerConfig; diagnostics: ConfigDiagnostics }> {
    const loader = new ConfigLoader();
    const config = applyCliOptions(await loader.load(options.config, root), options);
    if (config.output.verbose) {
        logger.level = 'debug';
    }
    return { config, diagnostics: loader.getDiagnostics() };
}

async function runAnalysis(root: string, options: CliOptions, profile: boolean): Promise<{ run: AnalysisRun; config: AnalyzerConfig }> {
    const { config, diagnostics } = await loadConfig(root, options);
    const orchestrator = new AnalysisOrchestrator(config, diagnostics);
    const run = await orchestrator.analyze(root, {
        changedFiles: options.files,
        detectChanges: options.vcs !== false,
        profile,
    });
    if (run.result.status === 'error') {
        const first = run.result.issues.find(issue => issue.severity === 'error');
        console.error(`Error: ${first ? first.message : 'analysis failed'}`);
        process.exitCode = EXIT_FAILED;
    }
    return { run, config };
}

function outputDirOf(root: string, config: AnalyzerConfig, options: CliOptions): string {
    return options.output ? path.resolve(options.output) : path.resolve(root, config.profile.output_dir);
}

async function analyzeAction(root: string, options: CliOptions): Promise<void> {
    try {
        const { run, config } = await runAnalysis(root, options, true);
        const reports = await new ReportGenerator(outputDirOf(root, config, options)).generateReports(run, { force: options.force });
        const { profile, ...result } = run.result;
        printJSON({
            ...result,
            profile: profile && {
                used: profile.primary.used,
                budget: profile.primary.budget,
                omitted: profile.primary.omitted,
                moduleMaps: profile.moduleMaps.map(doc => doc.title),
            },
            reports,
        });
    } catch (error) {
        fail(error);
    }
}

async function graphAction(root: string, options: CliOptions): Promise<void> {
    try {
        const { run } = await runAnalysis(root, { ...options, vcs: false }, false);
        if (run.result.status === 'error') {
            printJSON({ status: run.result.status, issues: run.result.issues });
            return;
        }
        printJSON({ graph: run.result.graph, signals: run.result.signals });
    } catch (error) {
        fail(error);
    }
}

async function impactAction(root: string, options: CliOptions): Promise<void> {
    try {
        const { run } = await runAnalysis(root, options, false);
        printJSON({
            status: run.result.status,
            impact: run.result.impact ?? null,
            cycles: run.result.cycles,
            issues: run.result.issues,
        });
    } catch (error) {
        fail(error);
    }
}

/**
 * Gate commands never touch the state file of a root that is not there
 */
async function requireRoot(rootPath: string): Promise<boolean> {
    if (await dirExists(rootPath)) {
        return true;
    }
    const issue: AnalysisIssue = {
        stage: 'gate',
        kind: 'ROOT_NOT_FOUND',
        severity: 'error',
        message: `Root path ${rootPath} does not exist or is not a directory`,
        suggestion: 'Pass the path of an existing project directory',
    };
    logger.error(`Root path not found: ${rootPath}`);
    printJSON({ status: 'error', issues: [issue] });
    console.error(`Error: ${issue.message}`);
    process.exitCode = EXIT_FAILED;
    return false;
}

export function gateExitCode(outcome: GateOutcome): number {
    switch (outcome) {
        case 'halted':
            return EXIT_HALTED;
        case 'failed':
            return EXIT_FAILED;
        default:
            return EXIT_OK;
    }
}

async function gateAction(root: string, options: CliOptions): Promise<void> {
    try {
        const rootPath = path.resolve(root);
        if (!(await requireRoot(rootPath))) return;
        const { config } = await loadConfig(rootPath, options);

        let blastRadiusSize: number | undefined;
        if (options.files && options.files.length > 0) {
            const { run } = await runAnalysis(rootPath, { ...options, vcs: false }, false);
            blastRadiusSize = run.result.impact?.blastRadius.size;
        }

        const { checks, warnings } = await new CheckDetector().detect(rootPath, config.gate);
        warnings.forEach(warning => logger.warn(warning));

        const gate = new QualityGate(
            new GateStateStore(path.resolve(rootPath, config.gate.state_file)),
            checks,
            { threshold: config.gate.failure_threshold, escalationThreshold: config.impact.escalation_threshold }
        );
        const result = await gate.run({ bypass: options.bypass, blastRadiusSize });

        printJSON({ ...result, warnings: [...warnings, ...result.warnings] });
        console.error(result.decision.summary);
        process.exitCode = gateExitCode(result.decision.outcome);
    } catch (error) {
        fail(error);
    }
}

async function gateResetAction(root: string, options: CliOptions): Promise<void> {
    try {
        const rootPath = path.resolve(root);
        if (!(await requireRoot(rootPath))) return;
        const { config } = await loadConfig(rootPath, options);
        const record = await new GateStateStore(path.resolve(rootPath, config.gate.state_file)).reset();
        printJSON(record);
    } catch (error) {
        fail(error);
    }
}

async function profileAction(root: string, options: CliOptions): Promise<void> {
    try {
        const { run, config } = await runAnalysis(root, { ...options, vcs: false }, true);
        if (!run.result.profile) return;
        const reports = await new ReportGenerator(outputDirOf(root, config, options)).generateReports(run, { force: options.force });
        if (reports.profileSkipped) {
            console.error('Profile is up to date; use --force to regenerate');
        }
        process.stdout.write(run.result.profile.primary.text);
    } catch (error) {
        fail(error);
    }
}

// Only parse arguments if this module is run directly
if (require.main === module) {
    new EnvLoader().load();
    program.parseAsync(process.argv).catch(fail);
}

export { program };
