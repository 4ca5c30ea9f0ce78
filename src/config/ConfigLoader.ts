import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { AnalyzerConfig, CheckCommandConfig, DEFAULT_CONFIG, ProfileSlots } from './schema';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';
import { AnalysisIssue } from '../models/AnalysisResult';

export const CONFIG_FILE_NAME = '.repogenome.yml';

type RawSection = Record<string, unknown>;

export interface ConfigFallback {
    field: string;
    original: string;
    resolved: string;
    reason: string;
}

/**
 * Where the configuration came from and what had to be corrected
 */
export interface ConfigDiagnostics {
    configSource: string;
    fallbacksApplied: ConfigFallback[];
    issues: AnalysisIssue[];
}

function isRecord(value: unknown): value is RawSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and validate configuration
 */
export class ConfigLoader {
    private configSource: string = 'defaults';
    private fallbacksApplied: ConfigFallback[] = [];
    private configIssues: AnalysisIssue[] = [];

    /**
     * Load configuration from an explicit file, the project root, the working directory, or defaults
     */
    async load(configPath?: string, projectRoot?: string): Promise<AnalyzerConfig> {
        let raw: RawSection = {};

        if (configPath) {
            raw = await this.loadFromFile(configPath);
            this.configSource = configPath;
        } else {
            const candidates = [
                ...(projectRoot ? [path.join(path.resolve(projectRoot), CONFIG_FILE_NAME)] : []),
                path.join(process.cwd(), CONFIG_FILE_NAME),
            ];
            for (const candidate of candidates) {
                if (await fileExists(candidate)) {
                    raw = await this.loadFromFile(candidate);
                    this.configSource = candidate;
                    break;
                }
            }
        }

        const merged = this.mergeWithDefaults(raw);
        this.applyEnvironmentOverrides(merged);

        if (this.fallbacksApplied.length > 0) {
            logger.warn(`Applied ${this.fallbacksApplied.length} configuration fallback(s)`);
        }
        logger.debug(`Configuration loaded from: ${this.configSource}`);
        return merged;
    }

    getDiagnostics(): ConfigDiagnostics {
        return {
            configSource: this.configSource,
            fallbacksApplied: this.fallbacksApplied,
            issues: this.configIssues,
        };
    }

    private async loadFromFile(filePath: string): Promise<RawSection> {
        try {
            const content = await fs.readFile(filePath, 'utf-8');
            const parsed: unknown = yaml.load(content);
            if (parsed === undefined || parsed === null) {
                return {};
            }
            if (!isRecord(parsed)) {
                logger.warn(`Ignoring config ${filePath}: top level must be a mapping`);
                return {};
            }
            logger.info(`Loaded config from: ${filePath}`);
            return parsed;
        } catch (error) {
            logger.warn(`Failed to load config from ${filePath}: ${error}`);
            return {};
        }
    }

    private mergeWithDefaults(raw: RawSection): AnalyzerConfig {
        const walker = this.section(raw, 'walker');
        const graph = this.section(raw, 'graph');
        const impact = this.section(raw, 'impact');
        const gate = this.section(raw, 'gate');
        const profile = this.section(raw, 'profile');
        const output = this.section(raw, 'output');
        const defaults = DEFAULT_CONFIG;

        return {
            walker: {
                exclude_dirs: this.stringList(walker, 'walker.exclude_dirs', defaults.walker.exclude_dirs),
                include_extensions: this.stringList(walker, 'walker.include_extensions', defaults.walker.include_extensions)
                    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()),
                max_file_size: this.number(walker, 'walker.max_file_size', defaults.walker.max_file_size, 1),
                follow_symlinks: this.boolean(walker, 'walker.follow_symlinks', defaults.walker.follow_symlinks),
            },
            graph: {
                alias_prefixes: this.stringRecord(graph, 'graph.alias_prefixes', defaults.graph.alias_prefixes),
                include_tests: this.boolean(graph, 'graph.include_tests', defaults.graph.include_tests),
                max_unresolved_samples: this.number(graph, 'graph.max_unresolved_samples', defaults.graph.max_unresolved_samples, 0),
            },
            impact: {
                max_depth: impact.max_depth === null
                    ? null
                    : this.optionalNumber(impact, 'impact.max_depth', defaults.impact.max_depth),
                escalation_threshold: this.number(impact, 'impact.escalation_threshold', defaults.impact.escalation_threshold, 0),
                direct_cycle_max_length: this.number(impact, 'impact.direct_cycle_max_length', defaults.impact.direct_cycle_max_length, 2),
            },
            gate: {
                failure_threshold: this.number(gate, 'gate.failure_threshold', defaults.gate.failure_threshold, 1),
                state_file: this.string(gate, 'gate.state_file', defaults.gate.state_file),
                lint: this.checkCommand(gate, 'lint', defaults.gate.lint),
                test: this.checkCommand(gate, 'test', defaults.gate.test),
            },
            profile: {
                budget_chars: this.number(profile, 'profile.budget_chars', defaults.profile.budget_chars, 200),
                max_module_maps: this.number(profile, 'profile.max_module_maps', defaults.profile.max_module_maps, 0),
                min_module_files: this.number(profile, 'profile.min_module_files', defaults.profile.min_module_files, 1),
                output_dir: this.string(profile, 'profile.output_dir', defaults.profile.output_dir),
                slots: this.slots(this.section(profile, 'slots'), defaults.profile.slots),
            },
            output: {
                verbose: this.boolean(output, 'output.verbose', defaults.output.verbose),
            },
        };
    }

    /**
     * Apply environment variable overrides
     */
    private applyEnvironmentOverrides(config: AnalyzerConfig): void {
        const env: RawSection = {
            failure_threshold: this.envNumber('REPOGENOME_GATE_THRESHOLD'),
            budget_chars: this.envNumber('REPOGENOME_PROFILE_BUDGET'),
            escalation_threshold: this.envNumber('REPOGENOME_ESCALATION_THRESHOLD'),
            max_depth: this.envNumber('REPOGENOME_MAX_DEPTH'),
        };

        config.gate.failure_threshold = this.number(env, 'REPOGENOME_GATE_THRESHOLD', config.gate.failure_threshold, 1, 'failure_threshold');
        config.profile.budget_chars = this.number(env, 'REPOGENOME_PROFILE_BUDGET', config.profile.budget_chars, 200, 'budget_chars');
        config.impact.escalation_threshold = this.number(env, 'REPOGENOME_ESCALATION_THRESHOLD', config.impact.escalation_threshold, 0, 'escalation_threshold');
        config.impact.max_depth = this.optionalNumber(env, 'REPOGENOME_MAX_DEPTH', config.impact.max_depth, 'max_depth');

        if (process.env.VERBOSE === 'true') {
            config.output.verbose = true;
        }
    }

    private envNumber(name: string): unknown {
        const value = process.env[name];
        if (value === undefined || value.trim() === '') {
            return undefined;
        }
        const parsed = Number(value);
        return Number.isNaN(parsed) ? value : parsed;
    }

    private section(raw: RawSection, key: string): RawSection {
        const value = raw[key];
        if (value === undefined || value === null) {
            return {};
        }
        if (!isRecord(value)) {
            this.recordFallback(key, value, 'defaults', 'Expected a mapping');
            return {};
        }
        return value;
    }

    private slots(raw: RawSection, defaults: ProfileSlots): ProfileSlots {
        const slot = (key: keyof ProfileSlots): number =>
            this.number(raw, `profile.slots.${key}`, defaults[key], 0, key);
        return {
            examples_per_category: slot('examples_per_category'),
            directories: slot('directories'),
            key_files: slot('key_files'),
            data_models: slot('data_models'),
            model_fields: slot('model_fields'),
            routes: slot('routes'),
            routes_per_file: slot('routes_per_file'),
            module_dependencies: slot('module_dependencies'),
            cycles: slot('cycles'),
        };
    }

    private checkCommand(gate: RawSection, name: 'lint' | 'test', defaults: CheckCommandConfig): CheckCommandConfig {
        const raw = this.section(gate, name);
        const command = raw.command;
        return {
            enabled: this.boolean(raw, `gate.${name}.enabled`, defaults.enabled),
            command: typeof command === 'string' && command.trim() !== '' ? command.trim() : defaults.command,
            timeout: this.number(raw, `gate.${name}.timeout`, defaults.timeout, 1),
        };
    }

    /** Reads a whole number of at least `min`; `key` defaults to the last segment of `field` */
    private number(raw: RawSection, field: string, fallback: number, min: number, key?: string): number {
        const value = raw[key ?? this.lastSegment(field)];
        if (value === undefined) {
            return fallback;
        }
        if (typeof value === 'number' && Number.isInteger(value) && value >= min) {
            return value;
        }
        this.recordFallback(field, value, String(fallback), `Expected a whole number >= ${min}`);
        return fallback;
    }

    private optionalNumber(raw: RawSection, field: string, fallback: number | null, key?: string): number | null {
        const value = raw[key ?? this.lastSegment(field)];
        if (value === undefined) {
            return fallback;
        }
        if (typeof value === 'number' && Number.isInteger(value) && value >= 1) {
            return value;
        }
        this.recordFallback(field, value, String(fallback), 'Expected a whole number >= 1');
        return fallback;
    }

    private boolean(raw: RawSection, field: string, fallback: boolean): boolean {
        const value = raw[this.lastSegment(field)];
        if (value === undefined) {
            return fallback;
        }
        if (typeof value === 'boolean') {
            return value;
        }
        this.recordFallback(field, value, String(fallback), 'Expected true or false');
        return fallback;
    }

    private string(raw: RawSection, field: string, fallback: string): string {
        const value = raw[this.lastSegment(field)];
        if (value === undefined) {
            return fallback;
        }
        if (typeof value === 'string' && value.trim() !== '') {
            return value;
        }
        this.recordFallback(field, value, fallback, 'Expected a non-empty string');
        return fallback;
    }

    private stringList(raw: RawSection, field: string, fallback: string[]): string[] {
        const value = raw[this.lastSegment(field)];
        if (value === undefined) {
            return [...fallback];
        }
        if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
            return [...value];
        }
        this.recordFallback(field, value, 'defaults', 'Expected a list of strings');
        return [...fallback];
    }

    private stringRecord(raw: RawSection, field: string, fallback: Record<string, string>): Record<string, string> {
        const value = raw[this.lastSegment(field)];
        if (value === undefined) {
            return { ...fallback };
        }
        if (isRecord(value)) {
            const result: Record<string, string> = {};
            for (const [key, entry] of Object.entries(value)) {
                if (typeof entry !== 'string') {
                    this.recordFallback(field, value, 'defaults', `Value of '${key}' must be a string`);
                    return { ...fallback };
                }
                result[key] = entry;
            }
            return result;
        }
        this.recordFallback(field, value, 'defaults', 'Expected a mapping of strings');
        return { ...fallback };
    }

    private lastSegment(field: string): string {
        const parts = field.split('.');
        return parts[parts.length - 1];
    }

    private recordFallback(field: string, value: unknown, resolved: string, reason: string): void {
        const original = typeof value === 'string' ? value : JSON.stringify(value);
        logger.warn(`Invalid configuration value for ${field} (${original}), using ${resolved}`);
        this.fallbacksApplied.push({ field, original, resolved, reason });
        this.configIssues.push({
            stage: 'config',
            kind: 'CONFIG_FALLBACK_APPLIED',
            severity: 'warning',
            message: `Configuration value '${field}' was replaced with '${resolved}'`,
            suggestion: reason,
            details: `Source: ${this.configSource}. Original: ${original}`,
        });
    }
}
