import path from 'path';
import { AnalyzerConfig, CheckCommandConfig } from '../../config/schema';
import { CommandRunner } from '../../executor/CommandRunner';
import { dirExists, fileExists, findFiles, readFile } from '../../utils/fileUtils';
import logger from '../../utils/logger';
import { CommandCheck } from './CommandCheck';
import { GateCheck } from './GateCheck';

export interface DetectedCommand {
    tool: string;
    command: string;
}

export interface DetectedChecks {
    checks: GateCheck[];
    warnings: string[];
}

const NODE_TOOLS = new Set(['npm', 'eslint', 'biome', 'jest', 'vitest']);

/**
 * `npm init` writes a test script that always fails
 */
export function isPlaceholderTestScript(script: string): boolean {
    const lowered = script.toLowerCase();
    return lowered.includes('no test specified') && lowered.includes('exit 1');
}

/**
 * Discovers the lint and test commands of a project from its manifests and tool configs
 */
export class CheckDetector {
    constructor(private readonly runner: CommandRunner = new CommandRunner()) {}

    async detect(rootPath: string, gate: AnalyzerConfig['gate']): Promise<DetectedChecks> {
        const scripts = await this.readScripts(rootPath);
        const checks: GateCheck[] = [];
        const warnings: string[] = [];
        const tools: string[] = [];

        const add = async (name: string, settings: CheckCommandConfig, detect: () => Promise<DetectedCommand | null>) => {
            if (!settings.enabled) {
                logger.info(`${name} check disabled`);
                return;
            }
            const found = settings.command
                ? { tool: 'custom', command: settings.command }
                : await detect();
            if (!found) {
                warnings.push(`No ${name} command detected`);
                return;
            }
            tools.push(found.tool);
            logger.info(`Using ${found.tool} for the ${name} check: ${found.command}`);
            checks.push(new CommandCheck(name, found.command, rootPath, settings.timeout, this.runner));
        };

        await add('lint', gate.lint, () => this.detectLint(rootPath, scripts));
        await add('test', gate.test, () => this.detectTest(rootPath, scripts));

        if (tools.some(tool => NODE_TOOLS.has(tool)) && !(await dirExists(path.join(rootPath, 'node_modules')))) {
            warnings.push('node_modules directory is missing; run npm install if the checks fail');
        }

        return { checks, warnings };
    }

    async detectLint(rootPath: string, scripts: Record<string, string>): Promise<DetectedCommand | null> {
        if (scripts.lint?.trim()) {
            return { tool: 'npm', command: 'npm run lint' };
        }
        if (await this.hasAny(rootPath, ['.eslintrc', '.eslintrc.*', 'eslint.config.*'])) {
            return { tool: 'eslint', command: 'npx eslint .' };
        }
        if (await fileExists(path.join(rootPath, 'biome.json'))) {
            return { tool: 'biome', command: 'npx biome check .' };
        }
        if (await this.hasAny(rootPath, ['ruff.toml', '.ruff.toml']) || await this.pyprojectHas(rootPath, '[tool.ruff]')) {
            return { tool: 'ruff', command: 'ruff check .' };
        }
        if (await fileExists(path.join(rootPath, '.flake8')) || await this.pyprojectHas(rootPath, '[tool.flake8]')) {
            return { tool: 'flake8', command: 'flake8 .' };
        }
        if (await this.hasAny(rootPath, ['.golangci.yml', '.golangci.yaml'])) {
            return { tool: 'golangci-lint', command: 'golangci-lint run' };
        }
        return null;
    }

    async detectTest(rootPath: string, scripts: Record<string, string>): Promise<DetectedCommand | null> {
        const script = scripts.test;
        if (script?.trim() && !isPlaceholderTestScript(script)) {
            return { tool: 'npm', command: 'npm test' };
        }
        if (await this.hasAny(rootPath, ['jest.config.*'])) {
            return { tool: 'jest', command: 'npx jest --passWithNoTests' };
        }
        if (await this.hasAny(rootPath, ['vitest.config.*'])) {
            return { tool: 'vitest', command: 'npx vitest run' };
        }
        if (
            await this.pyprojectHas(rootPath, '[tool.pytest')
            || await this.hasAny(rootPath, ['pytest.ini', 'conftest.py'])
        ) {
            return { tool: 'pytest', command: 'pytest' };
        }
        if (await fileExists(path.join(rootPath, 'Cargo.toml'))) {
            return { tool: 'cargo', command: 'cargo test' };
        }
        if (await fileExists(path.join(rootPath, 'go.mod'))) {
            return { tool: 'go', command: 'go test ./...' };
        }
        return null;
    }

    /**
     * String-valued scripts of package.json, empty when there is none
     */
    async readScripts(rootPath: string): Promise<Record<string, string>> {
        const manifest = path.join(rootPath, 'package.json');
        if (!(await fileExists(manifest))) {
            return {};
        }
        try {
            const parsed: unknown = JSON.parse(await readFile(manifest));
            if (typeof parsed !== 'object' || parsed === null || !('scripts' in parsed)) return {};
            const scripts = parsed.scripts;
            if (typeof scripts !== 'object' || scripts === null) return {};
            const result: Record<string, string> = {};
            for (const [name, value] of Object.entries(scripts)) {
                if (typeof value === 'string') result[name] = value;
            }
            return result;
        } catch (error) {
            logger.warn(`Could not parse ${manifest}: ${error}`);
            return {};
        }
    }

    private async hasAny(rootPath: string, patterns: string[]): Promise<boolean> {
        const matches = await findFiles(rootPath, patterns, { dot: true, absolute: false });
        return matches.length > 0;
    }

    private async pyprojectHas(rootPath: string, section: string): Promise<boolean> {
        const pyproject = path.join(rootPath, 'pyproject.toml');
        if (!(await fileExists(pyproject))) return false;
        return (await readFile(pyproject)).includes(section);
    }
}
