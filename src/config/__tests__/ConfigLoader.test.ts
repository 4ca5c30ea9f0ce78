import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigLoader, CONFIG_FILE_NAME } from '../ConfigLoader';
import { DEFAULT_CONFIG } from '../schema';
import logger from '../../utils/logger';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const ENV_KEYS = [
    'REPOGENOME_GATE_THRESHOLD',
    'REPOGENOME_PROFILE_BUDGET',
    'REPOGENOME_ESCALATION_THRESHOLD',
    'REPOGENOME_MAX_DEPTH',
    'VERBOSE',
];

describe('ConfigLoader', () => {
    const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'config-loader-'));

    beforeEach(() => {
        jest.clearAllMocks();
        ENV_KEYS.forEach(key => delete process.env[key]);
    });

    afterAll(() => {
        ENV_KEYS.forEach(key => delete process.env[key]);
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    function writeConfig(dir: string, content: string): string {
        fs.mkdirSync(dir, { recursive: true });
        const file = path.join(dir, CONFIG_FILE_NAME);
        fs.writeFileSync(file, content);
        return file;
    }

    it('uses defaults when no config file exists', async () => {
        const loader = new ConfigLoader();
        const config = await loader.load(undefined, path.join(tmpRoot, 'empty'));

        expect(config.gate.failure_threshold).toBe(3);
        expect(config.profile.budget_chars).toBe(2400);
        expect(config.impact.max_depth).toBeNull();
        expect(config.walker.exclude_dirs).toEqual(DEFAULT_CONFIG.walker.exclude_dirs);
    });

    it('merges a project config section by section', async () => {
        const projectDir = path.join(tmpRoot, 'project');
        const file = writeConfig(projectDir, [
            'gate:',
            '  failure_threshold: 5',
            '  lint:',
            '    command: npm run lint:ci',
            'profile:',
            '  slots:',
            '    routes: 4',
            'walker:',
            '  include_extensions: [ts, .PY]',
        ].join('\n'));

        const loader = new ConfigLoader();
        const config = await loader.load(undefined, projectDir);

        expect(config.gate.failure_threshold).toBe(5);
        expect(config.gate.lint).toEqual({ enabled: true, command: 'npm run lint:ci', timeout: 120000 });
        expect(config.gate.test.timeout).toBe(300000);
        expect(config.profile.slots.routes).toBe(4);
        expect(config.profile.slots.key_files).toBe(DEFAULT_CONFIG.profile.slots.key_files);
        expect(config.walker.include_extensions).toEqual(['.ts', '.py']);
        expect(loader.getDiagnostics().configSource).toBe(file);
    });

    it('replaces invalid values with defaults and reports them', async () => {
        const file = writeConfig(path.join(tmpRoot, 'invalid'), [
            'gate:',
            '  failure_threshold: 0',
            'impact:',
            '  escalation_threshold: lots',
        ].join('\n'));

        const loader = new ConfigLoader();
        const config = await loader.load(file);
        const diagnostics = loader.getDiagnostics();

        expect(config.gate.failure_threshold).toBe(3);
        expect(config.impact.escalation_threshold).toBe(20);
        expect(diagnostics.fallbacksApplied.map(f => f.field)).toEqual([
            'impact.escalation_threshold',
            'gate.failure_threshold',
        ]);
        expect(diagnostics.issues).toHaveLength(2);
        expect(diagnostics.issues[0].kind).toBe('CONFIG_FALLBACK_APPLIED');
        expect(logger.warn).toHaveBeenCalledWith('Applied 2 configuration fallback(s)');
    });

    it('ignores a config whose top level is not a mapping', async () => {
        const file = writeConfig(path.join(tmpRoot, 'scalar'), '- just\n- a list\n');

        const config = await new ConfigLoader().load(file);

        expect(config.gate.failure_threshold).toBe(3);
        expect(logger.warn).toHaveBeenCalledWith(`Ignoring config ${file}: top level must be a mapping`);
    });

    it('applies environment overrides after the file', async () => {
        process.env.REPOGENOME_GATE_THRESHOLD = '7';
        process.env.REPOGENOME_MAX_DEPTH = '2';
        process.env.REPOGENOME_PROFILE_BUDGET = 'wide';
        process.env.VERBOSE = 'true';

        const loader = new ConfigLoader();
        const config = await loader.load(undefined, path.join(tmpRoot, 'empty'));

        expect(config.gate.failure_threshold).toBe(7);
        expect(config.impact.max_depth).toBe(2);
        expect(config.profile.budget_chars).toBe(2400);
        expect(config.output.verbose).toBe(true);
        expect(loader.getDiagnostics().fallbacksApplied[0]).toEqual({
            field: 'REPOGENOME_PROFILE_BUDGET',
            original: 'wide',
            resolved: '2400',
            reason: 'Expected a whole number >= 200',
        });
    });
});
