import fs from 'fs';
import os from 'os';
import path from 'path';
import { EnvLoader } from '../EnvLoader';

jest.mock('../logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const ORIGINAL_ENV = { ...process.env };

describe('EnvLoader', () => {
    const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'env-loader-'));

    afterEach(() => {
        process.env = { ...ORIGINAL_ENV };
    });

    afterAll(() => {
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    it('loads variables from an explicitly passed env file', () => {
        const envPath = path.join(tmpRoot, 'custom.env');
        fs.writeFileSync(envPath, 'LOADER_TEST_TOKEN=from_custom');

        const loader = new EnvLoader(path.join(tmpRoot, 'home'));
        const result = loader.load([envPath]);

        expect(process.env.LOADER_TEST_TOKEN).toBe('from_custom');
        expect(result.loadedFrom).toContain(envPath);
        expect(result.tried[0]).toBe(envPath);
    });

    it('reads the user-level override from the home directory', () => {
        const homeDir = path.join(tmpRoot, 'home-with-env');
        fs.mkdirSync(homeDir, { recursive: true });
        const envPath = path.join(homeDir, '.repogenome.env');
        fs.writeFileSync(envPath, 'LOADER_HOME_VALUE=home');

        const result = new EnvLoader(homeDir).load();

        expect(process.env.LOADER_HOME_VALUE).toBe('home');
        expect(result.loadedFrom).toContain(envPath);
    });

    it('skips missing candidates without errors', () => {
        const loader = new EnvLoader(path.join(tmpRoot, 'nowhere'));
        const result = loader.load([path.join(tmpRoot, 'missing.env')]);

        expect(result.loadedFrom).not.toContain(path.join(tmpRoot, 'missing.env'));
        expect(result.errors).toEqual([]);
        expect(result.tried.every(p => p.endsWith('.env'))).toBe(true);
    });
});
