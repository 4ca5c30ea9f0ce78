import path from 'path';
import { DEFAULT_CONFIG } from '../config/schema';
import { findFiles, readFile } from '../utils/fileUtils';
import logger from '../utils/logger';

const TEST_PATTERNS = [
    '**/*.{test,spec}.{ts,tsx,js,jsx,mjs,cjs}',
    '**/__tests__/**/*.{ts,tsx,js,jsx}',
    '**/test_*.py',
    '**/*_test.py',
    '**/*_test.go',
];

/**
 * Picks the test files that mention a changed module, by name or by content
 */
export class AffectedTestSelector {
    constructor(private readonly excludeDirs: string[] = DEFAULT_CONFIG.walker.exclude_dirs) {}

    async listTests(rootPath: string): Promise<string[]> {
        return findFiles(rootPath, TEST_PATTERNS, {
            ignore: this.excludeDirs.map(dir => `**/${dir}/**`),
            absolute: false,
        });
    }

    /**
     * @param changedFiles root-relative POSIX paths
     * @returns root-relative test paths, sorted
     */
    async select(rootPath: string, changedFiles: string[]): Promise<string[]> {
        if (changedFiles.length === 0) {
            return [];
        }

        const tests = await this.listTests(rootPath);
        const contents = new Map<string, string>();
        for (const test of tests) {
            try {
                contents.set(test, (await readFile(path.join(rootPath, test))).toLowerCase());
            } catch (error) {
                logger.warn(`Could not read test file ${test}: ${error}`);
                contents.set(test, '');
            }
        }

        const selected = new Set<string>();
        for (const changed of changedFiles) {
            const tokens = tokensFor(changed);
            let found = false;

            for (const test of tests) {
                const name = path.posix.basename(test).toLowerCase();
                const content = contents.get(test) ?? '';
                if (tokens.some(token => name.includes(token) || content.includes(token))) {
                    selected.add(test);
                    found = true;
                }
            }

            if (!found) {
                const parent = path.posix.dirname(changed);
                for (const test of tests) {
                    const testDir = path.posix.dirname(test);
                    if (testDir === parent || (path.posix.basename(testDir) === '__tests__' && path.posix.dirname(testDir) === parent)) {
                        selected.add(test);
                    }
                }
            }
        }

        return [...selected].sort();
    }
}

/**
 * Lower-cased stem, stem up to its first dot, and extensionless path
 */
function tokensFor(changed: string): string[] {
    const extension = path.posix.extname(changed);
    const stem = path.posix.basename(changed, extension);
    const withoutExtension = extension ? changed.slice(0, -extension.length) : changed;
    return [...new Set([stem, stem.split('.')[0], withoutExtension])]
        .map(token => token.toLowerCase())
        .filter(token => token.length > 0);
}
