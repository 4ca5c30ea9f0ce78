import fs from 'fs';
import { Dirent } from 'fs';
import os from 'os';
import path from 'path';
import { FileWalker, WalkOptions } from '../FileWalker';
import logger from '../../utils/logger';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const OPTIONS: WalkOptions = {
    excludeDirs: ['node_modules', '.git'],
    includeExtensions: ['.ts', '.md'],
    maxFileSize: 1024,
    followSymlinks: true,
};

function write(root: string, relative: string, content = 'x'): void {
    const file = path.join(root, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
}

describe('FileWalker', () => {
    const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'file-walker-'));
    const project = path.join(tmpRoot, 'project');
    const outside = path.join(tmpRoot, 'outside');

    beforeAll(() => {
        write(project, 'b.ts');
        write(project, 'a.md');
        write(project, 'src/index.ts');
        write(project, 'src/Style.CSS');
        write(project, 'src/big.ts', 'y'.repeat(2048));
        write(project, 'node_modules/pkg/index.ts');
        write(project, '.git/hooks/x.ts');
        write(outside, 'secret.ts');
        fs.symlinkSync(outside, path.join(project, 'linked-outside'));
        fs.symlinkSync(path.join(project, 'src'), path.join(project, 'src', 'loop'));
    });

    afterAll(() => {
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    it('yields allowed files in sorted order and prunes excluded directories', async () => {
        const walker = new FileWalker(project, OPTIONS);
        const files = await walker.collect();

        expect(files.map(f => f.path)).toEqual(['a.md', 'b.ts', 'src/index.ts']);
        expect(files[1]).toEqual(expect.objectContaining({
            absolutePath: path.join(project, 'b.ts'),
            extension: '.ts',
            size: 1,
        }));
    });

    it('restarts from the root on every iteration', async () => {
        const walker = new FileWalker(project, OPTIONS);
        const first = (await walker.collect()).map(f => f.path);
        const second = (await walker.collect()).map(f => f.path);

        expect(second).toEqual(first);
    });

    it('never follows links that leave the root', async () => {
        const files = await new FileWalker(project, OPTIONS).collect();

        expect(files.some(f => f.path.includes('secret'))).toBe(false);
    });

    it('accepts every extension when the allowlist is empty', async () => {
        const walker = new FileWalker(project, { ...OPTIONS, includeExtensions: [] });
        const files = await walker.collect();

        expect(files.map(f => f.path)).toContain('src/Style.CSS');
    });

    it('records unreadable directories as warnings and keeps walking', async () => {
        class FlakyWalker extends FileWalker {
            protected async readDirectory(dir: string): Promise<Dirent[]> {
                if (path.basename(dir) === 'src') {
                    throw new Error('EACCES: permission denied');
                }
                return await super.readDirectory(dir);
            }
        }

        const walker = new FlakyWalker(project, OPTIONS);
        const files = await walker.collect();

        expect(files.map(f => f.path)).toEqual(['a.md', 'b.ts']);
        expect(walker.warnings).toEqual([{ path: 'src', message: 'EACCES: permission denied' }]);
        expect(logger.warn).toHaveBeenCalledWith('Skipping unreadable directory src: EACCES: permission denied');
    });
});
