import path from 'path';
import { PathNormalizer } from '../PathNormalizer';

describe('PathNormalizer', () => {
    const root = path.resolve('/work/project');

    describe('toModuleId', () => {
        it('maps absolute paths under the root to POSIX ids', () => {
            expect(PathNormalizer.toModuleId(root, path.join(root, 'src', 'app.ts'))).toBe('src/app.ts');
        });

        it('resolves relative input against the root', () => {
            expect(PathNormalizer.toModuleId(root, './lib/../src/a.py')).toBe('src/a.py');
        });

        it('rejects paths outside the root and the root itself', () => {
            expect(PathNormalizer.toModuleId(root, '../other/file.ts')).toBeNull();
            expect(PathNormalizer.toModuleId(root, root)).toBeNull();
        });
    });

    describe('joinModulePath', () => {
        it('collapses dot segments', () => {
            expect(PathNormalizer.joinModulePath('src/api', '../utils/x')).toBe('src/utils/x');
            expect(PathNormalizer.joinModulePath('', './a')).toBe('a');
        });

        it('refuses to climb above the root', () => {
            expect(PathNormalizer.joinModulePath('src', '../../etc/passwd')).toBeNull();
        });
    });

    it('reports the directory of root-level files as empty', () => {
        expect(PathNormalizer.moduleDir('index.ts')).toBe('');
        expect(PathNormalizer.moduleDir('src/a/b.ts')).toBe('src/a');
    });

    it('detects containment', () => {
        expect(PathNormalizer.isInside(root, path.join(root, 'x'))).toBe(true);
        expect(PathNormalizer.isInside(root, path.resolve(root, '..', 'project-sibling'))).toBe(false);
    });
});
