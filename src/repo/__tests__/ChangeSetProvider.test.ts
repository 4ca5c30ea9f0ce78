import path from 'path';
import { ChangeSetProvider } from '../ChangeSetProvider';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const mockGit = {
    checkIsRepo: jest.fn(),
    revparse: jest.fn(),
    raw: jest.fn(),
};

jest.mock('simple-git', () => ({
    __esModule: true,
    default: jest.fn(() => mockGit),
}));

const root = path.resolve('/work/project');

/**
 * Answer `git raw` calls by their joined arguments
 */
function answer(outputs: Record<string, string | Error>) {
    mockGit.raw.mockImplementation(async (args: string[]) => {
        const output = outputs[args.join(' ')] ?? '';
        if (output instanceof Error) throw output;
        return output;
    });
}

describe('ChangeSetProvider', () => {
    beforeEach(() => {
        jest.clearAllMocks();
        mockGit.checkIsRepo.mockResolvedValue(true);
        mockGit.revparse.mockResolvedValue(`${root}\n`);
    });

    it('passes an explicit list through without asking git', async () => {
        const result = await new ChangeSetProvider(root).resolve(['src/a.ts']);

        expect(result).toEqual({ outcome: 'explicit', files: ['src/a.ts'] });
        expect(mockGit.checkIsRepo).not.toHaveBeenCalled();
    });

    it('reports a missing repository distinctly', async () => {
        mockGit.checkIsRepo.mockResolvedValue(false);

        expect(await new ChangeSetProvider(root).resolve()).toEqual({ outcome: 'no-vcs', files: [] });
    });

    it('prefers staged changes', async () => {
        answer({
            'diff --cached --name-only': 'src/b.ts\nsrc/a.ts\n',
            'diff --name-only': 'src/c.ts\n',
        });

        expect(await new ChangeSetProvider(root).resolve()).toEqual({ outcome: 'staged', files: ['src/a.ts', 'src/b.ts'] });
    });

    it('falls back to unstaged changes', async () => {
        answer({ 'diff --name-only': 'src/c.ts\n' });

        expect(await new ChangeSetProvider(root).resolve()).toEqual({ outcome: 'unstaged', files: ['src/c.ts'] });
    });

    it('uses the files of a first commit when there is no parent', async () => {
        answer({
            'diff --name-only HEAD~1 HEAD': new Error("fatal: ambiguous argument 'HEAD~1'"),
            'show --name-only --pretty=format: HEAD': '\nREADME.md\nsrc/index.ts\n',
        });

        expect(await new ChangeSetProvider(root).resolve()).toEqual({
            outcome: 'last-commit',
            files: ['README.md', 'src/index.ts'],
        });
    });

    it('maps paths from the top level onto a nested root and drops the rest', async () => {
        const nested = path.join(root, 'packages', 'api');
        answer({ 'diff --cached --name-only': 'packages/api/src/a.ts\npackages/web/src/b.ts\n' });

        expect(await new ChangeSetProvider(nested).resolve()).toEqual({ outcome: 'staged', files: ['src/a.ts'] });
    });

    it('reports a clean tree as no changes', async () => {
        answer({});

        expect(await new ChangeSetProvider(root).resolve()).toEqual({ outcome: 'no-changes', files: [] });
    });
});
