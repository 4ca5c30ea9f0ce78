import simpleGit, { SimpleGit } from 'simple-git';
import path from 'path';
import { ChangeSource } from '../models/ImpactReport';
import logger from '../utils/logger';
import { PathNormalizer } from '../utils/PathNormalizer';

export type ChangeSetOutcome = ChangeSource | 'no-vcs' | 'no-changes';

export interface ChangeSet {
    outcome: ChangeSetOutcome;
    /** Root-relative POSIX paths */
    files: string[];
}

/**
 * Finds the files a change touches: an explicit list, else staged, unstaged, then the last commit
 */
export class ChangeSetProvider {
    private git: SimpleGit;

    constructor(private readonly rootPath: string) {
        this.git = simpleGit(rootPath);
    }

    async resolve(explicitFiles?: string[]): Promise<ChangeSet> {
        if (explicitFiles && explicitFiles.length > 0) {
            return { outcome: 'explicit', files: [...explicitFiles] };
        }

        let isRepo = false;
        try {
            isRepo = await this.git.checkIsRepo();
        } catch (error) {
            logger.warn(`Could not query version control in ${this.rootPath}: ${error}`);
        }
        if (!isRepo) {
            logger.info(`No repository found at ${this.rootPath}`);
            return { outcome: 'no-vcs', files: [] };
        }

        const topLevel = (await this.git.revparse(['--show-toplevel'])).trim();

        const staged = await this.changedFiles(topLevel, ['diff', '--cached', '--name-only']);
        if (staged.length > 0) {
            return { outcome: 'staged', files: staged };
        }

        const unstaged = await this.changedFiles(topLevel, ['diff', '--name-only']);
        if (unstaged.length > 0) {
            return { outcome: 'unstaged', files: unstaged };
        }

        const lastCommit = await this.lastCommitFiles(topLevel);
        if (lastCommit.length > 0) {
            return { outcome: 'last-commit', files: lastCommit };
        }

        return { outcome: 'no-changes', files: [] };
    }

    private async lastCommitFiles(topLevel: string): Promise<string[]> {
        try {
            return await this.changedFiles(topLevel, ['diff', '--name-only', 'HEAD~1', 'HEAD'], false);
        } catch (error) {
            // A first commit has no parent to diff against
            logger.debug(`Falling back to the files of HEAD: ${error}`);
            return this.changedFiles(topLevel, ['show', '--name-only', '--pretty=format:', 'HEAD']);
        }
    }

    /**
     * Run a git command that lists paths relative to the top level and map them onto the root
     */
    private async changedFiles(topLevel: string, args: string[], tolerant = true): Promise<string[]> {
        let output: string;
        try {
            output = await this.git.raw(args);
        } catch (error) {
            if (!tolerant) throw error;
            logger.warn(`git ${args.join(' ')} failed: ${error}`);
            return [];
        }

        const files = new Set<string>();
        for (const line of output.split('\n')) {
            const trimmed = line.trim();
            if (!trimmed) continue;
            const id = PathNormalizer.toModuleId(this.rootPath, path.join(topLevel, trimmed));
            if (id !== null) files.add(id);
        }
        return [...files].sort();
    }
}
