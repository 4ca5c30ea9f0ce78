import fs from 'fs/promises';
import { Dirent, Stats } from 'fs';
import path from 'path';
import logger from '../utils/logger';
import { PathNormalizer } from '../utils/PathNormalizer';
import { FileDescriptor } from '../models/SourceFile';
import { AnalyzerConfig } from '../config/schema';

export interface WalkOptions {
    /** Directory names pruned as soon as they are encountered */
    excludeDirs: string[];
    /** Lower-case extensions including the dot; empty accepts every file */
    includeExtensions: string[];
    maxFileSize: number;
    followSymlinks: boolean;
}

export interface WalkWarning {
    path: string;
    message: string;
}

interface WalkContext {
    rootReal: string;
    visited: Set<string>;
    warnings: WalkWarning[];
}

function byName(a: Dirent, b: Dirent): number {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Lazily walks a project tree.
 * Each iteration starts again from the root, so one walker can be consumed several times.
 */
export class FileWalker implements AsyncIterable<FileDescriptor> {
    readonly root: string;
    private readonly excludeDirs: Set<string>;
    private readonly extensions: Set<string>;
    private lastWarnings: WalkWarning[] = [];

    constructor(root: string, private readonly options: WalkOptions) {
        this.root = path.resolve(root);
        this.excludeDirs = new Set(options.excludeDirs);
        this.extensions = new Set(options.includeExtensions.map(ext => ext.toLowerCase()));
    }

    static fromConfig(root: string, config: AnalyzerConfig['walker']): FileWalker {
        return new FileWalker(root, {
            excludeDirs: config.exclude_dirs,
            includeExtensions: config.include_extensions,
            maxFileSize: config.max_file_size,
            followSymlinks: config.follow_symlinks,
        });
    }

    /**
     * Directories skipped during the latest (or current) iteration
     */
    get warnings(): readonly WalkWarning[] {
        return this.lastWarnings;
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<FileDescriptor> {
        const context: WalkContext = {
            rootReal: await fs.realpath(this.root),
            visited: new Set<string>(),
            warnings: [],
        };
        this.lastWarnings = context.warnings;
        context.visited.add(context.rootReal);

        yield* this.walkDirectory(this.root, context);
    }

    /**
     * Collect the whole sequence
     */
    async collect(): Promise<FileDescriptor[]> {
        const files: FileDescriptor[] = [];
        for await (const file of this) {
            files.push(file);
        }
        return files;
    }

    protected async readDirectory(dir: string): Promise<Dirent[]> {
        return await fs.readdir(dir, { withFileTypes: true });
    }

    private async *walkDirectory(dir: string, context: WalkContext): AsyncGenerator<FileDescriptor> {
        let entries: Dirent[];
        try {
            entries = await this.readDirectory(dir);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            const relative = PathNormalizer.toModuleId(this.root, dir) ?? '.';
            context.warnings.push({ path: relative, message });
            logger.warn(`Skipping unreadable directory ${relative}: ${message}`);
            return;
        }

        for (const entry of [...entries].sort(byName)) {
            const absolutePath = path.join(dir, entry.name);

            if (entry.isDirectory()) {
                if (this.excludeDirs.has(entry.name)) continue;
                if (await this.claimDirectory(absolutePath, context)) {
                    yield* this.walkDirectory(absolutePath, context);
                }
            } else if (entry.isSymbolicLink()) {
                yield* this.followLink(absolutePath, entry.name, context);
            } else if (entry.isFile()) {
                const file = await this.describe(absolutePath);
                if (file) yield file;
            }
        }
    }

    private async *followLink(absolutePath: string, name: string, context: WalkContext): AsyncGenerator<FileDescriptor> {
        if (!this.options.followSymlinks) return;

        let realPath: string;
        let stat: Stats;
        try {
            realPath = await fs.realpath(absolutePath);
            stat = await fs.stat(realPath);
        } catch (error) {
            logger.debug(`Skipping dangling symlink ${absolutePath}: ${error}`);
            return;
        }

        if (!PathNormalizer.isInside(context.rootReal, realPath)) {
            logger.debug(`Skipping symlink that leaves the root: ${absolutePath} -> ${realPath}`);
            return;
        }

        if (stat.isDirectory()) {
            if (this.excludeDirs.has(name) || context.visited.has(realPath)) return;
            context.visited.add(realPath);
            yield* this.walkDirectory(absolutePath, context);
        } else if (stat.isFile()) {
            const file = this.toDescriptor(absolutePath, stat);
            if (file) yield file;
        }
    }

    /**
     * Marks a real directory as visited; false when a link already walked it
     */
    private async claimDirectory(absolutePath: string, context: WalkContext): Promise<boolean> {
        let realPath: string;
        try {
            realPath = await fs.realpath(absolutePath);
        } catch {
            realPath = absolutePath;
        }
        if (context.visited.has(realPath)) return false;
        context.visited.add(realPath);
        return true;
    }

    private async describe(absolutePath: string): Promise<FileDescriptor | null> {
        if (!this.accepts(absolutePath)) return null;
        try {
            return this.toDescriptor(absolutePath, await fs.stat(absolutePath));
        } catch (error) {
            logger.debug(`Skipping unreadable file ${absolutePath}: ${error}`);
            return null;
        }
    }

    private toDescriptor(absolutePath: string, stat: Stats): FileDescriptor | null {
        if (!this.accepts(absolutePath)) return null;
        const relative = PathNormalizer.toModuleId(this.root, absolutePath);
        if (relative === null) return null;
        if (stat.size > this.options.maxFileSize) {
            logger.debug(`Skipping ${relative}: ${stat.size} bytes exceeds ${this.options.maxFileSize}`);
            return null;
        }
        return {
            absolutePath,
            path: relative,
            size: stat.size,
            extension: path.extname(absolutePath).toLowerCase(),
            mtimeMs: stat.mtimeMs,
        };
    }

    private accepts(filePath: string): boolean {
        return this.extensions.size === 0 || this.extensions.has(path.extname(filePath).toLowerCase());
    }
}
