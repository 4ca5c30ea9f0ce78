import path from 'path';

/**
 * Normalize file paths so every module is identified by one root-relative POSIX path
 */
export class PathNormalizer {
    /**
     * Ensure a path uses forward slashes (for cross-platform consistency in reports)
     */
    static toUnixPath(filePath: string): string {
        return filePath.split(path.sep).join('/');
    }

    /**
     * Root-relative POSIX path for an absolute or root-relative input.
     * Returns null when the path resolves outside the root.
     */
    static toModuleId(rootPath: string, filePath: string): string | null {
        const absolute = path.isAbsolute(filePath)
            ? path.normalize(filePath)
            : path.resolve(rootPath, filePath);
        if (!this.isInside(rootPath, absolute)) {
            return null;
        }
        const relative = path.relative(path.resolve(rootPath), absolute);
        return relative === '' ? null : this.toUnixPath(relative);
    }

    /**
     * True when target is the root itself or lies beneath it
     */
    static isInside(rootPath: string, target: string): boolean {
        const relative = path.relative(path.resolve(rootPath), path.resolve(target));
        return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
    }

    /**
     * Join POSIX segments and collapse `.` and `..`.
     * Returns null when the result climbs above the root.
     */
    static joinModulePath(...segments: string[]): string | null {
        const joined = path.posix.normalize(path.posix.join(...segments));
        if (joined === '..' || joined.startsWith('../') || joined.startsWith('/')) {
            return null;
        }
        return joined === '.' ? '' : joined.replace(/\/$/, '');
    }

    /**
     * Directory part of a module id, '' for root-level files
     */
    static moduleDir(moduleId: string): string {
        const dir = path.posix.dirname(moduleId);
        return dir === '.' ? '' : dir;
    }
}
