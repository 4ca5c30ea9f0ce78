import fs from 'fs/promises';
import path from 'path';
import { glob } from 'fast-glob';
import { v4 as uuidv4 } from 'uuid';

/**
 * Read file content
 */
export async function readFile(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
}

/**
 * Write content to file
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Write content through a sibling temp file and rename it over the target.
 * Readers see either the old content or the new one, never a partial write.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    const tempPath = path.join(dir, `.${path.basename(filePath)}.${uuidv4()}.tmp`);
    try {
        await fs.writeFile(tempPath, content, 'utf-8');
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
}

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Check if directory exists
 */
export async function dirExists(dirPath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(dirPath);
        return stat.isDirectory();
    } catch {
        return false;
    }
}

/**
 * Modification time in ms, or null when the file is missing
 */
export async function getModifiedTime(filePath: string): Promise<number | null> {
    try {
        const stat = await fs.stat(filePath);
        return stat.mtimeMs;
    } catch {
        return null;
    }
}

/**
 * Find files matching patterns
 */
export async function findFiles(
    directory: string,
    patterns: string | string[],
    options: { ignore?: string[]; absolute?: boolean; dot?: boolean } = {}
): Promise<string[]> {
    const { ignore = [], absolute = true, dot = false } = options;

    const files = await glob(patterns, {
        cwd: directory,
        ignore,
        absolute,
        dot,
        onlyFiles: true,
    });
    return files.sort();
}

/**
 * Remove directory recursively
 */
export async function removeDir(dirPath: string): Promise<void> {
    await fs.rm(dirPath, { recursive: true, force: true });
}

/**
 * Ensure directory exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
}
