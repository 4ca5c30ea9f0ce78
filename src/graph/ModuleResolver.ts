import { SCRIPT_LANGUAGES } from '../analyzer/FileClassifier';
import { EdgeConfidence } from '../models/ModuleGraph';
import { PathNormalizer } from '../utils/PathNormalizer';

export type Resolution =
    | { status: 'resolved'; target: string; confidence: EdgeConfidence }
    | { status: 'asset'; target: string }
    | { status: 'external' }
    | { status: 'unresolved' };

type Lookup = { kind: 'module' | 'asset'; id: string } | null;

const SCRIPT_EXTENSIONS = ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.vue', '.svelte', '.json'];
const COMPILED_EXTENSION = /\.(?:js|jsx|mjs|cjs)$/;

/**
 * Turns a written specifier into a module id.
 *
 * Order: exact relative or root-absolute path, configured alias prefixes,
 * then a same-directory guess for bare specifiers.
 */
export class ModuleResolver {
    private readonly aliases: Array<[string, string]>;

    /**
     * @param modules ids that are nodes of the graph
     * @param knownFiles every scanned file id, used to recognize assets
     * @param aliasPrefixes specifier prefix mapped to a root-relative replacement
     */
    constructor(
        private readonly modules: ReadonlySet<string>,
        private readonly knownFiles: ReadonlySet<string>,
        aliasPrefixes: Record<string, string> = {}
    ) {
        this.aliases = Object.entries(aliasPrefixes).sort((a, b) => b[0].length - a[0].length);
    }

    resolve(fromId: string, specifier: string, language: string): Resolution {
        if (language === 'python') {
            return this.resolvePython(fromId, specifier);
        }
        if (SCRIPT_LANGUAGES.has(language)) {
            return this.resolveScript(fromId, specifier);
        }
        return { status: 'unresolved' };
    }

    private resolveScript(fromId: string, rawSpecifier: string): Resolution {
        const specifier = rawSpecifier.replace(/[?#].*$/, '');
        if (!specifier || specifier.startsWith('node:') || specifier.includes('://')) {
            return { status: 'external' };
        }

        const fromDir = PathNormalizer.moduleDir(fromId);

        if (specifier.startsWith('.')) {
            return this.settle(this.lookupScript(PathNormalizer.joinModulePath(fromDir, specifier)), 'exact');
        }
        if (specifier.startsWith('/')) {
            return this.settle(this.lookupScript(PathNormalizer.joinModulePath(specifier.slice(1))), 'exact');
        }

        for (const [prefix, replacement] of this.aliases) {
            if (!specifier.startsWith(prefix)) continue;
            const aliased = this.lookupScript(PathNormalizer.joinModulePath(replacement, specifier.slice(prefix.length)));
            if (aliased) {
                return this.settle(aliased, 'alias');
            }
            const sibling = this.lookupScript(PathNormalizer.joinModulePath(fromDir, specifier));
            return this.settle(sibling, 'heuristic');
        }

        const sibling = this.lookupScript(PathNormalizer.joinModulePath(fromDir, specifier));
        return sibling ? this.settle(sibling, 'heuristic') : { status: 'external' };
    }

    private resolvePython(fromId: string, specifier: string): Resolution {
        const dots = /^\.*/.exec(specifier)?.[0].length ?? 0;
        const dotted = specifier.slice(dots).replace(/\./g, '/');

        if (dots > 0) {
            const base = PathNormalizer.joinModulePath(
                PathNormalizer.moduleDir(fromId),
                '../'.repeat(dots - 1),
                dotted
            );
            return this.settle(this.lookupPython(base), 'exact');
        }

        const absolute = this.lookupPython(PathNormalizer.joinModulePath(dotted));
        if (absolute) {
            return this.settle(absolute, 'exact');
        }
        const sibling = this.lookupPython(PathNormalizer.joinModulePath(PathNormalizer.moduleDir(fromId), dotted));
        return sibling ? this.settle(sibling, 'heuristic') : { status: 'external' };
    }

    private settle(found: Lookup, confidence: EdgeConfidence): Resolution {
        if (!found) {
            return { status: 'unresolved' };
        }
        return found.kind === 'module'
            ? { status: 'resolved', target: found.id, confidence }
            : { status: 'asset', target: found.id };
    }

    private lookupScript(base: string | null): Lookup {
        if (base === null) return null;

        const candidates: string[] = [];
        if (base !== '') {
            candidates.push(base);
            if (COMPILED_EXTENSION.test(base)) {
                const stem = base.replace(COMPILED_EXTENSION, '');
                candidates.push(`${stem}.ts`, `${stem}.tsx`);
            }
            candidates.push(...SCRIPT_EXTENSIONS.map(ext => `${base}${ext}`));
        }
        const indexBase = base === '' ? 'index' : `${base}/index`;
        candidates.push(...SCRIPT_EXTENSIONS.map(ext => `${indexBase}${ext}`));

        return this.firstKnown(candidates);
    }

    private lookupPython(base: string | null): Lookup {
        if (base === null) return null;
        const candidates = base === ''
            ? ['__init__.py']
            : [`${base}.py`, `${base}/__init__.py`];
        return this.firstKnown(candidates);
    }

    private firstKnown(candidates: string[]): Lookup {
        for (const id of candidates) {
            if (this.modules.has(id)) return { kind: 'module', id };
            if (this.knownFiles.has(id)) return { kind: 'asset', id };
        }
        return null;
    }
}
