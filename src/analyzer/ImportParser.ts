import path from 'path';
import { RawReference, ReferenceKind } from '../models/SourceFile';
import { stripHashComments, stripSlashComments } from '../utils/sourceText';
import { SCRIPT_LANGUAGES } from './FileClassifier';

const ES_IMPORT = /^\s*import\s+(?:type\s+)?[\w$*{}\s,]+?\s+from\s+['"]([^'"]+)['"]/gm;
const SIDE_EFFECT_IMPORT = /^\s*import\s+['"]([^'"]+)['"]/gm;
const RE_EXPORT = /^\s*export\s+(?:type\s+)?(?:\*(?:\s+as\s+[\w$]+)?|\{[^}]*\})\s+from\s+['"]([^'"]+)['"]/gm;
const REQUIRE_CALL = /\brequire\(\s*['"]([^'"]+)['"]\s*\)/g;
const DYNAMIC_IMPORT = /\bimport\(\s*['"]([^'"]+)['"]\s*\)/g;

const PY_FROM_IMPORT = /^\s*from\s+(\.+[\w.]*|[A-Za-z_][\w.]*)\s+import\s+(\([^)]*\)|[^\n#]+)/gm;
const PY_IMPORT = /^\s*import\s+([A-Za-z_][\w.]*(?:\s+as\s+\w+)?(?:\s*,\s*[A-Za-z_][\w.]*(?:\s+as\s+\w+)?)*)/gm;

const BARREL_NOISE = [
    /^\s*export\s+(?:type\s+)?(?:\*(?:\s+as\s+[\w$]+)?|\{[^}]*\})\s+from\s+['"][^'"]+['"]\s*;?/gm,
    /^\s*import\s+(?:type\s+)?[\w$*{}\s,]+?\s+from\s+['"][^'"]+['"]\s*;?/gm,
    /^\s*import\s+['"][^'"]+['"]\s*;?/gm,
    /^\s*export\s+(?:type\s+)?\{[^}]*\}\s*;?/gm,
    /^\s*export\s+default\s+[\w$.]+\s*;?\s*$/gm,
    /^\s*['"]use strict['"]\s*;?/gm,
];

const PY_BARREL_NOISE = [
    /^\s*(?:"""[\s\S]*?"""|'''[\s\S]*?''')/gm,
    /^\s*__all__\s*=\s*[[(][^\])]*[\])]/gm,
    /^\s*from\s+\S+\s+import\s+\([^)]*\)/gm,
    /^\s*from\s+\S+\s+import\s+[^\n]+/gm,
    /^\s*import\s+[^\n]+/gm,
];

function collect(content: string, pattern: RegExp, kind: ReferenceKind, into: RawReference[]): void {
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(content)) !== null) {
        into.push({ specifier: match[1], kind });
    }
}

/**
 * Lexical extraction of module references and barrel detection
 */
export class ImportParser {
    /**
     * References in order of appearance per statement form, duplicates removed
     */
    parseReferences(content: string, language: string): RawReference[] {
        const references: RawReference[] = [];
        if (SCRIPT_LANGUAGES.has(language)) {
            const code = stripSlashComments(content);
            collect(code, RE_EXPORT, 're-export', references);
            collect(code, ES_IMPORT, 'import', references);
            collect(code, SIDE_EFFECT_IMPORT, 'import', references);
            collect(code, REQUIRE_CALL, 'require', references);
            collect(code, DYNAMIC_IMPORT, 'dynamic-import', references);
        } else if (language === 'python') {
            this.parsePython(stripHashComments(content), references);
        }
        return this.dedupe(references);
    }

    /**
     * True for files that only gather and re-export other modules
     */
    isBarrel(filePath: string, content: string, language: string): boolean {
        if (SCRIPT_LANGUAGES.has(language)) {
            const code = stripSlashComments(content);
            RE_EXPORT.lastIndex = 0;
            const exportsSomething = RE_EXPORT.test(code) || /^\s*export\s+(?:type\s+)?\{[^}]*\}/m.test(code);
            return exportsSomething && this.strip(code, BARREL_NOISE) === '';
        }
        if (language === 'python' && path.posix.basename(filePath) === '__init__.py') {
            const code = stripHashComments(content);
            return /^\s*from\s+\S+\s+import\s/m.test(code) && this.strip(code, PY_BARREL_NOISE) === '';
        }
        return false;
    }

    private parsePython(code: string, references: RawReference[]): void {
        PY_FROM_IMPORT.lastIndex = 0;
        let match: RegExpExecArray | null;
        while ((match = PY_FROM_IMPORT.exec(code)) !== null) {
            const source = match[1];
            if (/^\.+$/.test(source)) {
                // `from . import a, b` names sibling modules
                const names = match[2].replace(/[()]/g, '').split(',')
                    .map(name => name.trim().split(/\s+as\s+/)[0].trim())
                    .filter(name => /^\w+$/.test(name));
                names.forEach(name => references.push({ specifier: `${source}${name}`, kind: 'import' }));
            } else {
                references.push({ specifier: source, kind: 'import' });
            }
        }

        PY_IMPORT.lastIndex = 0;
        while ((match = PY_IMPORT.exec(code)) !== null) {
            for (const part of match[1].split(',')) {
                const name = part.trim().split(/\s+as\s+/)[0].trim();
                if (name) references.push({ specifier: name, kind: 'import' });
            }
        }
    }

    private strip(code: string, patterns: RegExp[]): string {
        return patterns.reduce((text, pattern) => text.replace(pattern, ''), code).trim();
    }

    private dedupe(references: RawReference[]): RawReference[] {
        const seen = new Set<string>();
        return references.filter(ref => {
            const key = `${ref.kind}:${ref.specifier}`;
            if (seen.has(key)) return false;
            seen.add(key);
            return true;
        });
    }
}
