/**
 * Lexical helpers shared by the extractors. None of these parse; they only
 * cut text at comment and bracket boundaries.
 */

const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const LINE_COMMENT = /^\s*\/\/.*$/gm;
const HASH_COMMENT = /^\s*#.*$/gm;

/**
 * Remove block comments and whole-line `//` comments (trailing `//` is kept, it may sit inside a URL)
 */
export function stripSlashComments(content: string): string {
    return content.replace(BLOCK_COMMENT, match => match.replace(/[^\n]/g, ' ')).replace(LINE_COMMENT, '');
}

export function stripHashComments(content: string): string {
    return content.replace(HASH_COMMENT, '');
}

export function countLines(content: string): number {
    if (content === '') return 0;
    const lines = content.split(/\r?\n/);
    if (lines[lines.length - 1] === '') lines.pop();
    return lines.length;
}

const OPENERS: Record<string, string> = { '{': '}', '(': ')', '[': ']' };

/**
 * Text between the bracket at `openIndex` and its partner, brackets excluded.
 * Unbalanced input yields everything after the opener.
 */
export function extractBlock(content: string, openIndex: number): string {
    const open = content[openIndex];
    const close = OPENERS[open];
    if (close === undefined) return '';

    let depth = 0;
    let quote: string | null = null;
    for (let i = openIndex; i < content.length; i++) {
        const ch = content[i];
        if (quote) {
            if (ch === '\\') {
                i++;
            } else if (ch === quote) {
                quote = null;
            }
            continue;
        }
        if (ch === '"' || ch === "'" || ch === '`') {
            quote = ch;
        } else if (ch === open) {
            depth++;
        } else if (ch === close) {
            depth--;
            if (depth === 0) {
                return content.slice(openIndex + 1, i);
            }
        }
    }
    return content.slice(openIndex + 1);
}

/**
 * Keys of an object literal body that sit at its top level, in order of appearance
 */
export function topLevelKeys(body: string): string[] {
    let flattened = '';
    let depth = 0;
    let quote: string | null = null;
    for (const ch of body) {
        if (quote) {
            if (ch === quote) quote = null;
            flattened += ' ';
        } else if (ch === '"' || ch === "'" || ch === '`') {
            quote = ch;
            flattened += ' ';
        } else if (ch === '{' || ch === '[' || ch === '(') {
            depth++;
            flattened += ' ';
        } else if (ch === '}' || ch === ']' || ch === ')') {
            depth = Math.max(0, depth - 1);
            flattened += ' ';
        } else {
            flattened += depth === 0 ? ch : ' ';
        }
    }

    const keys: string[] = [];
    const keyPattern = /(?:^|[,\s])([A-Za-z_$][\w$]*)\s*:/g;
    let match: RegExpExecArray | null;
    while ((match = keyPattern.exec(flattened)) !== null) {
        if (!keys.includes(match[1])) keys.push(match[1]);
    }
    return keys;
}
