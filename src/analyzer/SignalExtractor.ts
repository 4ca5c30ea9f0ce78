import signalPatterns from './signal-patterns.json';
import { FileContext, FileExtraction, SignalMatch } from '../models/SourceFile';
import { countLines, stripHashComments, stripSlashComments } from '../utils/sourceText';
import { classifyContext, detectLanguage, isTestFile, SOURCE_LANGUAGES } from './FileClassifier';
import { ImportParser } from './ImportParser';
import { RouteExtractor } from './RouteExtractor';
import { ModelExtractor } from './ModelExtractor';

const FILE_CONTEXTS: readonly FileContext[] = ['frontend', 'backend', 'shared', 'test', 'config'];

const HASH_COMMENT_LANGUAGES = new Set(['python', 'ruby']);
const SLASH_COMMENT_LANGUAGES = new Set(['javascript', 'typescript', 'vue', 'svelte', 'go', 'java', 'php', 'prisma']);

/**
 * Source text with comments blanked, so commented-out code raises no signal
 */
function withoutComments(content: string, language: string): string {
    if (HASH_COMMENT_LANGUAGES.has(language)) return stripHashComments(content);
    if (SLASH_COMMENT_LANGUAGES.has(language)) return stripSlashComments(content);
    return content;
}

/**
 * A pattern group ready for matching: every value whose patterns hit is reported
 */
export interface CompiledPatternGroup {
    category: string;
    contexts: ReadonlySet<FileContext>;
    languages: ReadonlySet<string>;
    values: Array<{ value: string; patterns: RegExp[] }>;
}

function isFileContext(value: unknown): value is FileContext {
    return FILE_CONTEXTS.some(context => context === value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate and compile a pattern table shaped like signal-patterns.json
 */
export function compilePatternTable(table: unknown): CompiledPatternGroup[] {
    if (!isRecord(table) || !Array.isArray(table.groups)) {
        throw new Error('Signal pattern table must have a "groups" array');
    }

    return table.groups.map((group: unknown, index: number) => {
        if (!isRecord(group) || typeof group.category !== 'string') {
            throw new Error(`Signal pattern group ${index} has no category`);
        }
        const { category, contexts, languages, values } = group;
        if (!isStringArray(contexts) || !contexts.every(isFileContext)) {
            throw new Error(`Signal pattern group '${category}' has invalid contexts`);
        }
        if (!isStringArray(languages) || !isRecord(values)) {
            throw new Error(`Signal pattern group '${category}' needs languages and values`);
        }

        return {
            category,
            contexts: new Set(contexts.filter(isFileContext)),
            languages: new Set(languages),
            values: Object.entries(values).map(([value, patterns]) => {
                if (!isStringArray(patterns)) {
                    throw new Error(`Patterns for '${category}/${value}' must be strings`);
                }
                return { value, patterns: patterns.map(source => new RegExp(source, 'm')) };
            }),
        };
    });
}

/**
 * Runs the extraction passes over one file: references, stack signals, routes and data models
 */
export class SignalExtractor {
    private readonly groups: CompiledPatternGroup[];
    private readonly importParser = new ImportParser();
    private readonly routeExtractor = new RouteExtractor();
    private readonly modelExtractor = new ModelExtractor();

    constructor(patternTable: unknown = signalPatterns) {
        this.groups = compilePatternTable(patternTable);
    }

    extract(filePath: string, content: string): FileExtraction {
        const language = detectLanguage(filePath);
        const context = classifyContext(filePath, content);

        return {
            path: filePath,
            language,
            context,
            lines: countLines(content),
            isTest: isTestFile(filePath),
            isBarrel: this.importParser.isBarrel(filePath, content, language),
            references: this.importParser.parseReferences(content, language),
            signals: this.matchSignals(filePath, content, language, context),
            routes: context === 'test' ? [] : this.routeExtractor.extractRoutes(filePath, content, language),
            routeMounts: context === 'test' ? [] : this.routeExtractor.extractMounts(content, language),
            models: context === 'test' ? [] : this.modelExtractor.extract(filePath, content, language),
        };
    }

    /**
     * Every matching value of every applicable group; several values per category are normal
     */
    matchSignals(filePath: string, content: string, language: string, context: FileContext): SignalMatch[] {
        const signals: SignalMatch[] = [];
        if (SOURCE_LANGUAGES.has(language)) {
            signals.push({ category: 'language', value: language, file: filePath });
        }

        const code = withoutComments(content, language);
        for (const group of this.groups) {
            if (!group.contexts.has(context) || !group.languages.has(language)) continue;
            for (const { value, patterns } of group.values) {
                if (patterns.some(pattern => pattern.test(code))) {
                    signals.push({ category: group.category, value, file: filePath });
                }
            }
        }
        return signals;
    }
}
