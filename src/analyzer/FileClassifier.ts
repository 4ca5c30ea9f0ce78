import path from 'path';
import { FileContext } from '../models/SourceFile';

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
    '.ts': 'typescript',
    '.tsx': 'typescript',
    '.mts': 'typescript',
    '.cts': 'typescript',
    '.js': 'javascript',
    '.jsx': 'javascript',
    '.mjs': 'javascript',
    '.cjs': 'javascript',
    '.py': 'python',
    '.go': 'go',
    '.java': 'java',
    '.rb': 'ruby',
    '.php': 'php',
    '.cs': 'csharp',
    '.rs': 'rust',
    '.vue': 'vue',
    '.svelte': 'svelte',
    '.prisma': 'prisma',
    '.json': 'json',
    '.yml': 'yaml',
    '.yaml': 'yaml',
    '.md': 'markdown',
    '.html': 'html',
    '.sql': 'sql',
    '.sh': 'shell',
    '.css': 'style',
    '.scss': 'style',
    '.sass': 'style',
    '.less': 'style',
    '.styl': 'style',
    '.pcss': 'style',
};

/** Languages whose files become modules of the dependency graph */
export const SOURCE_LANGUAGES: ReadonlySet<string> = new Set([
    'typescript', 'javascript', 'python', 'go', 'java', 'ruby', 'php', 'csharp', 'rust', 'vue', 'svelte',
]);

/** Languages the reference parser understands */
export const SCRIPT_LANGUAGES: ReadonlySet<string> = new Set(['typescript', 'javascript', 'vue', 'svelte']);

const FRONTEND_DIRS = new Set([
    'components', 'pages', 'hooks', 'store', 'stores', 'views', 'ui', 'client', 'frontend',
    'web', 'layouts', 'screens', 'styles', 'contexts', 'widgets',
]);

const BACKEND_DIRS = new Set([
    'server', 'api', 'routes', 'controllers', 'services', 'models', 'middleware', 'middlewares',
    'backend', 'repositories', 'db', 'database', 'migrations', 'handlers', 'resolvers', 'entities', 'workers',
]);

const FRONTEND_EXTENSIONS = new Set(['.jsx', '.tsx', '.vue', '.svelte']);
const BACKEND_EXTENSIONS = new Set(['.py', '.go', '.java', '.rb', '.php', '.cs', '.rs', '.prisma', '.sql']);

const FRONTEND_IMPORT = /(?:from\s+|require\(\s*)['"](?:react|react-dom|vue|svelte|@angular\/core|next\/(?:link|navigation|router|image))['"]/;
const BACKEND_IMPORT = /(?:from\s+|require\(\s*)['"](?:express|fastify|koa|@nestjs\/[\w-]+|mongoose|sequelize|typeorm|pg|mysql2|http|node:http)['"]/;

const TEST_FILE = /(?:^|\/)(?:__tests__|__mocks__|tests?|spec|e2e)\/|\.(?:test|spec)\.[cm]?[jt]sx?$|(?:^|\/)test_[^/]+\.py$|_test\.(?:py|go)$|Tests?\.(?:java|cs)$/;
const CONFIG_FILE = /(?:^|\/)(?:[\w.-]+\.config\.[cm]?[jt]s|\.eslintrc(?:\.\w+)?|\.prettierrc(?:\.\w+)?|package\.json|tsconfig(?:\.[\w-]+)?\.json|babel\.config\.json|setup\.py|setup\.cfg|pyproject\.toml|Dockerfile|docker-compose\.ya?ml)$/;

export function detectLanguage(filePath: string): string {
    return LANGUAGE_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? 'other';
}

export function isSourceFile(filePath: string): boolean {
    return SOURCE_LANGUAGES.has(detectLanguage(filePath));
}

export function isTestFile(filePath: string): boolean {
    return TEST_FILE.test(filePath);
}

export function isConfigFile(filePath: string): boolean {
    return CONFIG_FILE.test(filePath);
}

export function isStyleFile(filePath: string): boolean {
    return detectLanguage(filePath) === 'style';
}

/**
 * Place a file on the frontend/backend axis from its imports, directories and extension.
 * Imports weigh more than location; a tie means shared code.
 */
export function classifyContext(filePath: string, content: string): FileContext {
    if (isTestFile(filePath)) return 'test';
    if (isConfigFile(filePath)) return 'config';

    let frontend = 0;
    let backend = 0;

    if (FRONTEND_IMPORT.test(content)) frontend += 2;
    if (BACKEND_IMPORT.test(content)) backend += 2;

    for (const segment of path.posix.dirname(filePath).split('/')) {
        const lowered = segment.toLowerCase();
        if (FRONTEND_DIRS.has(lowered)) frontend++;
        if (BACKEND_DIRS.has(lowered)) backend++;
    }

    const extension = path.extname(filePath).toLowerCase();
    if (FRONTEND_EXTENSIONS.has(extension)) frontend++;
    if (BACKEND_EXTENSIONS.has(extension)) backend++;

    if (frontend > backend) return 'frontend';
    if (backend > frontend) return 'backend';
    return 'shared';
}
