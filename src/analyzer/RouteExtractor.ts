import { RouteEntry, RouteMount } from '../models/SourceFile';
import { SCRIPT_LANGUAGES } from './FileClassifier';

const JS_ROUTE = /\b([A-Za-z_$][\w$]*)\.(get|post|put|delete|patch|options|head|all)\(\s*(['"`])([^'"`\n]+)\3([^\n]*)/g;
const JS_ROUTER_OBJECTS = /^(?:app|router|server|\w+Router|\w+Routes)$/;
const JS_MOUNT = /\b(?:app|router|server|\w+Router)\.use\(\s*(['"`])([^'"`\n]+)\1\s*,\s*(?:require\(\s*['"]([^'"]+)['"]\s*\)|([A-Za-z_$][\w$]*))/g;
const JS_DEFAULT_IMPORT = /^\s*import\s+([A-Za-z_$][\w$]*)\s*(?:,\s*\{[^}]*\})?\s+from\s+['"]([^'"]+)['"]/gm;
const JS_REQUIRE_BINDING = /\b(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*=\s*require\(\s*['"]([^'"]+)['"]\s*\)/g;

const PY_DECORATOR = /^[ \t]*@(\w+)\.(get|post|put|delete|patch|options|head|route|api_route)\(\s*['"]([^'"]+)['"]([^\n]*)$/gm;
const PY_DEF = /^[ \t]*(?:async\s+)?def\s+(\w+)/m;

/**
 * Handler name from the arguments after the route path; inline functions yield 'inline'
 */
function handlerFromArgs(args: string): string {
    const tokens = args.replace(/^\s*,/, '').split(',').map(token => token.trim());
    let handler = '';
    for (const token of tokens) {
        if (token.startsWith('(') || token.startsWith('async') || token.startsWith('function') || token.includes('=>')) {
            return 'inline';
        }
        const name = token.replace(/[);\s]+$/, '');
        if (/^[A-Za-z_$][\w$.]*$/.test(name)) {
            handler = name;
        }
        if (token.includes(')')) break;
    }
    return handler || 'inline';
}

/**
 * Route path as served once its router is mounted under `prefix`
 */
export function joinRoutePath(prefix: string, routePath: string): string {
    const clean = routePath.startsWith('/') ? routePath : `/${routePath}`;
    const base = prefix.replace(/\/+$/, '');
    if (!base) return clean;
    return clean === '/' ? base : `${base}${clean}`;
}

/**
 * Finds route registrations and router mount points
 */
export class RouteExtractor {
    extractRoutes(filePath: string, content: string, language: string): RouteEntry[] {
        if (SCRIPT_LANGUAGES.has(language)) {
            return this.extractScriptRoutes(filePath, content);
        }
        if (language === 'python') {
            return this.extractPythonRoutes(filePath, content);
        }
        return [];
    }

    extractMounts(content: string, language: string): RouteMount[] {
        if (!SCRIPT_LANGUAGES.has(language)) return [];

        const bindings = new Map<string, string>();
        for (const pattern of [JS_DEFAULT_IMPORT, JS_REQUIRE_BINDING]) {
            pattern.lastIndex = 0;
            let match: RegExpExecArray | null;
            while ((match = pattern.exec(content)) !== null) {
                bindings.set(match[1], match[2]);
            }
        }

        const mounts: RouteMount[] = [];
        JS_MOUNT.lastIndex = 0;
        let match: RegExpExecArray | null;
        while ((match = JS_MOUNT.exec(content)) !== null) {
            const prefix = match[2];
            const specifier = match[3] ?? bindings.get(match[4]);
            if (specifier && prefix.startsWith('/')) {
                mounts.push({ prefix, specifier });
            }
        }
        return mounts;
    }

    private extractScriptRoutes(filePath: string, content: string): RouteEntry[] {
        const routes: RouteEntry[] = [];
        JS_ROUTE.lastIndex = 0;
        let match: RegExpExecArray | null;
        while ((match = JS_ROUTE.exec(content)) !== null) {
            const [, object, method, , routePath, rest] = match;
            if (!JS_ROUTER_OBJECTS.test(object) || !routePath.startsWith('/')) continue;
            routes.push({
                method: method.toUpperCase(),
                path: routePath,
                handler: handlerFromArgs(rest),
                file: filePath,
            });
        }
        return routes;
    }

    private extractPythonRoutes(filePath: string, content: string): RouteEntry[] {
        const routes: RouteEntry[] = [];
        PY_DECORATOR.lastIndex = 0;
        let match: RegExpExecArray | null;
        while ((match = PY_DECORATOR.exec(content)) !== null) {
            const [, , verb, routePath, rest] = match;
            const following = content.slice(match.index + match[0].length);
            const handler = PY_DEF.exec(following)?.[1] ?? 'inline';
            for (const method of this.pythonMethods(verb, rest)) {
                routes.push({ method, path: routePath, handler, file: filePath });
            }
        }
        return routes;
    }

    private pythonMethods(verb: string, rest: string): string[] {
        if (verb !== 'route' && verb !== 'api_route') {
            return [verb.toUpperCase()];
        }
        const listed = /methods\s*=\s*[[(]([^\])]*)[\])]/.exec(rest);
        if (!listed) return ['GET'];
        const methods = listed[1].split(',')
            .map(method => method.trim().replace(/['"]/g, '').toUpperCase())
            .filter(method => method !== '');
        return methods.length > 0 ? methods : ['GET'];
    }
}
