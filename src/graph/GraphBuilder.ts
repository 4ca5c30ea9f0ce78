import { isSourceFile } from '../analyzer/FileClassifier';
import { Edge, EdgeConfidence, GraphDiagnostics, ModuleNode } from '../models/ModuleGraph';
import { FileExtraction } from '../models/SourceFile';
import logger from '../utils/logger';
import { ModuleGraph } from './ModuleGraph';
import { ModuleResolver } from './ModuleResolver';

export const ROOT_MODULE = 'root';

/** Directory names that name a layer wherever they sit */
const MODULE_HINTS = new Set([
    'controllers', 'services', 'models', 'utils', 'routes', 'middlewares', 'middleware',
    'config', 'repositories', 'hooks', 'store', 'stores', 'pages', 'components',
]);

/** Top-level folders that only hold the real modules */
const CONTAINER_DIRS = new Set(['src', 'app', 'server', 'backend', 'frontend', 'lib', 'packages', 'apps']);

const CONFIDENCE_RANK: Record<EdgeConfidence, number> = { exact: 3, alias: 2, heuristic: 1 };

export interface GraphBuildOptions {
    aliasPrefixes?: Record<string, string>;
    includeTests?: boolean;
    maxUnresolvedSamples?: number;
}

export interface GraphBuildResult {
    graph: ModuleGraph;
    diagnostics: GraphDiagnostics;
    resolver: ModuleResolver;
}

/**
 * Directory-level module a file belongs to
 */
export function logicalNameOf(moduleId: string): string {
    const parts = moduleId.split('/').slice(0, -1);
    if (parts.length === 0) {
        return ROOT_MODULE;
    }
    const hinted = parts.find(part => MODULE_HINTS.has(part.toLowerCase()));
    if (hinted) {
        return hinted;
    }
    if (CONTAINER_DIRS.has(parts[0].toLowerCase()) && parts.length > 1) {
        return parts[1];
    }
    return parts[0];
}

/**
 * Builds the module graph from per-file extractions
 */
export class GraphBuilder {
    private readonly aliasPrefixes: Record<string, string>;
    private readonly includeTests: boolean;
    private readonly maxUnresolvedSamples: number;

    constructor(options: GraphBuildOptions = {}) {
        this.aliasPrefixes = options.aliasPrefixes ?? {};
        this.includeTests = options.includeTests ?? false;
        this.maxUnresolvedSamples = options.maxUnresolvedSamples ?? 20;
    }

    /**
     * @param extractions per-file results, in any order
     * @param knownFiles every scanned path; defaults to the extraction paths
     */
    build(extractions: FileExtraction[], knownFiles?: Iterable<string>): GraphBuildResult {
        const ordered = [...extractions].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
        const members = ordered.filter(file => isSourceFile(file.path) && (this.includeTests || !file.isTest));

        const nodes: ModuleNode[] = members.map(file => ({
            id: file.path,
            logicalName: logicalNameOf(file.path),
            language: file.language,
            context: file.context,
            lines: file.lines,
            isBarrel: file.isBarrel,
            isTest: file.isTest,
        }));

        const moduleIds = new Set(nodes.map(node => node.id));
        const known = new Set(knownFiles ?? ordered.map(file => file.path));
        const resolver = new ModuleResolver(moduleIds, known, this.aliasPrefixes);

        const diagnostics: GraphDiagnostics = {
            resolved: 0,
            unresolved: 0,
            external: 0,
            assets: 0,
            unresolvedSamples: [],
        };
        const edges = new Map<string, Edge>();

        for (const file of members) {
            for (const reference of file.references) {
                const resolution = resolver.resolve(file.path, reference.specifier, file.language);
                switch (resolution.status) {
                    case 'resolved': {
                        diagnostics.resolved++;
                        if (resolution.target === file.path) break;
                        this.mergeEdge(edges, {
                            from: file.path,
                            to: resolution.target,
                            kind: reference.kind === 're-export' ? 're-export' : 'reference',
                            confidence: resolution.confidence,
                        });
                        break;
                    }
                    case 'asset':
                        // Sources left out of the graph (tests by default) are not assets
                        if (!isSourceFile(resolution.target)) diagnostics.assets++;
                        break;
                    case 'external':
                        diagnostics.external++;
                        break;
                    case 'unresolved':
                        diagnostics.unresolved++;
                        if (diagnostics.unresolvedSamples.length < this.maxUnresolvedSamples) {
                            diagnostics.unresolvedSamples.push({ from: file.path, specifier: reference.specifier });
                        }
                        break;
                }
            }
        }

        const graph = new ModuleGraph(nodes, [...edges.values()]);
        logger.debug(
            `Module graph: ${graph.size} modules, ${graph.edgeCount} edges, ` +
            `${diagnostics.unresolved} unresolved, ${diagnostics.external} external`
        );
        return { graph, diagnostics, resolver };
    }

    private mergeEdge(edges: Map<string, Edge>, edge: Edge): void {
        const key = `${edge.from}\u0000${edge.to}`;
        const existing = edges.get(key);
        if (!existing) {
            edges.set(key, edge);
            return;
        }
        if (edge.kind === 're-export') {
            existing.kind = 're-export';
        }
        if (CONFIDENCE_RANK[edge.confidence] > CONFIDENCE_RANK[existing.confidence]) {
            existing.confidence = edge.confidence;
        }
    }
}
