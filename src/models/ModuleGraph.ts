import { FileContext } from './SourceFile';

/**
 * A source file in the dependency graph
 */
export interface ModuleNode {
    /** Root-relative POSIX path */
    id: string;
    /** Directory-level grouping; root-level files share 'root' */
    logicalName: string;
    language: string;
    context: FileContext;
    lines: number;
    isBarrel: boolean;
    isTest: boolean;
}

export type EdgeKind = 'reference' | 're-export';

/**
 * How the target of an edge was found
 * - exact: relative, root-absolute or dotted path
 * - alias: a configured alias prefix
 * - heuristic: same-directory fallback for a bare specifier
 */
export type EdgeConfidence = 'exact' | 'alias' | 'heuristic';

/**
 * Directed edge: `from` depends on `to`
 */
export interface Edge {
    from: string;
    to: string;
    kind: EdgeKind;
    confidence: EdgeConfidence;
}

export interface UnresolvedReference {
    from: string;
    specifier: string;
}

export interface GraphDiagnostics {
    resolved: number;
    unresolved: number;
    external: number;
    assets: number;
    unresolvedSamples: UnresolvedReference[];
}

/**
 * Dependency between two logical modules, weighted by file edges
 */
export interface LogicalEdge {
    from: string;
    to: string;
    weight: number;
}

export interface SerializedGraph {
    modules: ModuleNode[];
    edges: Edge[];
    logicalEdges: LogicalEdge[];
    diagnostics: GraphDiagnostics;
}
