import { Edge, GraphDiagnostics, LogicalEdge, ModuleNode, SerializedGraph } from '../models/ModuleGraph';

function compareIds(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Immutable dependency graph. Every edge endpoint is a module and no module depends on itself.
 */
export class ModuleGraph {
    private readonly nodes: ReadonlyMap<string, ModuleNode>;
    private readonly edgeList: readonly Edge[];
    private readonly outgoing = new Map<string, string[]>();
    private readonly incoming = new Map<string, string[]>();

    constructor(modules: ModuleNode[], edges: Edge[]) {
        const nodes = new Map<string, ModuleNode>();
        for (const module of [...modules].sort((a, b) => compareIds(a.id, b.id))) {
            if (nodes.has(module.id)) {
                throw new Error(`Duplicate module id: ${module.id}`);
            }
            nodes.set(module.id, Object.freeze({ ...module }));
            this.outgoing.set(module.id, []);
            this.incoming.set(module.id, []);
        }

        const seen = new Set<string>();
        const kept: Edge[] = [];
        for (const edge of [...edges].sort((a, b) => compareIds(a.from, b.from) || compareIds(a.to, b.to))) {
            if (edge.from === edge.to) {
                throw new Error(`Self-edge on ${edge.from}`);
            }
            const from = this.outgoing.get(edge.from);
            const to = this.incoming.get(edge.to);
            if (!from || !to) {
                throw new Error(`Edge ${edge.from} -> ${edge.to} references an unknown module`);
            }
            const key = `${edge.from}\u0000${edge.to}`;
            if (seen.has(key)) {
                throw new Error(`Duplicate edge ${edge.from} -> ${edge.to}`);
            }
            seen.add(key);
            from.push(edge.to);
            to.push(edge.from);
            kept.push(Object.freeze({ ...edge }));
        }
        this.incoming.forEach(list => list.sort(compareIds));

        this.nodes = nodes;
        this.edgeList = Object.freeze(kept);
    }

    get size(): number {
        return this.nodes.size;
    }

    get edgeCount(): number {
        return this.edgeList.length;
    }

    has(id: string): boolean {
        return this.nodes.has(id);
    }

    get(id: string): ModuleNode | undefined {
        return this.nodes.get(id);
    }

    /** Module ids in sorted order */
    ids(): string[] {
        return [...this.nodes.keys()];
    }

    modules(): ModuleNode[] {
        return [...this.nodes.values()];
    }

    edges(): readonly Edge[] {
        return this.edgeList;
    }

    /** Modules `id` depends on */
    dependenciesOf(id: string): readonly string[] {
        return this.outgoing.get(id) ?? [];
    }

    /** Modules that depend on `id` */
    dependentsOf(id: string): readonly string[] {
        return this.incoming.get(id) ?? [];
    }

    /**
     * Edges between logical modules; all root-level files count as the single 'root' module
     */
    logicalEdges(): LogicalEdge[] {
        const weights = new Map<string, LogicalEdge>();
        for (const edge of this.edgeList) {
            const from = this.nodes.get(edge.from)?.logicalName;
            const to = this.nodes.get(edge.to)?.logicalName;
            if (!from || !to || from === to) continue;
            const key = `${from}\u0000${to}`;
            const existing = weights.get(key);
            if (existing) {
                existing.weight++;
            } else {
                weights.set(key, { from, to, weight: 1 });
            }
        }
        return [...weights.values()].sort((a, b) => compareIds(a.from, b.from) || compareIds(a.to, b.to));
    }

    serialize(diagnostics: GraphDiagnostics): SerializedGraph {
        return {
            modules: this.modules(),
            edges: [...this.edgeList],
            logicalEdges: this.logicalEdges(),
            diagnostics,
        };
    }
}
