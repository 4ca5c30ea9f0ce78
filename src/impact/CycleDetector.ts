import { DIRECT_CYCLE_MAX_LENGTH } from '../config/schema';
import { ModuleGraph } from '../graph/ModuleGraph';
import { Cycle } from '../models/ImpactReport';

interface Frame {
    node: string;
    next: number;
}

function valueOf(map: Map<string, number>, key: string): number {
    return map.get(key) ?? 0;
}

/**
 * Tarjan's algorithm without recursion, so deep import chains cannot overflow the stack.
 * Components come back sorted internally and by their smallest member.
 */
export function stronglyConnectedComponents(graph: ModuleGraph): string[][] {
    let counter = 0;
    const indices = new Map<string, number>();
    const lowlinks = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    const components: string[][] = [];

    const visit = (node: string, work: Frame[]) => {
        indices.set(node, counter);
        lowlinks.set(node, counter);
        counter++;
        stack.push(node);
        onStack.add(node);
        work.push({ node, next: 0 });
    };

    for (const start of graph.ids()) {
        if (indices.has(start)) continue;
        const work: Frame[] = [];
        visit(start, work);

        while (work.length > 0) {
            const frame = work[work.length - 1];
            const dependencies = graph.dependenciesOf(frame.node);

            if (frame.next < dependencies.length) {
                const target = dependencies[frame.next++];
                if (!indices.has(target)) {
                    visit(target, work);
                } else if (onStack.has(target)) {
                    lowlinks.set(frame.node, Math.min(valueOf(lowlinks, frame.node), valueOf(indices, target)));
                }
                continue;
            }

            work.pop();
            const parent = work[work.length - 1];
            if (parent) {
                lowlinks.set(parent.node, Math.min(valueOf(lowlinks, parent.node), valueOf(lowlinks, frame.node)));
            }

            if (valueOf(lowlinks, frame.node) === valueOf(indices, frame.node)) {
                const component: string[] = [];
                let member: string | undefined;
                do {
                    member = stack.pop();
                    if (member === undefined) break;
                    onStack.delete(member);
                    component.push(member);
                } while (member !== frame.node);
                components.push(component.sort());
            }
        }
    }

    return components.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/**
 * Shortest cycle through `start` that stays inside `members`
 */
function shortestCycleThrough(graph: ModuleGraph, start: string, members: ReadonlySet<string>): string[] {
    const parents = new Map<string, string>();
    const queue = [start];
    const seen = new Set([start]);

    for (let head = 0; head < queue.length; head++) {
        const current = queue[head];
        for (const next of graph.dependenciesOf(current)) {
            if (!members.has(next)) continue;
            if (next === start) {
                const cycle = [current];
                let step = parents.get(current);
                while (step !== undefined) {
                    cycle.push(step);
                    step = parents.get(step);
                }
                return cycle.reverse();
            }
            if (!seen.has(next)) {
                seen.add(next);
                parents.set(next, current);
                queue.push(next);
            }
        }
    }
    return [];
}

/**
 * One representative cycle per strongly connected component with more than one module
 */
export function detectCycles(graph: ModuleGraph, directMaxLength: number = DIRECT_CYCLE_MAX_LENGTH): Cycle[] {
    const cycles: Cycle[] = [];
    for (const component of stronglyConnectedComponents(graph)) {
        if (component.length < 2) continue;
        const modules = shortestCycleThrough(graph, component[0], new Set(component));
        if (modules.length === 0) continue;
        cycles.push({
            modules,
            length: modules.length,
            componentSize: component.length,
            classification: modules.length <= directMaxLength ? 'direct' : 'indirect',
        });
    }
    return cycles;
}
