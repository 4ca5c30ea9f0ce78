import path from 'path';
import { DEFAULT_CONFIG, ProfileSlots } from '../config/schema';
import { ROOT_MODULE } from '../graph/GraphBuilder';
import { ModuleGraph } from '../graph/ModuleGraph';
import { DirectoryStats, FileStats } from '../models/AnalysisResult';
import { Cycle, ImpactReport } from '../models/ImpactReport';
import { ModuleNode } from '../models/ModuleGraph';
import { Profile, ProfileDocument } from '../models/Profile';
import { DataModel, RouteEntry } from '../models/SourceFile';
import { SignalIndex } from '../analyzer/SignalIndex';
import { isStyleFile } from '../analyzer/FileClassifier';
import { fitDocument, SectionSource } from './SectionFitter';

/** Categories listed first in the tech stack, in this order */
const CATEGORY_ORDER = [
    'language', 'ui-framework', 'state-management', 'data-fetching', 'routing',
    'orm', 'auth', 'test-framework', 'module-system',
];

export interface ProfileInput {
    projectName: string;
    generatedAt: string;
    files: FileStats;
    directories: DirectoryStats[];
    signals: SignalIndex;
    graph: ModuleGraph;
    /** Routes with mount prefixes already applied */
    routes: RouteEntry[];
    models: DataModel[];
    cycles: Cycle[];
    impact?: ImpactReport;
    notes: string[];
}

export interface SummarizerOptions {
    budget?: number;
    maxModuleMaps?: number;
    minModuleFiles?: number;
    slots?: ProfileSlots;
}

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function plural(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/** Marks a list cut short inside a single line */
function showing(shown: number, total: number): string {
    return shown < total ? ` (showing ${shown} of ${total})` : '';
}

function topDirectory(id: string): string {
    const slash = id.indexOf('/');
    return slash === -1 ? '.' : id.slice(0, slash);
}

function sourceRatio(directory: DirectoryStats | undefined): number {
    return directory && directory.total > 0 ? directory.source / directory.total : 0;
}

/**
 * Renders the analysis into a primary profile and per-module maps, each within a character budget
 */
export class ProfileSummarizer {
    private readonly budget: number;
    private readonly maxModuleMaps: number;
    private readonly minModuleFiles: number;
    private readonly slots: ProfileSlots;

    constructor(options: SummarizerOptions = {}) {
        this.budget = options.budget ?? DEFAULT_CONFIG.profile.budget_chars;
        this.maxModuleMaps = options.maxModuleMaps ?? DEFAULT_CONFIG.profile.max_module_maps;
        this.minModuleFiles = options.minModuleFiles ?? DEFAULT_CONFIG.profile.min_module_files;
        this.slots = options.slots ?? DEFAULT_CONFIG.profile.slots;
    }

    summarize(input: ProfileInput): Profile {
        return {
            primary: this.primaryDocument(input),
            moduleMaps: this.moduleMapNames(input.graph).map(name => this.moduleMap(name, input)),
        };
    }

    primaryDocument(input: ProfileInput): ProfileDocument {
        const sources: SectionSource[] = [
            this.headerSection(input),
            this.techStackSection(input.signals),
            this.directorySection(input.directories),
            this.keyFilesSection(input),
            this.dataModelSection(input.models),
            this.apiSurfaceSection(input.routes),
            this.moduleDependencySection(input.graph),
            this.cycleSection(input.cycles),
            this.impactSection(input.impact),
            this.notesSection(input.notes),
        ];
        return fitDocument(`Project Profile: ${input.projectName}`, sources, this.budget);
    }

    /**
     * Logical modules big enough for their own map, largest first
     */
    moduleMapNames(graph: ModuleGraph): string[] {
        const counts = new Map<string, number>();
        for (const node of graph.modules()) {
            if (node.logicalName === ROOT_MODULE) continue;
            counts.set(node.logicalName, (counts.get(node.logicalName) ?? 0) + 1);
        }
        return [...counts.entries()]
            .filter(([, count]) => count >= this.minModuleFiles)
            .sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]))
            .slice(0, this.maxModuleMaps)
            .map(([name]) => name);
    }

    moduleMap(name: string, input: ProfileInput): ProfileDocument {
        const { graph } = input;
        const members = graph.modules().filter(node => node.logicalName === name);
        const memberIds = new Set(members.map(node => node.id));
        const logicalEdges = graph.logicalEdges();
        const importsFrom = logicalEdges.filter(edge => edge.from === name).map(edge => edge.to);
        const importedBy = logicalEdges.filter(edge => edge.to === name).map(edge => edge.from);
        const keyFiles = members
            .filter(node => !node.isBarrel && !isStyleFile(node.id))
            .sort((a, b) => graph.dependentsOf(b.id).length - graph.dependentsOf(a.id).length || compareText(a.id, b.id));
        const routes = input.routes.filter(route => memberIds.has(route.file));
        const dependencyLimit = this.slots.module_dependencies;

        const sources: SectionSource[] = [
            {
                id: 'header',
                title: 'Header',
                mandatory: true,
                total: 0,
                limit: 0,
                render: () => [`# Module: ${name}/`, `Files: ${members.length}`],
            },
            {
                id: 'imports-from',
                title: 'Imports From',
                total: importsFrom.length,
                limit: dependencyLimit,
                render: count => importsFrom.slice(0, count).map(item => `- \`${item}\``),
            },
            {
                id: 'imported-by',
                title: 'Imported By',
                total: importedBy.length,
                limit: dependencyLimit,
                render: count => importedBy.slice(0, count).map(item => `- \`${item}\``),
            },
            {
                id: 'key-files',
                title: 'Key Files',
                total: keyFiles.length,
                limit: this.slots.key_files,
                render: count => keyFiles.slice(0, count).map(node =>
                    `- \`${node.id}\` (imports: ${graph.dependenciesOf(node.id).length}, imported by: ${graph.dependentsOf(node.id).length})`),
            },
            {
                id: 'route-surface',
                title: 'Route Surface',
                total: routes.length,
                limit: this.slots.routes,
                render: count => routes.slice(0, count).map(route => `- \`${route.method} ${route.path}\` -> \`${route.handler}\``),
            },
        ];
        return fitDocument(`Module: ${name}`, sources, this.budget);
    }

    private headerSection(input: ProfileInput): SectionSource {
        return {
            id: 'header',
            title: 'Header',
            mandatory: true,
            total: 0,
            limit: 0,
            render: () => [
                `# Project Profile: ${input.projectName}`,
                `Generated: ${input.generatedAt} | Files: ${input.files.total} | Source files: ${input.files.source} | Lines: ~${input.files.lines}`,
            ],
        };
    }

    private techStackSection(signals: SignalIndex): SectionSource {
        const rank = (category: string) => {
            const index = CATEGORY_ORDER.indexOf(category);
            return index === -1 ? CATEGORY_ORDER.length : index;
        };
        const categories = signals.categories().sort((a, b) => rank(a) - rank(b) || compareText(a, b));
        const examples = this.slots.examples_per_category;

        const describe = (category: string, value: string) => {
            const files = signals.files(category, value);
            const shown = files.slice(0, examples).map(file => `\`${file}\``).join(', ');
            const cut = files.length > examples ? `, showing ${examples} of ${files.length}` : '';
            return `${value} (${plural(files.length, 'file')}${cut}: ${shown})`;
        };

        return {
            id: 'tech-stack',
            title: 'Tech Stack',
            total: categories.length,
            limit: categories.length,
            render: count => categories.slice(0, count).map(category =>
                `- ${category}: ${signals.values(category).map(value => describe(category, value)).join('; ')}`),
        };
    }

    private directorySection(directories: DirectoryStats[]): SectionSource {
        const ordered = [...directories].sort((a, b) =>
            sourceRatio(b) - sourceRatio(a) || compareText(a.path, b.path));
        return {
            id: 'directory-map',
            title: 'Directory Map',
            total: ordered.length,
            limit: this.slots.directories,
            render: count => ordered.slice(0, count).map(directory =>
                `- \`${directory.path}/\` - ${plural(directory.total, 'file')} (${directory.source} source)`),
        };
    }

    private keyFilesSection(input: ProfileInput): SectionSource {
        const { graph } = input;
        const directories = new Map(input.directories.map(directory => [directory.path, directory]));
        const ratio = (node: ModuleNode) => sourceRatio(directories.get(topDirectory(node.id)));
        const candidates = graph.modules()
            .filter(node => !node.isBarrel && !node.isTest && !isStyleFile(node.id))
            .sort((a, b) =>
                graph.dependentsOf(b.id).length - graph.dependentsOf(a.id).length
                || ratio(b) - ratio(a)
                || b.lines - a.lines
                || compareText(a.id, b.id));

        return {
            id: 'key-files',
            title: 'Key Files',
            total: candidates.length,
            limit: this.slots.key_files,
            render: count => candidates.slice(0, count).map(node =>
                `- \`${node.id}\` (${plural(graph.dependentsOf(node.id).length, 'dependent')}, ${plural(node.lines, 'line')})`),
        };
    }

    private dataModelSection(models: DataModel[]): SectionSource {
        const fieldLimit = this.slots.model_fields;
        const describe = (model: DataModel) => {
            const fields = model.fields.slice(0, fieldLimit).join(', ');
            const more = showing(Math.min(fieldLimit, model.fields.length), model.fields.length);
            const relations = model.relationships.length > 0
                ? ` [${model.relationships.map(relation => `${relation.kind} ${relation.target}`).join(', ')}]`
                : '';
            return `- **${model.name}** (${model.orm}): ${fields ? `${fields}${more}` : 'no fields parsed'}${relations}`;
        };
        return {
            id: 'data-models',
            title: 'Key Data Models',
            total: models.length,
            limit: this.slots.data_models,
            render: count => models.slice(0, count).map(describe),
        };
    }

    private apiSurfaceSection(routes: RouteEntry[]): SectionSource {
        const byFile = new Map<string, RouteEntry[]>();
        for (const route of routes) {
            const list = byFile.get(route.file) ?? [];
            list.push(route);
            byFile.set(route.file, list);
        }
        const files = [...byFile.keys()].sort(compareText);
        const perFile = this.slots.routes_per_file;

        return {
            id: 'api-surface',
            title: 'API Surface',
            total: files.length,
            limit: this.slots.routes,
            render: count => files.slice(0, count).map(file => {
                const list = byFile.get(file) ?? [];
                const shown = list.slice(0, perFile).map(route => `${route.method} ${route.path}`).join(', ');
                const more = showing(Math.min(perFile, list.length), list.length);
                const name = path.posix.basename(file, path.posix.extname(file));
                return `- **${name}** (${plural(list.length, 'route')}): ${shown}${more}`;
            }),
        };
    }

    private moduleDependencySection(graph: ModuleGraph): SectionSource {
        const edges = graph.logicalEdges();
        const names = [...new Set(edges.flatMap(edge => [edge.from, edge.to]))].sort(compareText);

        return {
            id: 'module-dependencies',
            title: 'Module Dependencies',
            total: names.length,
            limit: this.slots.module_dependencies,
            render: count => names.slice(0, count).map(name => {
                const imports = edges.filter(edge => edge.from === name).map(edge => edge.to);
                const importedBy = edges.filter(edge => edge.to === name).map(edge => edge.from);
                return `- \`${name}\`: imports ${imports.length > 0 ? imports.join(', ') : 'nothing'}; imported by ${importedBy.length > 0 ? importedBy.join(', ') : 'nothing'}`;
            }),
        };
    }

    private cycleSection(cycles: Cycle[]): SectionSource {
        const ordered = [
            ...cycles.filter(cycle => cycle.classification === 'direct'),
            ...cycles.filter(cycle => cycle.classification === 'indirect'),
        ];
        return {
            id: 'circular-dependencies',
            title: 'Circular Dependencies',
            total: ordered.length,
            limit: this.slots.cycles,
            render: count => ordered.slice(0, count).map(cycle => {
                const loop = [...cycle.modules, cycle.modules[0]];
                if (cycle.classification === 'direct') {
                    return `- Direct cycle: ${loop.join(' -> ')}`;
                }
                return `- Indirect chain (${cycle.length} modules): ${loop.join(' -> ')}`;
            }),
        };
    }

    private impactSection(impact: ImpactReport | undefined): SectionSource {
        const seeds = impact?.blastRadius.perSeed ?? [];
        return {
            id: 'change-impact',
            title: 'Change Impact',
            total: seeds.length,
            limit: seeds.length,
            keepEmpty: impact !== undefined,
            render: count => {
                if (!impact) return [];
                const radius = impact.blastRadius;
                return [
                    `- Changed: ${plural(impact.changedFiles.length, 'file')} (${impact.changeSource})`,
                    `- Blast radius: ${plural(radius.size, 'module')}, level ${impact.level}${impact.escalate ? ', escalate' : ''}`,
                    `- Affected tests: ${impact.affectedTests.length}`,
                    ...seeds.slice(0, count).map(seed =>
                        `- \`${seed.module}\`: ${seed.direct.length} direct, ${seed.indirect.length} indirect dependents`),
                ];
            },
        };
    }

    private notesSection(notes: string[]): SectionSource {
        return {
            id: 'generation-notes',
            title: 'Generation Notes',
            total: notes.length,
            limit: notes.length,
            render: count => notes.slice(0, count).map(note => `- ${note}`),
        };
    }
}
