import { GraphBuilder, logicalNameOf } from '../GraphBuilder';
import { ModuleGraph } from '../ModuleGraph';
import { FileExtraction, RawReference } from '../../models/SourceFile';
import { detectLanguage, isTestFile } from '../../analyzer/FileClassifier';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function file(filePath: string, references: RawReference[] = []): FileExtraction {
    return {
        path: filePath,
        language: detectLanguage(filePath),
        context: 'shared',
        lines: 10,
        isTest: isTestFile(filePath),
        isBarrel: false,
        references,
        signals: [],
        routes: [],
        routeMounts: [],
        models: [],
    };
}

const imports = (...specifiers: string[]): RawReference[] =>
    specifiers.map(specifier => ({ specifier, kind: 'import' }));

describe('GraphBuilder', () => {
    const builder = new GraphBuilder({ aliasPrefixes: { '@/': '', '~/': '', 'src/': 'src/' } });

    it('resolves relative, alias and index references into one edge per pair', () => {
        const extractions = [
            file('src/utils/log.test.ts', imports('./log')),
            file('src/utils/log.ts', imports('./log')),
            file('src/routes/index.ts', imports('../utils/log.js')),
            file('src/app.ts', [
                { specifier: './routes', kind: 'import' },
                { specifier: './routes/index', kind: 're-export' },
                { specifier: '@/src/utils/log', kind: 'import' },
                { specifier: 'express', kind: 'import' },
                { specifier: './missing', kind: 'import' },
                { specifier: './styles.css', kind: 'import' },
            ]),
        ];
        const known = [...extractions.map(extraction => extraction.path), 'src/styles.css'];

        const { graph, diagnostics } = builder.build(extractions, known);

        expect(graph.ids()).toEqual(['src/app.ts', 'src/routes/index.ts', 'src/utils/log.ts']);
        expect(graph.edges()).toEqual([
            { from: 'src/app.ts', to: 'src/routes/index.ts', kind: 're-export', confidence: 'exact' },
            { from: 'src/app.ts', to: 'src/utils/log.ts', kind: 'reference', confidence: 'alias' },
            { from: 'src/routes/index.ts', to: 'src/utils/log.ts', kind: 'reference', confidence: 'exact' },
        ]);
        expect(diagnostics).toEqual({
            resolved: 5,
            unresolved: 1,
            external: 1,
            assets: 1,
            unresolvedSamples: [{ from: 'src/app.ts', specifier: './missing' }],
        });
        expect(graph.dependentsOf('src/utils/log.ts')).toEqual(['src/app.ts', 'src/routes/index.ts']);
        expect(graph.logicalEdges()).toEqual([
            { from: 'routes', to: 'utils', weight: 1 },
            { from: 'src', to: 'routes', weight: 1 },
            { from: 'src', to: 'utils', weight: 1 },
        ]);
    });

    it('never produces self-edges or duplicate pairs', () => {
        const { graph } = builder.build([
            file('a.ts', imports('./b', './b.ts', './a', '/b')),
            file('b.ts', imports('./a')),
        ]);

        const pairs = graph.edges().map(edge => `${edge.from}->${edge.to}`);
        expect(pairs).toEqual(['a.ts->b.ts', 'b.ts->a.ts']);
        expect(new Set(pairs).size).toBe(pairs.length);
    });

    it('resolves python relative, package and dotted imports', () => {
        const { graph, diagnostics } = builder.build([
            file('app/__init__.py'),
            file('app/views.py', imports('.models')),
            file('app/models.py', imports('app.db', 'os')),
            file('app/db/__init__.py', imports('..')),
        ]);

        expect(graph.edges().map(edge => `${edge.from}->${edge.to}`)).toEqual([
            'app/db/__init__.py->app/__init__.py',
            'app/models.py->app/db/__init__.py',
            'app/views.py->app/models.py',
        ]);
        expect(diagnostics.external).toBe(1);
    });

    it('keeps root-level files apart in the file graph and merges them logically', () => {
        const { graph } = builder.build([
            file('a.ts', imports('./b')),
            file('b.ts', imports('./lib/c')),
            file('lib/c.ts'),
        ]);

        expect(graph.size).toBe(3);
        expect(graph.get('a.ts')?.logicalName).toBe('root');
        expect(graph.logicalEdges()).toEqual([{ from: 'root', to: 'lib', weight: 1 }]);
    });

    it('includes tests when asked', () => {
        const withTests = new GraphBuilder({ includeTests: true });

        const { graph } = withTests.build([file('x.ts'), file('x.test.ts', imports('./x'))]);

        expect(graph.dependentsOf('x.ts')).toEqual(['x.test.ts']);
    });
});

describe('logicalNameOf', () => {
    it.each([
        ['index.ts', 'root'],
        ['src/services/user/create.ts', 'services'],
        ['src/features/billing/invoice.ts', 'features'],
        ['lib/format.ts', 'lib'],
        ['docs/build.ts', 'docs'],
    ])('%s belongs to %s', (id, expected) => {
        expect(logicalNameOf(id)).toBe(expected);
    });
});

describe('ModuleGraph', () => {
    const node = (id: string) => ({
        id,
        logicalName: 'root',
        language: 'typescript',
        context: 'shared' as const,
        lines: 1,
        isBarrel: false,
        isTest: false,
    });

    it('rejects self-edges, unknown endpoints and duplicates', () => {
        const edge = (from: string, to: string) => ({ from, to, kind: 'reference' as const, confidence: 'exact' as const });

        expect(() => new ModuleGraph([node('a')], [edge('a', 'a')])).toThrow('Self-edge on a');
        expect(() => new ModuleGraph([node('a')], [edge('a', 'b')])).toThrow('references an unknown module');
        expect(() => new ModuleGraph([node('a'), node('b')], [edge('a', 'b'), edge('a', 'b')]))
            .toThrow('Duplicate edge a -> b');
    });
});
