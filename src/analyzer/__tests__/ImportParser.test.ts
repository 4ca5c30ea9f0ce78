import { ImportParser } from '../ImportParser';

describe('ImportParser', () => {
    const parser = new ImportParser();

    describe('parseReferences', () => {
        it('collects every script reference form', () => {
            const content = [
                "import React, { useState } from 'react';",
                "import './styles.css';",
                "export * from './barrel-a';",
                'export { b as c } from "./b";',
                "const x = require('../x');",
                "const lazy = () => import('./lazy');",
                "// import './commented';",
                "/* import './blocked'; */",
            ].join('\n');

            expect(parser.parseReferences(content, 'typescript')).toEqual([
                { specifier: './barrel-a', kind: 're-export' },
                { specifier: './b', kind: 're-export' },
                { specifier: 'react', kind: 'import' },
                { specifier: './styles.css', kind: 'import' },
                { specifier: '../x', kind: 'require' },
                { specifier: './lazy', kind: 'dynamic-import' },
            ]);
        });

        it('reads multi-line named imports', () => {
            const content = "import {\n    a,\n    b,\n} from './letters';\n";

            expect(parser.parseReferences(content, 'javascript')).toEqual([
                { specifier: './letters', kind: 'import' },
            ]);
        });

        it('ignores references built from expressions', () => {
            const content = 'const mod = require(name);\nconst other = import(`./${name}`);\n';

            expect(parser.parseReferences(content, 'javascript')).toEqual([]);
        });

        it('collects python relative and absolute imports', () => {
            const content = [
                'from . import models, views as v',
                'from .utils.helpers import slugify',
                'import os, app.config as cfg',
                '# import hidden',
            ].join('\n');

            expect(parser.parseReferences(content, 'python').map(ref => ref.specifier)).toEqual([
                '.models',
                '.views',
                '.utils.helpers',
                'os',
                'app.config',
            ]);
        });

        it('returns nothing for languages it does not parse', () => {
            expect(parser.parseReferences('import "x";', 'markdown')).toEqual([]);
        });
    });

    describe('isBarrel', () => {
        it('accepts files made only of re-exports', () => {
            const content = "export * from './a';\nexport { b } from './b';\n";
            expect(parser.isBarrel('src/index.ts', content, 'typescript')).toBe(true);
        });

        it('accepts import-then-export-list files', () => {
            const content = "import { a } from './a';\nexport { a };\n";
            expect(parser.isBarrel('src/index.js', content, 'javascript')).toBe(true);
        });

        it('rejects files with their own declarations', () => {
            const content = "export * from './a';\nexport const x = 1;\n";
            expect(parser.isBarrel('src/index.ts', content, 'typescript')).toBe(false);
        });

        it('accepts python package initializers that only re-export', () => {
            const content = '"""Package."""\nfrom .models import User\n__all__ = ["User"]\n';
            expect(parser.isBarrel('app/__init__.py', content, 'python')).toBe(true);
            expect(parser.isBarrel('app/mod.py', content, 'python')).toBe(false);
        });
    });
});
