import { compilePatternTable, SignalExtractor } from '../SignalExtractor';
import { SignalIndex } from '../SignalIndex';
import { classifyContext } from '../FileClassifier';

describe('SignalExtractor', () => {
    const extractor = new SignalExtractor();

    it('reports every value of a category instead of picking one', () => {
        const content = "import mongoose from 'mongoose';\nimport { Sequelize } from 'sequelize';\n";

        const result = extractor.extract('src/api/db.ts', content);

        expect(result.context).toBe('backend');
        expect(result.signals).toEqual([
            { category: 'language', value: 'typescript', file: 'src/api/db.ts' },
            { category: 'orm', value: 'mongoose', file: 'src/api/db.ts' },
            { category: 'orm', value: 'sequelize', file: 'src/api/db.ts' },
            { category: 'module-system', value: 'esm', file: 'src/api/db.ts' },
        ]);
    });

    it('ignores libraries that only appear in comments', () => {
        const content = "// const mongoose = require('mongoose');\nimport { Sequelize } from 'sequelize';\n";

        const values = extractor.extract('src/api/db.ts', content).signals.map(s => `${s.category}:${s.value}`);

        expect(values).toEqual(['language:typescript', 'orm:sequelize', 'module-system:esm']);
    });

    it('does not attribute frontend state idioms to backend files', () => {
        const content = "import express from 'express';\nconst [a, setA] = useState(0);\n";

        const values = extractor.extract('server/store.ts', content).signals.map(s => `${s.category}:${s.value}`);

        expect(values).toEqual(['language:typescript', 'routing:express-router', 'module-system:esm']);
    });

    it('attributes the same idiom inside frontend files', () => {
        const content = "import React, { useState } from 'react';\nconst [a, setA] = useState(0);\n";

        const values = extractor.extract('src/components/Counter.tsx', content).signals.map(s => `${s.category}:${s.value}`);

        expect(values).toEqual(['language:typescript', 'ui-framework:react', 'state-management:use-state', 'module-system:esm']);
    });

    it('fills the structural fields of an extraction', () => {
        const content = [
            "const express = require('express');",
            'const router = express.Router();',
            "router.get('/ping', pingHandler);",
            'module.exports = router;',
            '',
        ].join('\n');

        const result = extractor.extract('routes/ping.js', content);

        expect(result).toEqual(expect.objectContaining({
            language: 'javascript',
            context: 'backend',
            lines: 4,
            isTest: false,
            isBarrel: false,
            references: [{ specifier: 'express', kind: 'require' }],
            routes: [{ method: 'GET', path: '/ping', handler: 'pingHandler', file: 'routes/ping.js' }],
            models: [],
        }));
    });

    it('skips routes and models in test files', () => {
        const content = "import { jest } from '@jest/globals';\napp.get('/x', handler);\n";

        const result = extractor.extract('src/__tests__/app.test.ts', content);

        expect(result.context).toBe('test');
        expect(result.routes).toEqual([]);
        expect(result.signals.map(s => s.value)).toContain('jest');
    });

    it('rejects malformed pattern tables', () => {
        expect(() => compilePatternTable({})).toThrow('Signal pattern table must have a "groups" array');
        expect(() => compilePatternTable({
            groups: [{ category: 'x', contexts: ['kitchen'], languages: [], values: {} }],
        })).toThrow("Signal pattern group 'x' has invalid contexts");
    });

    it('accepts custom pattern tables', () => {
        const custom = new SignalExtractor({
            groups: [{
                category: 'queue',
                contexts: ['shared'],
                languages: ['typescript'],
                values: { bullmq: ["['\"]bullmq['\"]"] },
            }],
        });

        const signals = custom.matchSignals('lib/jobs.ts', "import { Queue } from 'bullmq';", 'typescript', 'shared');

        expect(signals).toEqual([
            { category: 'language', value: 'typescript', file: 'lib/jobs.ts' },
            { category: 'queue', value: 'bullmq', file: 'lib/jobs.ts' },
        ]);
    });
});

describe('classifyContext', () => {
    it('treats a tie as shared code', () => {
        expect(classifyContext('lib/format.ts', 'export const x = 1;')).toBe('shared');
    });

    it('recognizes tests and config before anything else', () => {
        expect(classifyContext('src/components/Button.test.tsx', '')).toBe('test');
        expect(classifyContext('vite.config.ts', '')).toBe('config');
    });
});

describe('SignalIndex', () => {
    it('keeps every value with the files it came from', () => {
        const index = new SignalIndex();
        index.addAll([
            { category: 'orm', value: 'sequelize', file: 'b.ts' },
            { category: 'orm', value: 'mongoose', file: 'z.ts' },
            { category: 'orm', value: 'mongoose', file: 'a.ts' },
            { category: 'orm', value: 'mongoose', file: 'a.ts' },
            { category: 'auth', value: 'jwt', file: 'a.ts' },
        ]);

        expect(index.toJSON()).toEqual({
            auth: { jwt: ['a.ts'] },
            orm: { mongoose: ['a.ts', 'z.ts'], sequelize: ['b.ts'] },
        });
        expect(index.values('orm')).toEqual(['mongoose', 'sequelize']);
        expect(index.values('missing')).toEqual([]);
    });
});
