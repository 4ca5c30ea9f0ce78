import { DataModel, ModelRelationship } from '../models/SourceFile';
import { extractBlock, topLevelKeys } from '../utils/sourceText';
import { SCRIPT_LANGUAGES } from './FileClassifier';

const NOISE_MODEL_NAMES = new Set(['index', 'init', 'setup', 'connection', 'db']);
const NOISE_FIELD_KEYS = new Set([
    'type', 'required', 'default', 'ref', 'allowNull', 'primaryKey', 'unique', 'validate',
]);

const MONGOOSE_MODEL = /\b(?:mongoose\.)?model\(\s*['"](\w+)['"]\s*,\s*([A-Za-z_$][\w$]*)/g;
const SCHEMA_DECLARATION = /\b(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*=\s*new\s+(?:mongoose\.)?Schema\(\s*\{/g;
const SEQUELIZE_DEFINE = /\b\w+\.define\(\s*['"](\w+)['"]\s*,\s*\{/g;
const SEQUELIZE_CLASS = /\bclass\s+(\w+)\s+extends\s+(?:Sequelize\.)?Model\b/g;
const SEQUELIZE_ASSOCIATION = /\b(\w+)\.(belongsTo|hasMany|hasOne|belongsToMany)\(\s*(?:models\.)?(\w+)/g;
const TYPEORM_ENTITY = /@Entity\([^)]*\)\s*(?:export\s+)?(?:default\s+)?class\s+(\w+)[^{]*\{/g;
const TYPEORM_MEMBER = /@(\w+)\((?:[^()]|\([^()]*\))*\)\s*(?:(?:public|private|protected|readonly)\s+)*(\w+)[?!]?\s*:/g;
const TYPEORM_RELATIONS = new Set(['ManyToOne', 'OneToMany', 'OneToOne', 'ManyToMany']);
const PRISMA_MODEL = /^model\s+(\w+)\s*\{/gm;
const DJANGO_MODEL = /^class\s+(\w+)\(models\.Model\):/gm;
const SQLALCHEMY_MODEL = /^class\s+(\w+)\((?:Base|DeclarativeBase|db\.Model)\):/gm;
const DJANGO_FIELD = /^[ \t]+(\w+)\s*=\s*models\.(\w+)\(\s*['"]?(\w*)/gm;
const SQLALCHEMY_FIELD = /^[ \t]+(\w+)\s*(?::\s*Mapped\[[^\]]*\]\s*)?=\s*(?:db\.|sa\.)?(Column|mapped_column|relationship)\(\s*['"]?(\w*)/gm;
const DJANGO_RELATIONS = new Set(['ForeignKey', 'OneToOneField', 'ManyToManyField']);

function matches(pattern: RegExp, content: string): RegExpExecArray[] {
    pattern.lastIndex = 0;
    const found: RegExpExecArray[] = [];
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(content)) !== null) {
        found.push(match);
    }
    return found;
}

/**
 * Python class body: the indented lines that follow the class statement
 */
function pythonClassBody(content: string, fromIndex: number): string {
    const lines = content.slice(fromIndex).split('\n').slice(1);
    const body: string[] = [];
    for (const line of lines) {
        if (line.trim() !== '' && !/^\s/.test(line)) break;
        body.push(line);
    }
    return body.join('\n');
}

/**
 * Finds data model / schema definitions and their fields
 */
export class ModelExtractor {
    extract(filePath: string, content: string, language: string): DataModel[] {
        let models: DataModel[] = [];
        if (SCRIPT_LANGUAGES.has(language)) {
            models = [
                ...this.mongoose(filePath, content),
                ...this.sequelize(filePath, content),
                ...this.typeorm(filePath, content),
            ];
        } else if (language === 'prisma') {
            models = this.prisma(filePath, content);
        } else if (language === 'python') {
            models = this.python(filePath, content);
        }

        const seen = new Set<string>();
        return models.filter(model => {
            if (NOISE_MODEL_NAMES.has(model.name.toLowerCase()) || seen.has(model.name)) return false;
            seen.add(model.name);
            return true;
        });
    }

    private mongoose(filePath: string, content: string): DataModel[] {
        const schemas = new Map<string, string>();
        for (const match of matches(SCHEMA_DECLARATION, content)) {
            schemas.set(match[1], extractBlock(content, match.index + match[0].length - 1));
        }

        return matches(MONGOOSE_MODEL, content).map(match => {
            const body = schemas.get(match[2]) ?? '';
            return {
                name: match[1],
                orm: 'mongoose',
                fields: this.objectFields(body),
                relationships: matches(/\bref\s*:\s*['"](\w+)['"]/g, body)
                    .map(ref => ({ kind: 'ref', target: ref[1] })),
                file: filePath,
            };
        });
    }

    private sequelize(filePath: string, content: string): DataModel[] {
        const associations = matches(SEQUELIZE_ASSOCIATION, content);
        const relationshipsOf = (name: string): ModelRelationship[] => associations
            .filter(match => match[1] === name)
            .map(match => ({ kind: match[2], target: match[3] }));

        const defined = matches(SEQUELIZE_DEFINE, content).map(match => ({
            name: match[1],
            orm: 'sequelize',
            fields: this.objectFields(extractBlock(content, match.index + match[0].length - 1)),
            relationships: relationshipsOf(match[1]),
            file: filePath,
        }));

        const classes = matches(SEQUELIZE_CLASS, content).map(match => {
            const init = new RegExp(`\\b${match[1]}\\.init\\(\\s*\\{`).exec(content);
            const body = init ? extractBlock(content, init.index + init[0].length - 1) : '';
            return {
                name: match[1],
                orm: 'sequelize',
                fields: this.objectFields(body),
                relationships: relationshipsOf(match[1]),
                file: filePath,
            };
        });

        return [...defined, ...classes];
    }

    private typeorm(filePath: string, content: string): DataModel[] {
        return matches(TYPEORM_ENTITY, content).map(match => {
            const body = extractBlock(content, match.index + match[0].length - 1);
            const fields: string[] = [];
            const relationships: ModelRelationship[] = [];
            for (const member of matches(TYPEORM_MEMBER, body)) {
                const [decoratorCall, decorator, property] = member;
                if (!decorator.includes('Column') && !TYPEORM_RELATIONS.has(decorator)) continue;
                fields.push(property);
                const target = /=>\s*(\w+)/.exec(decoratorCall);
                if (TYPEORM_RELATIONS.has(decorator) && target) {
                    relationships.push({ kind: decorator, target: target[1] });
                }
            }
            return { name: match[1], orm: 'typeorm', fields, relationships, file: filePath };
        });
    }

    private prisma(filePath: string, content: string): DataModel[] {
        return matches(PRISMA_MODEL, content).map(match => {
            const body = extractBlock(content, match.index + match[0].length - 1);
            const fields: string[] = [];
            const relationships: ModelRelationship[] = [];
            for (const line of body.split('\n')) {
                const field = /^\s*(\w+)\s+(\w+)/.exec(line);
                if (!field) continue;
                fields.push(field[1]);
                if (line.includes('@relation')) {
                    relationships.push({ kind: 'relation', target: field[2] });
                }
            }
            return { name: match[1], orm: 'prisma', fields, relationships, file: filePath };
        });
    }

    private python(filePath: string, content: string): DataModel[] {
        const django = matches(DJANGO_MODEL, content).map(match => {
            const body = pythonClassBody(content, match.index);
            const fields = matches(DJANGO_FIELD, body);
            return {
                name: match[1],
                orm: 'django',
                fields: fields.map(field => field[1]),
                relationships: fields
                    .filter(field => DJANGO_RELATIONS.has(field[2]) && field[3] !== '')
                    .map(field => ({ kind: field[2], target: field[3] })),
                file: filePath,
            };
        });

        const sqlalchemy = matches(SQLALCHEMY_MODEL, content).map(match => {
            const body = pythonClassBody(content, match.index);
            const fields = matches(SQLALCHEMY_FIELD, body);
            return {
                name: match[1],
                orm: 'sqlalchemy',
                fields: fields.map(field => field[1]),
                relationships: fields
                    .filter(field => field[2] === 'relationship' && field[3] !== '')
                    .map(field => ({ kind: 'relationship', target: field[3] })),
                file: filePath,
            };
        });

        return [...django, ...sqlalchemy];
    }

    private objectFields(body: string): string[] {
        return topLevelKeys(body).filter(key => !NOISE_FIELD_KEYS.has(key));
    }
}
