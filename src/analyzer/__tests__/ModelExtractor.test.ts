import { ModelExtractor } from '../ModelExtractor';

describe('ModelExtractor', () => {
    const extractor = new ModelExtractor();

    it('reads mongoose schemas bound to a model', () => {
        const content = [
            "const mongoose = require('mongoose');",
            'const userSchema = new mongoose.Schema({',
            '  name: { type: String, required: true },',
            '  email: String,',
            "  team: { type: mongoose.Schema.Types.ObjectId, ref: 'Team' },",
            '});',
            "module.exports = mongoose.model('User', userSchema);",
        ].join('\n');

        expect(extractor.extract('models/user.js', content, 'javascript')).toEqual([{
            name: 'User',
            orm: 'mongoose',
            fields: ['name', 'email', 'team'],
            relationships: [{ kind: 'ref', target: 'Team' }],
            file: 'models/user.js',
        }]);
    });

    it('reads sequelize definitions and associations', () => {
        const content = [
            "const Project = sequelize.define('Project', {",
            '  title: { type: DataTypes.STRING, allowNull: false },',
            '  budget: DataTypes.INTEGER,',
            '});',
            'Project.belongsTo(models.Owner);',
        ].join('\n');

        expect(extractor.extract('db/project.js', content, 'javascript')).toEqual([{
            name: 'Project',
            orm: 'sequelize',
            fields: ['title', 'budget'],
            relationships: [{ kind: 'belongsTo', target: 'Owner' }],
            file: 'db/project.js',
        }]);
    });

    it('reads typeorm entities', () => {
        const content = [
            '@Entity()',
            'export class Post {',
            '    @PrimaryGeneratedColumn()',
            '    id: number;',
            '',
            '    @Column({ length: 100 })',
            '    title: string;',
            '',
            '    @ManyToOne(() => User, (user) => user.posts)',
            '    author: User;',
            '}',
        ].join('\n');

        const [model] = extractor.extract('src/entities/Post.ts', content, 'typescript');

        expect(model.fields).toEqual(['id', 'title', 'author']);
        expect(model.relationships).toEqual([{ kind: 'ManyToOne', target: 'User' }]);
    });

    it('reads prisma models', () => {
        const content = [
            'model Post {',
            '  id       Int    @id @default(autoincrement())',
            '  title    String',
            '  author   User   @relation(fields: [authorId], references: [id])',
            '  authorId Int',
            '  @@index([authorId])',
            '}',
        ].join('\n');

        const [model] = extractor.extract('prisma/schema.prisma', content, 'prisma');

        expect(model.fields).toEqual(['id', 'title', 'author', 'authorId']);
        expect(model.relationships).toEqual([{ kind: 'relation', target: 'User' }]);
    });

    it('reads django models up to the end of the class body', () => {
        const content = [
            'from django.db import models',
            '',
            'class Order(models.Model):',
            "    customer = models.ForeignKey('Customer', on_delete=models.CASCADE)",
            '    total = models.DecimalField(max_digits=8, decimal_places=2)',
            '',
            'def helper():',
            '    stray = models.CharField()',
        ].join('\n');

        expect(extractor.extract('shop/models.py', content, 'python')).toEqual([{
            name: 'Order',
            orm: 'django',
            fields: ['customer', 'total'],
            relationships: [{ kind: 'ForeignKey', target: 'Customer' }],
            file: 'shop/models.py',
        }]);
    });

    it('drops infrastructure names that are not domain models', () => {
        const content = "const s = new Schema({ a: String });\nmodel('connection', s);\n";

        expect(extractor.extract('db/index.js', content, 'javascript')).toEqual([]);
    });
});
