/**
 * Tests for the flat legacy outline
 */

import * as fs from 'fs';
import * as path from 'path';
import { AbsolutePos, Def, DefKind, Modifier } from '../src/types/core/outline';
import { outline } from '../src/server/outline/file-outline';
import { outlineLegacy, toJsonLegacy, toLegacy } from '../src/server/outline/legacy';
import { toJson } from '../src/server/outline/serializers';

function readFixture(name: string): string {
    return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

const POS: AbsolutePos = {
    filename: 'nested.php',
    start: { line: 0, character: 0 },
    end: { line: 0, character: 1 },
    startOffset: 0,
    endOffset: 1
};

function def(kind: DefKind, name: string, modifiers: Modifier[] = [], children: Def[] = []): Def {
    return { kind, name, pos: POS, span: POS, modifiers, children };
}

describe('toLegacy', () => {
    it('should flatten a trait and a class with their methods', () => {
        const entries = toJsonLegacy(outlineLegacy(readFixture('trait_and_class.php'), 'trait_and_class.php'));

        expect(entries).toEqual([
            { name: 'MyTrait', type: 'class', line: 3, char_start: 7, char_end: 13 },
            { name: 'MyTrait::foo', type: 'static method', line: 4, char_start: 29, char_end: 31 },
            { name: 'A', type: 'class', line: 9, char_start: 7, char_end: 7 },
            { name: 'A::bar', type: 'method', line: 12, char_start: 19, char_end: 21 }
        ]);
    });

    it('should list entries in source order', () => {
        const entries = toJsonLegacy(outlineLegacy(readFixture('declarations.php')));

        expect(entries).toEqual([
            { name: 'top', type: 'function', line: 5, char_start: 10, char_end: 12 },
            { name: 'Base', type: 'class', line: 7, char_start: 16, char_end: 19 },
            { name: 'Base::create', type: 'static method', line: 16, char_start: 32, char_end: 37 },
            { name: 'Base::run', type: 'method', line: 20, char_start: 31, char_end: 33 },
            { name: 'Runner', type: 'class', line: 23, char_start: 11, char_end: 16 },
            { name: 'Runner::run', type: 'method', line: 24, char_start: 19, char_end: 21 },
            { name: 'fetch_all', type: 'function', line: 27, char_start: 16, char_end: 24 },
            { name: 'Color', type: 'class', line: 29, char_start: 6, char_end: 10 }
        ]);
    });

    it('should qualify methods with every enclosing container', () => {
        const tree = [
            def(DefKind.Class, 'Outer', [], [
                def(DefKind.Method, 'first'),
                def(DefKind.Trait, 'Inner', [], [def(DefKind.Method, 'deep', [Modifier.Static])]),
                def(DefKind.Property, 'skipped'),
                def(DefKind.Const, 'SKIPPED'),
                def(DefKind.Typeconst, 'TSkipped')
            ]),
            def(DefKind.Function, 'after')
        ];

        expect(toLegacy(tree).map(entry => [entry.name, entry.type])).toEqual([
            ['Outer', 'class'],
            ['Outer::first', 'method'],
            ['Inner', 'class'],
            ['Outer::Inner::deep', 'static method'],
            ['after', 'function']
        ]);
    });

    it('should keep the definition position of every entry', () => {
        const defs = outline(readFixture('trait_and_class.php'));
        const [trait, klass] = defs;

        expect(toLegacy(defs).map(entry => entry.pos)).toEqual([
            trait.pos,
            trait.children[0].pos,
            klass.pos,
            klass.children[0].pos
        ]);
    });

    it('should agree with the structured positions', () => {
        const defs = outline(readFixture('declarations.php'));
        const tree = toJson(defs);
        const legacy = toJsonLegacy(toLegacy(defs));

        const base = tree[1];
        expect(base.name).toBe('Base');
        expect(legacy[1]).toEqual({
            name: 'Base',
            type: 'class',
            line: base.position.line,
            char_start: base.position.char_start,
            char_end: base.position.char_end
        });
    });

    it('should return an empty list for an empty outline', () => {
        expect(toLegacy([])).toEqual([]);
        expect(toJsonLegacy([])).toEqual([]);
    });
});
