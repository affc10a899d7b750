/**
 * Tests for outline construction
 */

import * as fs from 'fs';
import * as path from 'path';
import { Def, DefKind, Modifier, Outline } from '../src/types/core/outline';
import { outline, stripNs } from '../src/server/outline/file-outline';
import { modifierOfFunKind, modifiersOfAstKinds } from '../src/server/outline/modifiers';
import { FunKind, ModifierKeyword } from '../src/server/parsers/ast';

function readFixture(name: string): string {
    return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

function summary(defs: readonly Def[]): unknown[] {
    return defs.map(def => ({
        kind: def.kind,
        name: def.name,
        modifiers: def.modifiers,
        children: summary(def.children)
    }));
}

function walk(defs: Outline): Def[] {
    return defs.flatMap(def => [def, ...walk(def.children)]);
}

describe('modifiersOfAstKinds', () => {
    it('should map every keyword and keep source order', () => {
        expect(modifiersOfAstKinds([
            ModifierKeyword.Protected,
            ModifierKeyword.Static,
            ModifierKeyword.Final,
            ModifierKeyword.Abstract,
            ModifierKeyword.Private,
            ModifierKeyword.Public,
            ModifierKeyword.Static
        ])).toEqual([
            Modifier.Protected,
            Modifier.Static,
            Modifier.Final,
            Modifier.Abstract,
            Modifier.Private,
            Modifier.Public,
            Modifier.Static
        ]);
    });

    it('should append Async after keyword modifiers', () => {
        expect(modifierOfFunKind([Modifier.Public], FunKind.Async)).toEqual([Modifier.Public, Modifier.Async]);
        expect(modifierOfFunKind([], FunKind.AsyncGenerator)).toEqual([Modifier.Async]);
        expect(modifierOfFunKind([Modifier.Static], FunKind.Generator)).toEqual([Modifier.Static]);
    });
});

describe('stripNs', () => {
    it('should keep the last namespace segment', () => {
        expect(stripNs('\\A\\B\\foo')).toBe('foo');
        expect(stripNs('\\foo')).toBe('foo');
        expect(stripNs('foo')).toBe('foo');
    });
});

describe('outline', () => {
    it('should outline a trait method with its modifiers', () => {
        const defs = outline('trait MyTrait { protected static function foo(): int { return 4; } }');

        expect(summary(defs)).toEqual([{
            kind: DefKind.Trait,
            name: 'MyTrait',
            modifiers: [],
            children: [{ kind: DefKind.Method, name: 'foo', modifiers: [Modifier.Protected, Modifier.Static], children: [] }]
        }]);
    });

    it('should outline a class method and drop trait uses', () => {
        const defs = outline(readFixture('trait_and_class.php'));

        expect(summary(defs)).toEqual([
            {
                kind: DefKind.Trait,
                name: 'MyTrait',
                modifiers: [],
                children: [{ kind: DefKind.Method, name: 'foo', modifiers: [Modifier.Protected, Modifier.Static], children: [] }]
            },
            {
                kind: DefKind.Class,
                name: 'A',
                modifiers: [],
                children: [{ kind: DefKind.Method, name: 'bar', modifiers: [Modifier.Public], children: [] }]
            }
        ]);
    });

    it('should keep abstract classes as Class with an Abstract modifier', () => {
        expect(summary(outline('abstract class A {}'))).toEqual([
            { kind: DefKind.Class, name: 'A', modifiers: [Modifier.Abstract], children: [] }
        ]);
    });

    it('should order Abstract before Final', () => {
        const defs = outline('abstract final class Util {}\nfinal class Leaf {}');

        expect(defs.map(def => def.modifiers)).toEqual([[Modifier.Abstract, Modifier.Final], [Modifier.Final]]);
    });

    it('should mark async functions', () => {
        const defs = outline('<?hh\nasync function f(): Awaitable<void> {}\n');

        expect(summary(defs)).toEqual([{ kind: DefKind.Function, name: 'f', modifiers: [Modifier.Async], children: [] }]);
        expect(defs[0].pos.start).toEqual({ line: 1, character: 15 });
        expect(defs[0].span.start).toEqual({ line: 1, character: 0 });
        expect(defs[0].span.end).toEqual({ line: 1, character: 38 });
    });

    it('should mark async generators but not plain generators', () => {
        const defs = outline(`
async function stream(): AsyncGenerator<int, int, void> { yield 1; }
function gen(): Generator<int, int, void> { yield 1; }
`);

        expect(defs.map(def => [def.name, def.modifiers])).toEqual([
            ['stream', [Modifier.Async]],
            ['gen', []]
        ]);
    });

    it('should outline every member shape of a class', () => {
        const defs = outline(readFixture('declarations.php'));

        expect(summary(defs)).toEqual([
            { kind: DefKind.Function, name: 'top', modifiers: [], children: [] },
            {
                kind: DefKind.Class,
                name: 'Base',
                modifiers: [Modifier.Abstract],
                children: [
                    { kind: DefKind.Const, name: 'LIMIT', modifiers: [], children: [] },
                    { kind: DefKind.Const, name: 'OTHER', modifiers: [], children: [] },
                    { kind: DefKind.Const, name: 'NAME', modifiers: [Modifier.Abstract], children: [] },
                    { kind: DefKind.Typeconst, name: 'TValue', modifiers: [Modifier.Abstract], children: [] },
                    { kind: DefKind.Typeconst, name: 'TKey', modifiers: [], children: [] },
                    { kind: DefKind.Property, name: 'count', modifiers: [Modifier.Private, Modifier.Static], children: [] },
                    { kind: DefKind.Property, name: 'other', modifiers: [Modifier.Private, Modifier.Static], children: [] },
                    { kind: DefKind.Method, name: 'create', modifiers: [Modifier.Public, Modifier.Static, Modifier.Async], children: [] },
                    { kind: DefKind.Method, name: 'run', modifiers: [Modifier.Abstract, Modifier.Protected], children: [] }
                ]
            },
            {
                kind: DefKind.Interface,
                name: 'Runner',
                modifiers: [],
                children: [{ kind: DefKind.Method, name: 'run', modifiers: [Modifier.Public], children: [] }]
            },
            { kind: DefKind.Function, name: 'fetch_all', modifiers: [Modifier.Async], children: [] },
            {
                kind: DefKind.Enum,
                name: 'Color',
                modifiers: [],
                children: [
                    { kind: DefKind.Const, name: 'RED', modifiers: [], children: [] },
                    { kind: DefKind.Const, name: 'BLUE', modifiers: [], children: [] }
                ]
            }
        ]);
    });

    it('should span constants from name through initializer', () => {
        const base = outline(readFixture('declarations.php'))[1];
        const [limit, other, name, tValue] = base.children;

        expect([limit.span.startOffset, limit.span.endOffset]).toEqual([100, 110]);
        expect([other.span.startOffset, other.span.endOffset]).toEqual([112, 122]);
        expect(name.span).toEqual(name.pos);
        expect([tValue.span.start, tValue.span.end]).toEqual([
            { line: 9, character: 2 },
            { line: 9, character: 29 }
        ]);
    });

    it('should give grouped properties their own positions', () => {
        const base = outline(readFixture('declarations.php'))[1];
        const count = base.children[5];
        const other = base.children[6];

        expect([count.pos.startOffset, count.pos.endOffset]).toEqual([234, 240]);
        expect([count.span.startOffset, count.span.endOffset]).toEqual([234, 244]);
        expect([other.span.startOffset, other.span.endOffset]).toEqual([246, 252]);
    });

    it('should outline XHP attributes as properties without modifiers', () => {
        const [button] = outline(`class :ui:button extends :x:element {
  category %flow;
  attribute string label = "OK" @required, :ui:base;
  public function render(): void {}
}`);

        expect(summary([button])).toEqual([{
            kind: DefKind.Class,
            name: ':ui:button',
            modifiers: [],
            children: [
                { kind: DefKind.Property, name: 'label', modifiers: [], children: [] },
                { kind: DefKind.Method, name: 'render', modifiers: [Modifier.Public], children: [] }
            ]
        }]);
    });

    it('should outline a constant whose type has several type arguments once', () => {
        expect(summary(outline('class C { const dict<string, int> MAP = dict[]; }'))).toEqual([{
            kind: DefKind.Class,
            name: 'C',
            modifiers: [],
            children: [{ kind: DefKind.Const, name: 'MAP', modifiers: [], children: [] }]
        }]);
    });

    it('should keep declarations that follow XHP text with quotes', () => {
        const defs = outline(`<?hh
class A {
  public function render(): XHPRoot {
    return <p>Don't stop</p>;
  }
}

class B {
  public function b(): void {}
}
`);

        expect(defs.map(def => [def.name, def.children.map(child => child.name)])).toEqual([
            ['A', ['render']],
            ['B', ['b']]
        ]);
    });

    it('should ignore declarations other than functions and classes', () => {
        const defs = outline('type T = int;\nconst int X = 1;\nnewtype N = string;\necho "hi";\nfunction f() {}');

        expect(defs.map(def => def.name)).toEqual(['f']);
    });

    it('should return what it can from broken input', () => {
        const defs = outline('class Broken {\n  public function ok(): void {}\n  public function');

        expect(summary(defs)).toEqual([{
            kind: DefKind.Class,
            name: 'Broken',
            modifiers: [],
            children: [{ kind: DefKind.Method, name: 'ok', modifiers: [Modifier.Public], children: [] }]
        }]);
    });

    it('should return an empty outline for empty content', () => {
        expect(outline('')).toEqual([]);
        expect(outline('<?hh\n')).toEqual([]);
    });

    it('should record the filename on positions', () => {
        const [def] = outline('function f() {}', 'src/f.php');

        expect(def.pos.filename).toBe('src/f.php');
        expect(def.span.filename).toBe('src/f.php');
    });

    it('should keep every position inside its span', () => {
        const defs = walk(outline(readFixture('declarations.php')));

        expect(defs.length).toBe(17);
        for (const def of defs) {
            expect(def.pos.startOffset).toBeGreaterThanOrEqual(def.span.startOffset);
            expect(def.pos.endOffset).toBeLessThanOrEqual(def.span.endOffset);
        }
    });

    it('should only give children to container kinds', () => {
        const containers = new Set([DefKind.Class, DefKind.Interface, DefKind.Trait, DefKind.Enum]);
        const defs = walk(outline(readFixture('declarations.php')));

        for (const def of defs.filter(d => !containers.has(d.kind))) {
            expect(def.children).toEqual([]);
        }
    });
});
