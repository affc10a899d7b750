/**
 * Hack Declaration Parser
 * Builds the declaration-level syntax tree used by the outline.
 *
 * Function bodies, initializers and statements are skipped by bracket
 * matching; only their extents are recorded. The parser never throws on
 * malformed input: it records a diagnostic and resynchronises.
 */

import {
    ClassConst,
    ClassElt,
    ClassKind,
    ClassVar,
    Def,
    FunKind,
    Id,
    ModifierKeyword,
    ParseDiagnostic,
    ParseResult,
    Pos,
    Program
} from './ast';
import { Token, TokenKind, tokenize } from './hack-lexer';

const MODIFIER_KEYWORDS: ReadonlyMap<string, ModifierKeyword> = new Map([
    ['final', ModifierKeyword.Final],
    ['static', ModifierKeyword.Static],
    ['abstract', ModifierKeyword.Abstract],
    ['private', ModifierKeyword.Private],
    ['public', ModifierKeyword.Public],
    ['protected', ModifierKeyword.Protected]
]);

const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

interface ConstItem {
    name: Token | null;
    exprPos: Pos | null;
}

export class HackParser {
    private readonly tokens: Token[];
    private readonly diagnostics: ParseDiagnostic[];
    private index = 0;
    private previousEnd = 0;
    private namespace = '';

    constructor(content: string) {
        const lexed = tokenize(content);
        this.tokens = lexed.tokens;
        this.diagnostics = lexed.diagnostics;
    }

    parseProgram(): ParseResult {
        const ast: Program = [];
        this.parseDefs(ast, false);
        return { ast, diagnostics: this.diagnostics };
    }

    // ---- top level ----

    private parseDefs(out: Program, inBlock: boolean): void {
        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF) {
                if (inBlock) {
                    this.error('Expected `}` to close namespace block', tok);
                }
                return;
            }
            if (this.isPunct(tok, '}')) {
                this.advance();
                if (inBlock) {
                    return;
                }
                this.error('Unexpected `}`', tok);
                continue;
            }
            if (this.isPunct(tok, '<<')) {
                this.skipAttributes();
                continue;
            }

            const start = this.index;
            this.parseDef(out);
            if (this.index === start) {
                this.error(`Unexpected token \`${tok.text}\``, tok);
                this.advance();
            }
        }
    }

    private parseDef(out: Program): void {
        const tok = this.peek();
        const next = this.peek(1);

        if (this.isKeyword(tok, 'namespace') && (next.kind === TokenKind.Identifier || this.isPunct(next, '{'))) {
            this.parseNamespace(out);
        } else if (this.isKeyword(tok, 'use')) {
            out.push({ tag: 'NamespaceUse', span: this.skipStatement() });
        } else if (this.isKeyword(tok, 'function') && !this.isPunct(next, '(')) {
            out.push(this.parseFun());
        } else if (this.isKeyword(tok, 'async') && this.isKeyword(next, 'function')) {
            out.push(this.parseFun());
        } else if (this.startsClass(tok, next)) {
            out.push(this.parseClass());
        } else if (this.isKeyword(tok, 'enum') && next.kind === TokenKind.Identifier && !this.isKeyword(next, 'class')) {
            out.push(this.parseEnum());
        } else if ((this.isKeyword(tok, 'type') || this.isKeyword(tok, 'newtype')) && next.kind === TokenKind.Identifier) {
            out.push({ tag: 'Typedef', name: this.idOf(next, next.text), span: this.skipStatement() });
        } else if (this.isKeyword(tok, 'const')) {
            out.push({ tag: 'Constant', span: this.skipStatement() });
        } else {
            out.push({ tag: 'Stmt', span: this.skipStatement() });
        }
    }

    private startsClass(tok: Token, next: Token): boolean {
        if (this.isKeyword(tok, 'abstract') || this.isKeyword(tok, 'final') || this.isKeyword(tok, 'xhp')) {
            return next.kind === TokenKind.Identifier;
        }
        if (this.isKeyword(tok, 'class')) {
            return next.kind === TokenKind.Identifier || this.isPunct(next, ':');
        }
        return (this.isKeyword(tok, 'interface') || this.isKeyword(tok, 'trait')) && next.kind === TokenKind.Identifier;
    }

    private parseNamespace(out: Program): void {
        this.advance();
        const tok = this.peek();
        let name = '';
        if (tok.kind === TokenKind.Identifier) {
            name = tok.text.replace(/^\\/, '');
            this.advance();
        }
        out.push({ tag: 'Namespace', name: this.idOf(tok, name) });

        if (this.isPunct(this.peek(), '{')) {
            this.advance();
            const saved = this.namespace;
            this.namespace = name;
            this.parseDefs(out, true);
            this.namespace = saved;
            return;
        }

        if (this.isPunct(this.peek(), ';')) {
            this.advance();
        } else {
            this.error('Expected `;` or `{` after namespace name', this.peek());
        }
        this.namespace = name;
    }

    private parseFun(): Def {
        const first = this.peek();
        let isAsync = false;
        if (this.isKeyword(first, 'async')) {
            isAsync = true;
            this.advance();
        }
        this.advance();
        if (this.isPunct(this.peek(), '&')) {
            this.advance();
        }

        const nameTok = this.peek();
        if (nameTok.kind !== TokenKind.Identifier) {
            this.error('Expected function name', nameTok);
            const rest = this.skipStatement();
            return { tag: 'Stmt', span: { start: first.start, end: Math.max(first.end, rest.end) } };
        }
        this.advance();

        const tail = this.parseFunctionTail();
        return {
            tag: 'Fun',
            name: this.idOf(nameTok, this.qualify(nameTok.text)),
            span: { start: first.start, end: tail.end },
            funKind: funKindOf(isAsync, tail.sawYield)
        };
    }

    /**
     * Type parameters, parameter list, return type and body (or `;`).
     */
    private parseFunctionTail(): { end: number; sawYield: boolean } {
        if (this.isPunct(this.peek(), '<')) {
            this.skipTypeParams();
        }
        if (this.isPunct(this.peek(), '(')) {
            this.skipBalanced('(', ')');
        } else {
            this.error('Expected `(`', this.peek());
        }

        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF || this.isPunct(tok, '}')) {
                this.error('Expected function body', tok);
                return { end: this.previousEnd, sawYield: false };
            }
            if (this.isPunct(tok, '{')) {
                const sawYield = this.skipBalanced('{', '}');
                return { end: this.previousEnd, sawYield };
            }
            if (this.isPunct(tok, ';')) {
                this.advance();
                return { end: tok.end, sawYield: false };
            }
            if (this.isPunct(tok, '(')) {
                this.skipBalanced('(', ')');
                continue;
            }
            this.advance();
        }
    }

    private parseClass(): Def {
        const first = this.peek();
        let isAbstract = false;
        let isFinal = false;
        for (;;) {
            const tok = this.peek();
            if (this.isKeyword(tok, 'abstract')) {
                isAbstract = true;
            } else if (this.isKeyword(tok, 'final')) {
                isFinal = true;
            } else if (!this.isKeyword(tok, 'xhp')) {
                break;
            }
            this.advance();
        }

        const keyword = this.peek();
        let classKind: ClassKind;
        if (this.isKeyword(keyword, 'class')) {
            classKind = isAbstract ? ClassKind.Abstract : ClassKind.Normal;
        } else if (this.isKeyword(keyword, 'interface')) {
            classKind = ClassKind.Interface;
        } else if (this.isKeyword(keyword, 'trait')) {
            classKind = ClassKind.Trait;
        } else {
            this.error('Expected `class`, `interface` or `trait`', keyword);
            return { tag: 'Stmt', span: this.spanFrom(first, this.skipStatement()) };
        }
        this.advance();

        const name = this.parseClassName();
        if (!name) {
            this.error('Expected class name', this.peek());
            return { tag: 'Stmt', span: this.spanFrom(first, this.skipStatement()) };
        }

        // extends / implements / type parameters
        while (!this.isPunct(this.peek(), '{')) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF || this.isPunct(tok, ';') || this.isPunct(tok, '}')) {
                break;
            }
            if (this.isPunct(tok, '(')) {
                this.skipBalanced('(', ')');
                continue;
            }
            this.advance();
        }

        const body = this.parseClassBody();
        return {
            tag: 'Class',
            name,
            span: { start: first.start, end: this.previousEnd },
            classKind,
            final: isFinal,
            body
        };
    }

    private parseClassName(): Id | null {
        const tok = this.peek();
        if (tok.kind === TokenKind.Identifier) {
            this.advance();
            return this.idOf(tok, this.qualify(tok.text));
        }
        if (this.isPunct(tok, ':') && this.peek(1).start === tok.end) {
            return this.readGluedName();
        }
        return null;
    }

    /**
     * `enum E : int as int { A = 1; B = 2; }` becomes an Enum class whose
     * body holds one Const element per enumerator.
     */
    private parseEnum(): Def {
        const first = this.advance();
        const nameTok = this.advance();

        while (!this.isPunct(this.peek(), '{')) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF || this.isPunct(tok, ';') || this.isPunct(tok, '}')) {
                break;
            }
            this.advance();
        }

        const body: ClassElt[] = [];
        if (!this.isPunct(this.peek(), '{')) {
            this.error('Expected `{`', this.peek());
        } else {
            this.advance();
            for (;;) {
                const tok = this.peek();
                if (tok.kind === TokenKind.EOF) {
                    this.error('Expected `}`', tok);
                    break;
                }
                if (this.isPunct(tok, '}')) {
                    this.advance();
                    break;
                }
                if (this.isPunct(tok, ';') || this.isPunct(tok, ',')) {
                    this.advance();
                    continue;
                }
                if (tok.kind === TokenKind.Identifier && this.isPunct(this.peek(1), '=')) {
                    this.advance();
                    this.advance();
                    body.push({ tag: 'Const', consts: [{ id: this.idOf(tok, tok.text), exprPos: this.skipExpression() }] });
                    continue;
                }
                this.error('Expected enum constant', tok);
                this.skipStatement();
            }
        }

        return {
            tag: 'Class',
            name: this.idOf(nameTok, this.qualify(nameTok.text)),
            span: { start: first.start, end: this.previousEnd },
            classKind: ClassKind.Enum,
            final: false,
            body
        };
    }

    // ---- class bodies ----

    private parseClassBody(): ClassElt[] {
        const body: ClassElt[] = [];
        if (!this.isPunct(this.peek(), '{')) {
            this.error('Expected `{`', this.peek());
            return body;
        }
        this.advance();

        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF) {
                this.error('Expected `}`', tok);
                return body;
            }
            if (this.isPunct(tok, '}')) {
                this.advance();
                return body;
            }
            if (this.isPunct(tok, '<<')) {
                this.skipAttributes();
                continue;
            }
            if (this.isPunct(tok, ';')) {
                this.advance();
                continue;
            }

            const start = this.index;
            this.parseClassElt(body);
            if (this.index === start) {
                this.error(`Unexpected token \`${tok.text}\``, tok);
                this.advance();
            }
        }
    }

    private parseClassElt(body: ClassElt[]): void {
        const first = this.peek();
        const next = this.peek(1);

        if (this.isKeyword(first, 'use')) {
            body.push({ tag: 'ClassUse', span: this.skipStatement() });
            return;
        }
        if (this.isKeyword(first, 'require') && (this.isKeyword(next, 'extends') || this.isKeyword(next, 'implements'))) {
            body.push({ tag: 'ClassTraitRequire', span: this.skipStatement() });
            return;
        }
        if (this.isKeyword(first, 'category')) {
            body.push({ tag: 'XhpCategory', span: this.skipStatement() });
            return;
        }
        if (this.isKeyword(first, 'children')) {
            body.push({ tag: 'XhpChildren', span: this.skipStatement() });
            return;
        }
        if (this.isKeyword(first, 'attribute')) {
            this.advance();
            this.parseXhpAttributes(body);
            return;
        }

        const kinds: ModifierKeyword[] = [];
        let isAsync = false;
        for (;;) {
            const tok = this.peek();
            const modifier = tok.kind === TokenKind.Identifier ? MODIFIER_KEYWORDS.get(tok.text.toLowerCase()) : undefined;
            if (modifier) {
                kinds.push(modifier);
            } else if (this.isKeyword(tok, 'async')) {
                isAsync = true;
            } else if (!this.isKeyword(tok, 'var')) {
                break;
            }
            this.advance();
        }

        const tok = this.peek();
        if (this.isKeyword(tok, 'const')) {
            this.parseClassConst(body, first, kinds.includes(ModifierKeyword.Abstract));
        } else if (this.isKeyword(tok, 'function')) {
            this.parseMethod(body, first, kinds, isAsync);
        } else {
            this.parseClassVars(body, kinds);
        }
    }

    private parseMethod(body: ClassElt[], first: Token, kinds: ModifierKeyword[], isAsync: boolean): void {
        this.advance();
        if (this.isPunct(this.peek(), '&')) {
            this.advance();
        }
        const nameTok = this.peek();
        if (nameTok.kind !== TokenKind.Identifier) {
            this.error('Expected method name', nameTok);
            this.skipStatement();
            return;
        }
        this.advance();

        const tail = this.parseFunctionTail();
        body.push({
            tag: 'Method',
            kinds,
            name: this.idOf(nameTok, nameTok.text),
            span: { start: first.start, end: tail.end },
            funKind: funKindOf(isAsync, tail.sawYield)
        });
    }

    private parseClassVars(body: ClassElt[], kinds: ModifierKeyword[]): void {
        // Skip the type hint up to the first property name
        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.Variable) {
                break;
            }
            if (tok.kind === TokenKind.EOF || this.isPunct(tok, ';') || this.isPunct(tok, '}')) {
                this.error('Expected property name', tok);
                if (this.isPunct(tok, ';')) {
                    this.advance();
                }
                return;
            }
            if (this.isKeyword(tok, 'function') || this.isKeyword(tok, 'const')) {
                // The next member starts here
                this.error('Expected property name', tok);
                return;
            }
            if (this.isPunct(tok, '{')) {
                this.error('Unexpected `{` in class body', tok);
                this.skipBalanced('{', '}');
                return;
            }
            if (this.isPunct(tok, '(')) {
                this.skipBalanced('(', ')');
                continue;
            }
            this.advance();
        }

        const vars: ClassVar[] = [];
        for (;;) {
            const varTok = this.peek();
            if (varTok.kind !== TokenKind.Variable) {
                this.error('Expected property name', varTok);
                break;
            }
            this.advance();

            let end = varTok.end;
            if (this.isPunct(this.peek(), '=')) {
                this.advance();
                end = Math.max(end, this.skipExpression().end);
            }
            vars.push({
                span: { start: varTok.start, end },
                id: this.idOf(varTok, varTok.text.slice(1))
            });

            const delimiter = this.peek();
            if (this.isPunct(delimiter, ',')) {
                this.advance();
                continue;
            }
            if (this.isPunct(delimiter, ';')) {
                this.advance();
            } else {
                this.error('Expected `;`', delimiter);
            }
            break;
        }

        if (vars.length > 0) {
            body.push({ tag: 'ClassVars', kinds, vars });
        }
    }

    private parseClassConst(body: ClassElt[], first: Token, isAbstract: boolean): void {
        this.advance();

        if (this.isKeyword(this.peek(), 'type') && this.peek(1).kind === TokenKind.Identifier) {
            this.advance();
            const nameTok = this.advance();
            const rest = this.skipStatement();
            body.push({
                tag: 'TypeConst',
                name: this.idOf(nameTok, nameTok.text),
                abstract: isAbstract,
                span: { start: first.start, end: Math.max(nameTok.end, rest.end) }
            });
            return;
        }

        const items: ConstItem[] = [];
        for (;;) {
            items.push(this.readConstItem());
            const delimiter = this.peek();
            if (this.isPunct(delimiter, ',')) {
                this.advance();
                continue;
            }
            if (this.isPunct(delimiter, ';')) {
                this.advance();
            } else {
                this.error('Expected `;`', delimiter);
            }
            break;
        }

        const consts: ClassConst[] = [];
        for (const item of items) {
            if (!item.name) {
                this.error('Expected constant name', this.peek());
                continue;
            }
            if (item.exprPos) {
                consts.push({ id: this.idOf(item.name, item.name.text), exprPos: item.exprPos });
            } else {
                if (consts.length > 0) {
                    body.push({ tag: 'Const', consts: consts.splice(0) });
                }
                body.push({ tag: 'AbsConst', id: this.idOf(item.name, item.name.text) });
            }
        }
        if (consts.length > 0) {
            body.push({ tag: 'Const', consts });
        }
    }

    /**
     * One `[type] NAME [= expr]` item of a constant declaration. The name is
     * the last identifier before `=` or the delimiter. Type arguments count
     * as nesting, so `dict<string, int>` stays one type.
     */
    private readConstItem(): ConstItem {
        let name: Token | null = null;
        let depth = 0;
        let angles = 0;
        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF) {
                return { name, exprPos: null };
            }
            if (this.isPunct(tok, '<')) {
                angles++;
            } else if (this.isPunct(tok, '>')) {
                angles = Math.max(0, angles - 1);
            } else if (this.isPunct(tok, '>>')) {
                angles = Math.max(0, angles - 2);
            }
            if (depth === 0 && (this.isPunct(tok, ';') || this.isPunct(tok, '}'))) {
                return { name, exprPos: null };
            }
            if (depth === 0 && angles === 0) {
                if (this.isPunct(tok, ',')) {
                    return { name, exprPos: null };
                }
                if (this.isPunct(tok, '=')) {
                    this.advance();
                    return { name, exprPos: this.skipExpression() };
                }
                if (tok.kind === TokenKind.Identifier) {
                    name = tok;
                }
            }
            if (this.isPunct(tok, '(') || this.isPunct(tok, '[')) {
                depth++;
            } else if ((this.isPunct(tok, ')') || this.isPunct(tok, ']')) && depth > 0) {
                depth--;
            }
            this.advance();
        }
    }

    /**
     * `attribute Type name [= default] [@required], :xhp:class, ...;`
     */
    private parseXhpAttributes(body: ClassElt[]): void {
        for (;;) {
            const item = this.collectListItem();
            this.addXhpAttribute(body, item);

            const delimiter = this.peek();
            if (this.isPunct(delimiter, ',')) {
                this.advance();
                continue;
            }
            if (this.isPunct(delimiter, ';')) {
                this.advance();
            } else {
                this.error('Expected `;`', delimiter);
            }
            return;
        }
    }

    private addXhpAttribute(body: ClassElt[], item: Token[]): void {
        if (item.length === 0) {
            this.error('Expected attribute declaration', this.peek());
            return;
        }

        if (this.isPunct(item[0], ':') && isGluedRun(item, 0, item.length)) {
            body.push({ tag: 'XhpAttrUse', name: gluedId(item, 0, item.length) });
            return;
        }

        let nameEnd = item.findIndex(tok => this.isPunct(tok, '=') || this.isPunct(tok, '@'));
        if (nameEnd === -1) {
            nameEnd = item.length;
        }
        if (nameEnd === 0 || item[nameEnd - 1].kind !== TokenKind.Identifier) {
            this.error('Expected attribute name', item[0]);
            return;
        }
        let nameStart = nameEnd - 1;
        while (nameStart > 0 && isGlueable(item[nameStart - 1]) && item[nameStart - 1].end === item[nameStart].start) {
            nameStart--;
        }

        const at = item.findIndex(tok => this.isPunct(tok, '@'));
        const declEnd = at === -1 ? item.length : at;
        const id = gluedId(item, nameStart, nameEnd);
        body.push({
            tag: 'XhpAttr',
            var: {
                span: { start: id.pos.start, end: item[declEnd - 1].end },
                id
            }
        });
    }

    /**
     * Consumes tokens up to `,` or `;` at bracket depth zero, without
     * consuming the delimiter.
     */
    private collectListItem(): Token[] {
        const item: Token[] = [];
        let depth = 0;
        // Type arguments before the default value
        let angles = 0;
        let inType = true;
        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF) {
                return item;
            }
            if (depth === 0 && (this.isPunct(tok, ';') || this.isPunct(tok, '}'))) {
                return item;
            }
            if (depth === 0 && angles === 0 && this.isPunct(tok, ',')) {
                return item;
            }
            if (inType) {
                if (this.isPunct(tok, '<')) {
                    angles++;
                } else if (this.isPunct(tok, '>')) {
                    angles = Math.max(0, angles - 1);
                } else if (this.isPunct(tok, '>>')) {
                    angles = Math.max(0, angles - 2);
                } else if (this.isPunct(tok, '=') || this.isPunct(tok, '@')) {
                    inType = false;
                    angles = 0;
                }
            }
            if (tok.kind === TokenKind.Punct && OPENERS.has(tok.text)) {
                depth++;
            } else if (tok.kind === TokenKind.Punct && CLOSERS.has(tok.text)) {
                depth--;
            }
            item.push(this.advance());
        }
    }

    // ---- skipping ----

    /**
     * Skips a statement: up to and including `;` at depth zero, or the `}`
     * that closes a block opened by the statement. An unmatched `}` is left
     * for the caller.
     */
    private skipStatement(): Pos {
        const start = this.peek().start;
        const startIndex = this.index;
        let depth = 0;
        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF || (depth === 0 && this.isPunct(tok, '}'))) {
                break;
            }
            this.advance();
            if (tok.kind === TokenKind.Punct && OPENERS.has(tok.text)) {
                depth++;
            } else if (tok.kind === TokenKind.Punct && CLOSERS.has(tok.text)) {
                depth = Math.max(0, depth - 1);
                if (depth === 0 && tok.text === '}') {
                    break;
                }
            } else if (depth === 0 && this.isPunct(tok, ';')) {
                break;
            }
        }
        return { start, end: this.index === startIndex ? start : this.previousEnd };
    }

    /**
     * Skips an expression up to `,` or `;` at depth zero, or an unmatched
     * closing bracket. Neither is consumed.
     */
    private skipExpression(): Pos {
        const start = this.peek().start;
        const startIndex = this.index;
        let depth = 0;
        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF) {
                break;
            }
            if (tok.kind === TokenKind.Punct && CLOSERS.has(tok.text)) {
                if (depth === 0) {
                    break;
                }
                depth--;
            } else if (tok.kind === TokenKind.Punct && OPENERS.has(tok.text)) {
                depth++;
            } else if (depth === 0 && (this.isPunct(tok, ',') || this.isPunct(tok, ';'))) {
                break;
            }
            this.advance();
        }
        if (this.index === startIndex) {
            this.error('Expected expression', this.peek());
            return { start, end: start };
        }
        return { start, end: this.previousEnd };
    }

    /**
     * Skips from the current `open` token to its matching `close` token.
     * Returns whether a `yield` was seen on the way, not counting the bodies
     * of closures and lambdas.
     */
    private skipBalanced(open: string, close: string): boolean {
        let depth = 0;
        let sawYield = false;
        // Depth of the outermost closure body being skipped, if any
        let nestedDepth: number | null = null;
        let closurePending = false;
        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF) {
                this.error(`Expected \`${close}\``, tok);
                return sawYield;
            }
            this.advance();
            if (this.isPunct(tok, open)) {
                depth++;
                if (open === '{' && closurePending && nestedDepth === null) {
                    nestedDepth = depth;
                }
                closurePending = false;
            } else if (this.isPunct(tok, close)) {
                if (nestedDepth === depth) {
                    nestedDepth = null;
                }
                depth--;
                if (depth === 0) {
                    return sawYield;
                }
            } else if (this.isKeyword(tok, 'yield')) {
                sawYield = sawYield || nestedDepth === null;
            } else if (this.isKeyword(tok, 'function')) {
                closurePending = true;
            } else if (this.isPunct(tok, '==>')) {
                closurePending = this.isPunct(this.peek(), '{');
            }
        }
    }

    private skipTypeParams(): void {
        let depth = 0;
        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF || this.isPunct(tok, '{') || this.isPunct(tok, ';')) {
                this.error('Expected `>`', tok);
                return;
            }
            this.advance();
            if (this.isPunct(tok, '<')) {
                depth++;
            } else if (this.isPunct(tok, '<<')) {
                depth += 2;
            } else if (this.isPunct(tok, '>')) {
                depth--;
            } else if (this.isPunct(tok, '>>')) {
                depth -= 2;
            }
            if (depth <= 0) {
                return;
            }
        }
    }

    /** `<<Attr, Other(1)>>` */
    private skipAttributes(): void {
        const open = this.advance();
        let depth = 0;
        for (;;) {
            const tok = this.peek();
            if (tok.kind === TokenKind.EOF) {
                this.error('Expected `>>` to close attribute list', open);
                return;
            }
            this.advance();
            if (this.isPunct(tok, '(')) {
                depth++;
            } else if (this.isPunct(tok, ')')) {
                depth--;
            } else if (depth <= 0 && this.isPunct(tok, '>>')) {
                return;
            }
        }
    }

    // ---- helpers ----

    private readGluedName(): Id {
        const first = this.index;
        this.advance();
        while (isGlueable(this.peek()) && this.peek().start === this.previousEnd) {
            this.advance();
        }
        return gluedId(this.tokens, first, this.index);
    }

    private qualify(name: string): string {
        if (name.startsWith('\\')) {
            return name;
        }
        return this.namespace ? `\\${this.namespace}\\${name}` : `\\${name}`;
    }

    private idOf(tok: Token, name: string): Id {
        return { pos: { start: tok.start, end: tok.end }, name };
    }

    private spanFrom(first: Token, rest: Pos): Pos {
        return { start: first.start, end: Math.max(first.end, rest.end) };
    }

    private peek(offset = 0): Token {
        return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
    }

    private advance(): Token {
        const tok = this.peek();
        if (tok.kind !== TokenKind.EOF) {
            this.index++;
            this.previousEnd = tok.end;
        }
        return tok;
    }

    private isPunct(tok: Token, text: string): boolean {
        return tok.kind === TokenKind.Punct && tok.text === text;
    }

    private isKeyword(tok: Token, word: string): boolean {
        return tok.kind === TokenKind.Identifier && tok.text.toLowerCase() === word;
    }

    private error(message: string, tok: Token): void {
        this.diagnostics.push({ message, pos: { start: tok.start, end: tok.end } });
    }
}

function funKindOf(isAsync: boolean, sawYield: boolean): FunKind {
    if (isAsync) {
        return sawYield ? FunKind.AsyncGenerator : FunKind.Async;
    }
    return sawYield ? FunKind.Generator : FunKind.Sync;
}

function isGlueable(tok: Token): boolean {
    return tok.kind === TokenKind.Identifier
        || (tok.kind === TokenKind.Punct && (tok.text === ':' || tok.text === '-'));
}

function isGluedRun(tokens: Token[], start: number, end: number): boolean {
    for (let i = start; i < end; i++) {
        if (!isGlueable(tokens[i]) || (i > start && tokens[i - 1].end !== tokens[i].start)) {
            return false;
        }
    }
    return true;
}

function gluedId(tokens: Token[], start: number, end: number): Id {
    const run = tokens.slice(start, end);
    return {
        pos: { start: run[0].start, end: run[run.length - 1].end },
        name: run.map(tok => tok.text).join('')
    };
}

/**
 * Parse Hack source text. The tree is always produced, possibly partial.
 */
export function parse(content: string): ParseResult {
    return new HackParser(content).parseProgram();
}

/**
 * Parse and drop the diagnostics. The one place outline generation
 * discards parse errors.
 */
export function parseBestEffort(content: string): Program {
    return parse(content).ast;
}
