/**
 * File Outline
 * Turns the declaration tree of one file into a forest of outline entries
 */

import { TextDocument } from 'vscode-languageserver-textdocument';
import * as ast from '../parsers/ast';
import { parseBestEffort } from '../parsers/hack-parser';
import { Def, DefKind, Modifier, Outline } from '../../types/core/outline';
import { assertNever } from './labels';
import { modifierOfFunKind, modifiersOfAstKinds } from './modifiers';
import { btw, toAbsolute } from './pos';

export const HACK_LANGUAGE_ID = 'hack';

/**
 * Drops the namespace qualification: `\A\B\foo` becomes `foo`
 */
export function stripNs(name: string): string {
    const i = name.lastIndexOf('\\');
    return i === -1 ? name : name.slice(i + 1);
}

function summarizeProperty(document: TextDocument, kinds: readonly ast.ModifierKeyword[], v: ast.ClassVar): Def {
    return {
        kind: DefKind.Property,
        name: v.id.name,
        pos: toAbsolute(document, v.id.pos),
        span: toAbsolute(document, v.span),
        modifiers: modifiersOfAstKinds(kinds),
        children: []
    };
}

function summarizeConst(document: TextDocument, c: ast.ClassConst): Def {
    return {
        kind: DefKind.Const,
        name: c.id.name,
        pos: toAbsolute(document, c.id.pos),
        span: toAbsolute(document, btw(c.id.pos, c.exprPos)),
        modifiers: [],
        children: []
    };
}

function summarizeAbsConst(document: TextDocument, id: ast.Id): Def {
    const pos = toAbsolute(document, id.pos);
    return {
        kind: DefKind.Const,
        name: id.name,
        pos,
        span: pos,
        modifiers: [Modifier.Abstract],
        children: []
    };
}

function summarizeTypeconst(document: TextDocument, t: ast.TypeConst): Def {
    return {
        kind: DefKind.Typeconst,
        name: t.name.name,
        pos: toAbsolute(document, t.name.pos),
        span: toAbsolute(document, t.span),
        modifiers: t.abstract ? [Modifier.Abstract] : [],
        children: []
    };
}

function summarizeMethod(document: TextDocument, m: ast.Method): Def {
    return {
        kind: DefKind.Method,
        name: m.name.name,
        pos: toAbsolute(document, m.name.pos),
        span: toAbsolute(document, m.span),
        modifiers: modifierOfFunKind(modifiersOfAstKinds(m.kinds), m.funKind),
        children: []
    };
}

/**
 * Outline entries for one class member. Members the outline does not
 * represent yield nothing.
 */
function summarizeClassElt(document: TextDocument, elt: ast.ClassElt): Def[] {
    switch (elt.tag) {
        case 'Method':
            return [summarizeMethod(document, elt)];
        case 'ClassVars':
            return elt.vars.map(v => summarizeProperty(document, elt.kinds, v));
        case 'XhpAttr':
            return [summarizeProperty(document, [], elt.var)];
        case 'Const':
            return elt.consts.map(c => summarizeConst(document, c));
        case 'AbsConst':
            return [summarizeAbsConst(document, elt.id)];
        case 'TypeConst':
            return [summarizeTypeconst(document, elt)];

        // Omitted from the outline
        case 'ClassUse':
        case 'ClassTraitRequire':
        case 'XhpCategory':
        case 'XhpChildren':
        case 'XhpAttrUse':
            return [];
        default:
            return assertNever(elt);
    }
}

function kindOfClass(classKind: ast.ClassKind): DefKind {
    switch (classKind) {
        case ast.ClassKind.Interface: return DefKind.Interface;
        case ast.ClassKind.Trait: return DefKind.Trait;
        case ast.ClassKind.Enum: return DefKind.Enum;
        case ast.ClassKind.Normal:
        case ast.ClassKind.Abstract:
            return DefKind.Class;
        default:
            return assertNever(classKind);
    }
}

export function summarizeClass(document: TextDocument, c: ast.Class): Def {
    let modifiers: Modifier[] = c.final ? [Modifier.Final] : [];
    if (c.classKind === ast.ClassKind.Abstract) {
        modifiers = [Modifier.Abstract, ...modifiers];
    }

    return {
        kind: kindOfClass(c.classKind),
        name: stripNs(c.name.name),
        pos: toAbsolute(document, c.name.pos),
        span: toAbsolute(document, c.span),
        modifiers,
        children: c.body.flatMap(elt => summarizeClassElt(document, elt))
    };
}

export function summarizeFun(document: TextDocument, f: ast.Fun): Def {
    return {
        kind: DefKind.Function,
        name: stripNs(f.name.name),
        pos: toAbsolute(document, f.name.pos),
        span: toAbsolute(document, f.span),
        modifiers: modifierOfFunKind([], f.funKind),
        children: []
    };
}

/**
 * Outline of a parsed program, in source order. Only functions and
 * class-like declarations are kept.
 */
export function outlineAst(document: TextDocument, program: ast.Program): Outline {
    const defs: Def[] = [];
    for (const def of program) {
        switch (def.tag) {
            case 'Fun':
                defs.push(summarizeFun(document, def));
                break;
            case 'Class':
                defs.push(summarizeClass(document, def));
                break;

            // Omitted from the outline
            case 'Stmt':
            case 'Typedef':
            case 'Constant':
            case 'Namespace':
            case 'NamespaceUse':
                break;
            default:
                assertNever(def);
        }
    }
    return defs;
}

export function outlineDocument(document: TextDocument): Outline {
    return outlineAst(document, parseBestEffort(document.getText()));
}

/**
 * Outline of Hack source text. Parse errors are ignored, so a broken file
 * yields whatever declarations could be recovered.
 */
export function outline(content: string, filename = ''): Outline {
    return outlineDocument(TextDocument.create(filename, HACK_LANGUAGE_ID, 0, content));
}
