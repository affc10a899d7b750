/**
 * Hack Lexer
 * Splits source text into the tokens the declaration parser works on
 */

import { ParseDiagnostic } from './ast';

export enum TokenKind {
    Identifier = 'identifier',
    Variable = 'variable',
    Number = 'number',
    String = 'string',
    /** A whole XHP element, from its opening tag to its closing tag */
    Xhp = 'xhp',
    Punct = 'punct',
    EOF = 'eof'
}

export interface Token {
    kind: TokenKind;
    text: string;
    start: number;
    end: number;
}

export interface LexResult {
    tokens: Token[];
    diagnostics: ParseDiagnostic[];
}

const IDENTIFIER = /\\?[A-Za-z_\u0080-\uffff][\w\u0080-\uffff]*(?:\\[A-Za-z_\u0080-\uffff][\w\u0080-\uffff]*)*/y;
const VARIABLE = /\$[A-Za-z_\u0080-\uffff][\w\u0080-\uffff]*/y;
const NUMBER = /\d[\w.]*/y;
const OPEN_TAG = /<\?(?:hh|php)\b/y;
const HEREDOC_START = /<<<[ \t]*(["']?)([A-Za-z_][\w]*)\1[ \t]*\r?\n/y;
const XHP_TAG_NAME = /[A-Za-z_][\w:.-]*/y;

// Keywords after which `<name` opens an XHP element rather than type arguments
const XHP_KEYWORDS = new Set(['return', 'yield', 'echo', 'print', 'await']);
// Punctuators after which `<name` is a comparison
const OPERAND_ENDS = new Set([')', ']', '>']);

// Longest first
const PUNCTUATORS = [
    '...', '===', '!==', '<=>', '?->', '??=', '==>',
    '::', '=>', '->', '<<', '>>', '==', '!=', '<=', '>=', '&&', '||', '??',
    '++', '--', '+=', '-=', '.=', '*=', '/=', '|>'
];

/**
 * Tokenize Hack source text. Never throws: problems are reported as
 * diagnostics and the offending text is consumed up to the end of input.
 */
export function tokenize(content: string): LexResult {
    const tokens: Token[] = [];
    const diagnostics: ParseDiagnostic[] = [];
    let i = 0;

    OPEN_TAG.lastIndex = 0;
    if (OPEN_TAG.test(content)) {
        i = OPEN_TAG.lastIndex;
    }

    const push = (kind: TokenKind, start: number, end: number) => {
        tokens.push({ kind, text: content.slice(start, end), start, end });
    };

    while (i < content.length) {
        const ch = content[i];

        if (/\s/.test(ch)) {
            i++;
            continue;
        }

        // Comments
        if (ch === '#' || (ch === '/' && content[i + 1] === '/')) {
            const newline = content.indexOf('\n', i);
            i = newline === -1 ? content.length : newline + 1;
            continue;
        }
        if (ch === '/' && content[i + 1] === '*') {
            const close = content.indexOf('*/', i + 2);
            if (close === -1) {
                diagnostics.push({ message: 'Unterminated comment', pos: { start: i, end: content.length } });
                i = content.length;
            } else {
                i = close + 2;
            }
            continue;
        }

        if (ch === '\'' || ch === '"') {
            const end = scanQuoted(content, i, ch);
            if (end === -1) {
                diagnostics.push({ message: 'Unterminated string literal', pos: { start: i, end: content.length } });
                push(TokenKind.String, i, content.length);
                i = content.length;
            } else {
                push(TokenKind.String, i, end);
                i = end;
            }
            continue;
        }

        if (ch === '<' && content.startsWith('<<<', i)) {
            HEREDOC_START.lastIndex = i;
            const heredoc = HEREDOC_START.exec(content);
            if (heredoc) {
                const terminator = new RegExp(`\\n[ \\t]*${heredoc[2]}\\b`, 'g');
                terminator.lastIndex = HEREDOC_START.lastIndex - 1;
                const close = terminator.exec(content);
                if (!close) {
                    diagnostics.push({ message: 'Unterminated heredoc', pos: { start: i, end: content.length } });
                    push(TokenKind.String, i, content.length);
                    i = content.length;
                } else {
                    const end = close.index + close[0].length;
                    push(TokenKind.String, i, end);
                    i = end;
                }
                continue;
            }
        }

        if (ch === '<' && startsXhp(content, i, tokens[tokens.length - 1])) {
            const end = scanXhp(content, i);
            if (end !== -1) {
                push(TokenKind.Xhp, i, end);
                i = end;
                continue;
            }
        }

        const identifier = matchAt(IDENTIFIER, content, i);
        if (identifier > i) {
            push(TokenKind.Identifier, i, identifier);
            i = identifier;
            continue;
        }

        const variable = matchAt(VARIABLE, content, i);
        if (variable > i) {
            push(TokenKind.Variable, i, variable);
            i = variable;
            continue;
        }

        const number = matchAt(NUMBER, content, i);
        if (number > i) {
            push(TokenKind.Number, i, number);
            i = number;
            continue;
        }

        const punct = PUNCTUATORS.find(p => content.startsWith(p, i));
        const length = punct ? punct.length : 1;
        push(TokenKind.Punct, i, i + length);
        i += length;
    }

    tokens.push({ kind: TokenKind.EOF, text: '', start: content.length, end: content.length });
    return { tokens, diagnostics };
}

function matchAt(pattern: RegExp, content: string, index: number): number {
    pattern.lastIndex = index;
    return pattern.test(content) ? pattern.lastIndex : index;
}

/**
 * Returns the offset just past the closing quote, or -1 when the literal
 * runs to the end of the input.
 */
function scanQuoted(content: string, start: number, quote: string): number {
    for (let i = start + 1; i < content.length; i++) {
        const ch = content[i];
        if (ch === '\\') {
            i++;
            continue;
        }
        if (ch === quote) {
            return i + 1;
        }
    }
    return -1;
}

/**
 * `<` directly followed by a tag name, in a place where an expression can
 * start.
 */
function startsXhp(content: string, index: number, previous: Token | undefined): boolean {
    if (!/[A-Za-z_]/.test(content.charAt(index + 1))) {
        return false;
    }
    if (!previous) {
        return true;
    }
    switch (previous.kind) {
        case TokenKind.Identifier:
            return XHP_KEYWORDS.has(previous.text.toLowerCase());
        case TokenKind.Punct:
            return !OPERAND_ENDS.has(previous.text);
        default:
            return false;
    }
}

/**
 * Returns the offset just past the element that opens at `start`, or -1 when
 * it is not a well-formed XHP element. Text between tags is not Hack, so
 * quotes in it do not start strings.
 */
function scanXhp(content: string, start: number): number {
    let depth = 0;
    let i = start;
    while (i < content.length) {
        const ch = content[i];
        if (ch === '{') {
            i = skipBraces(content, i);
            if (i === -1) {
                return -1;
            }
            continue;
        }
        if (ch !== '<') {
            i++;
            continue;
        }
        if (content.startsWith('<!--', i)) {
            const close = content.indexOf('-->', i + 4);
            if (close === -1) {
                return -1;
            }
            i = close + 3;
            continue;
        }
        if (content[i + 1] === '/') {
            const close = content.indexOf('>', i + 2);
            if (close === -1) {
                return -1;
            }
            i = close + 1;
            depth--;
            if (depth <= 0) {
                return i;
            }
            continue;
        }

        const nameEnd = matchAt(XHP_TAG_NAME, content, i + 1);
        if (nameEnd === i + 1) {
            return -1;
        }
        const tagEnd = scanXhpTag(content, nameEnd);
        if (tagEnd === -1) {
            return -1;
        }
        i = tagEnd;
        if (content[tagEnd - 2] !== '/') {
            depth++;
        } else if (depth === 0) {
            return i;
        }
    }
    return -1;
}

/**
 * Attributes of an opening tag, up to and including `>` or `/>`.
 */
function scanXhpTag(content: string, start: number): number {
    let i = start;
    while (i < content.length) {
        const ch = content[i];
        if (ch === '"' || ch === '\'') {
            i = scanQuoted(content, i, ch);
            if (i === -1) {
                return -1;
            }
            continue;
        }
        if (ch === '{') {
            i = skipBraces(content, i);
            if (i === -1) {
                return -1;
            }
            continue;
        }
        if (ch === '/' && content[i + 1] === '>') {
            return i + 2;
        }
        if (ch === '>') {
            return i + 1;
        }
        i++;
    }
    return -1;
}

/**
 * An embedded `{expression}`, which may hold strings and further elements.
 */
function skipBraces(content: string, start: number): number {
    let depth = 0;
    let i = start;
    while (i < content.length) {
        const ch = content[i];
        if (ch === '"' || ch === '\'') {
            i = scanQuoted(content, i, ch);
            if (i === -1) {
                return -1;
            }
            continue;
        }
        if (ch === '<' && /[A-Za-z_]/.test(content.charAt(i + 1)) && /[(,?:=[{]\s*$/.test(content.slice(start, i))) {
            const end = scanXhp(content, i);
            if (end !== -1) {
                i = end;
                continue;
            }
        }
        if (ch === '{') {
            depth++;
        } else if (ch === '}') {
            depth--;
            if (depth === 0) {
                return i + 1;
            }
        }
        i++;
    }
    return -1;
}
