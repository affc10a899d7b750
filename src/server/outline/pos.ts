/**
 * Position helpers for outline entries
 *
 * Lines and start columns in the encodings are 1-based. End columns are
 * offsets from the beginning of a line, so on a single line they equal the
 * 1-based column of the last character.
 */

import { TextDocument } from 'vscode-languageserver-textdocument';
import { Pos } from '../parsers/ast';
import { AbsolutePos, MultilinePosJson, PosJson } from '../../types/core/outline';

export function toAbsolute(document: TextDocument, pos: Pos): AbsolutePos {
    return {
        filename: document.uri,
        start: document.positionAt(pos.start),
        end: document.positionAt(pos.end),
        startOffset: pos.start,
        endOffset: pos.end
    };
}

/**
 * Smallest range covering both positions
 */
export function btw(first: Pos, second: Pos): Pos {
    return { start: first.start, end: second.end };
}

/**
 * `[line, charStart, charEnd]`, with the end column counted from the
 * beginning of the start line
 */
export function infoPos(pos: AbsolutePos): [number, number, number] {
    const startBol = pos.startOffset - pos.start.character;
    return [pos.start.line + 1, pos.start.character + 1, pos.endOffset - startBol];
}

/**
 * `[lineStart, lineEnd, charStart, charEnd]`, with the end column counted
 * from the beginning of the end line
 */
export function infoPosExtended(pos: AbsolutePos): [number, number, number, number] {
    return [pos.start.line + 1, pos.end.line + 1, pos.start.character + 1, pos.end.character];
}

export function json(pos: AbsolutePos): PosJson {
    const [line, charStart, charEnd] = infoPos(pos);
    return {
        filename: pos.filename,
        line,
        char_start: charStart,
        char_end: charEnd
    };
}

export function multilineJson(pos: AbsolutePos): MultilinePosJson {
    const [lineStart, lineEnd, charStart, charEnd] = infoPosExtended(pos);
    return {
        filename: pos.filename,
        line_start: lineStart,
        char_start: charStart,
        line_end: lineEnd,
        char_end: charEnd
    };
}

export function string(pos: AbsolutePos): string {
    const [line, charStart, charEnd] = infoPos(pos);
    return `File ${JSON.stringify(pos.filename)}, line ${line}, characters ${charStart}-${charEnd}:`;
}

export function multilineString(pos: AbsolutePos): string {
    const [lineStart, lineEnd, charStart, charEnd] = infoPosExtended(pos);
    return `File ${JSON.stringify(pos.filename)}, line ${lineStart}, character ${charStart} - line ${lineEnd}, character ${charEnd}:`;
}
