/**
 * Structured tree and debug text renderings of an outline
 */

import { DefJson, Outline } from '../../types/core/outline';
import { stringOfKind, stringOfModifier } from './labels';
import * as Pos from './pos';

export interface TextSink {
    write(chunk: string): unknown;
}

export function toJson(defs: Outline): DefJson[] {
    return defs.map(def => ({
        kind: stringOfKind(def.kind),
        name: def.name,
        position: Pos.json(def.pos),
        span: Pos.multilineJson(def.span),
        modifiers: def.modifiers.map(stringOfModifier),
        children: toJson(def.children)
    }));
}

/**
 * Indented dump for debugging, two spaces per nesting level
 */
export function print(defs: Outline, out: TextSink = process.stdout, indent = ''): void {
    for (const def of defs) {
        out.write(`${indent}${def.name}\n`);
        out.write(`${indent}  kind: ${stringOfKind(def.kind)}\n`);
        out.write(`${indent}  position: ${Pos.string(def.pos)}\n`);
        out.write(`${indent}  span: ${Pos.multilineString(def.span)}\n`);
        out.write(`${indent}  modifiers: ${def.modifiers.map(m => `${stringOfModifier(m)} `).join('')}\n\n`);
        print(def.children, out, `${indent}  `);
    }
}
