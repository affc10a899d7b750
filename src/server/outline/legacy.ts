/**
 * Legacy outline
 * Flat (position, name, type) list expected by the `--outline` command
 */

import { Def, DefKind, LegacyEntry, LegacyEntryJson, Modifier, Outline } from '../../types/core/outline';
import { outline } from './file-outline';
import { assertNever } from './labels';
import { infoPos } from './pos';

/**
 * Flattens an outline in pre-order, in source order. Methods are named
 * `Container::method`; properties, constants and type constants are left
 * out.
 */
export function toLegacy(defs: Outline): LegacyEntry[] {
    const acc: LegacyEntry[] = [];
    collect('', defs, acc);
    return acc;
}

function collect(prefix: string, defs: readonly Def[], acc: LegacyEntry[]): void {
    for (const def of defs) {
        switch (def.kind) {
            case DefKind.Function:
                acc.push({ pos: def.pos, name: def.name, type: 'function' });
                break;
            case DefKind.Class:
            case DefKind.Enum:
            case DefKind.Interface:
            case DefKind.Trait:
                acc.push({ pos: def.pos, name: def.name, type: 'class' });
                collect(`${prefix}${def.name}::`, def.children, acc);
                break;
            case DefKind.Method:
                acc.push({
                    pos: def.pos,
                    name: prefix + def.name,
                    type: def.modifiers.includes(Modifier.Static) ? 'static method' : 'method'
                });
                break;
            case DefKind.Typeconst:
            case DefKind.Property:
            case DefKind.Const:
                break;
            default:
                assertNever(def.kind);
        }
    }
}

export function outlineLegacy(content: string, filename = ''): LegacyEntry[] {
    return toLegacy(outline(content, filename));
}

export function toJsonLegacy(entries: readonly LegacyEntry[]): LegacyEntryJson[] {
    return entries.map(({ pos, name, type }) => {
        const [line, charStart, charEnd] = infoPos(pos);
        return {
            name,
            type,
            line,
            char_start: charStart,
            char_end: charEnd
        };
    });
}
