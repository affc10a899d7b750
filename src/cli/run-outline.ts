/**
 * Output modes of the outline command
 */

import { outline } from '../server/outline/file-outline';
import { assertNever } from '../server/outline/labels';
import { toJsonLegacy, toLegacy } from '../server/outline/legacy';
import { TextSink, print, toJson } from '../server/outline/serializers';

export type OutlineMode = 'legacy' | 'json' | 'print';

/**
 * Writes the outline of `content` to `out` in the requested shape
 */
export function runOutline(content: string, mode: OutlineMode, out: TextSink, filename = ''): void {
    const defs = outline(content, filename);
    switch (mode) {
        case 'legacy':
            out.write(`${JSON.stringify(toJsonLegacy(toLegacy(defs)))}\n`);
            break;
        case 'json':
            out.write(`${JSON.stringify(toJson(defs))}\n`);
            break;
        case 'print':
            print(defs, out);
            break;
        default:
            assertNever(mode);
    }
}

export function modeOf(options: { json?: boolean; print?: boolean }): OutlineMode {
    if (options.print) {
        return 'print';
    }
    return options.json ? 'json' : 'legacy';
}
