/**
 * Document Symbol Provider
 * Provides the document outline and symbol navigation for Hack files
 */

import {
    DocumentSymbolParams,
    DocumentSymbol,
    SymbolKind,
    Range
} from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { AbsolutePos, Def, DefKind, DefJson, LegacyEntryJson } from '../../types/core/outline';
import { HackOutlineSettings, allowsOutline, defaultSettings } from '../config/settings';
import { outlineDocument } from '../outline/file-outline';
import { stringOfModifier } from '../outline/labels';
import { toJsonLegacy, toLegacy } from '../outline/legacy';
import { toJson } from '../outline/serializers';

const SYMBOL_KINDS: Readonly<Record<DefKind, SymbolKind>> = {
    [DefKind.Function]: SymbolKind.Function,
    [DefKind.Class]: SymbolKind.Class,
    [DefKind.Method]: SymbolKind.Method,
    [DefKind.Property]: SymbolKind.Property,
    [DefKind.Const]: SymbolKind.Constant,
    [DefKind.Enum]: SymbolKind.Enum,
    [DefKind.Interface]: SymbolKind.Interface,
    // LSP has no trait kind
    [DefKind.Trait]: SymbolKind.Class,
    [DefKind.Typeconst]: SymbolKind.TypeParameter
};

/**
 * Handle document symbol requests
 */
export function handleDocumentSymbol(
    params: DocumentSymbolParams,
    document: TextDocument,
    settings: HackOutlineSettings = defaultSettings
): DocumentSymbol[] {
    if (!allowsOutline(settings, document.getText().length)) {
        return [];
    }
    return outlineDocument(document).map(toDocumentSymbol);
}

/**
 * `hack/outline`: structured tree for the document
 */
export function handleOutlineRequest(
    document: TextDocument,
    settings: HackOutlineSettings = defaultSettings
): DefJson[] {
    if (!allowsOutline(settings, document.getText().length)) {
        return [];
    }
    return toJson(outlineDocument(document));
}

/**
 * `hack/outlineLegacy`: flat list in the `--outline` format
 */
export function handleLegacyOutlineRequest(
    document: TextDocument,
    settings: HackOutlineSettings = defaultSettings
): LegacyEntryJson[] {
    if (!allowsOutline(settings, document.getText().length)) {
        return [];
    }
    return toJsonLegacy(toLegacy(outlineDocument(document)));
}

function toDocumentSymbol(def: Def): DocumentSymbol {
    const symbol: DocumentSymbol = {
        name: def.name,
        kind: SYMBOL_KINDS[def.kind],
        range: toRange(def.span),
        selectionRange: toRange(def.pos),
        children: def.children.map(toDocumentSymbol)
    };
    if (def.modifiers.length > 0) {
        symbol.detail = def.modifiers.map(stringOfModifier).join(' ');
    }
    return symbol;
}

function toRange(pos: AbsolutePos): Range {
    return {
        start: { line: pos.start.line, character: pos.start.character },
        end: { line: pos.end.line, character: pos.end.character }
    };
}
