/**
 * Language Server capability configuration
 */

import {
    TextDocumentSyncKind,
    ServerCapabilities
} from 'vscode-languageserver/node';

export const serverCapabilities: ServerCapabilities = {
    textDocumentSync: TextDocumentSyncKind.Incremental,
    documentSymbolProvider: {
        label: 'Hack'
    }
};

/** Custom requests answered besides the standard ones */
export const OutlineRequests = {
    outline: 'hack/outline',
    outlineLegacy: 'hack/outlineLegacy'
} as const;
