/**
 * Hack Outline Language Server
 */

import {
    createConnection,
    TextDocuments,
    ProposedFeatures,
    InitializeParams,
    DidChangeConfigurationNotification,
    InitializeResult,
    DocumentSymbolParams,
    DocumentSymbol,
    TextDocumentIdentifier
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';

import { OutlineRequests, serverCapabilities } from './config/capabilities';
import {
    HackOutlineSettings,
    SETTINGS_SECTION,
    globalSettings,
    resolveSettings,
    setGlobalSettings
} from './config/settings';
import {
    handleDocumentSymbol,
    handleLegacyOutlineRequest,
    handleOutlineRequest
} from './providers/document-symbol-provider';
import { ErrorHandler } from './utils/error-handler';
import { DefJson, LegacyEntryJson } from '../types/core/outline';

interface OutlineParams {
    textDocument: TextDocumentIdentifier;
}

const connection = createConnection(ProposedFeatures.all);

const errorHandler = new ErrorHandler(
    connection.console,
    message => { void connection.window.showErrorMessage(message); }
);

const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

let hasConfigurationCapability = false;

// Document settings cache
const documentSettings: Map<string, Promise<HackOutlineSettings>> = new Map();

connection.onInitialize((params: InitializeParams) => {
    const capabilities = params.capabilities;

    hasConfigurationCapability = !!(
        capabilities.workspace && !!capabilities.workspace.configuration
    );

    const result: InitializeResult = {
        capabilities: serverCapabilities
    };
    return result;
});

connection.onInitialized(() => {
    if (hasConfigurationCapability) {
        connection.client.register(DidChangeConfigurationNotification.type, undefined).catch(error => {
            connection.console.error(`Failed to register for configuration changes: ${error}`);
        });
    }
});

connection.onDidChangeConfiguration(change => {
    if (hasConfigurationCapability) {
        documentSettings.clear();
    } else {
        const settings: unknown = change.settings;
        const section: unknown = typeof settings === 'object' && settings !== null
            ? Reflect.get(settings, SETTINGS_SECTION)
            : undefined;
        setGlobalSettings(resolveSettings(section));
    }
});

function getDocumentSettings(resource: string): Promise<HackOutlineSettings> {
    if (!hasConfigurationCapability) {
        return Promise.resolve(globalSettings);
    }

    let result = documentSettings.get(resource);
    if (!result) {
        result = connection.workspace.getConfiguration({
            scopeUri: resource,
            section: SETTINGS_SECTION
        }).then(config => resolveSettings(config));
        documentSettings.set(resource, result);
    }
    return result;
}

documents.onDidClose(e => {
    documentSettings.delete(e.document.uri);
});

connection.onDocumentSymbol((params: DocumentSymbolParams): Promise<DocumentSymbol[]> => {
    return errorHandler.handleAsync('document-symbol', async () => {
        const document = documents.get(params.textDocument.uri);
        if (!document) {
            return [];
        }
        const settings = await getDocumentSettings(document.uri);
        return handleDocumentSymbol(params, document, settings);
    }, { fallbackValue: [] }, { documentUri: params.textDocument.uri });
});

connection.onRequest(OutlineRequests.outline, (params: OutlineParams): Promise<DefJson[]> => {
    return errorHandler.handleAsync('outline', async () => {
        const document = documents.get(params.textDocument.uri);
        if (!document) {
            return [];
        }
        const settings = await getDocumentSettings(document.uri);
        return handleOutlineRequest(document, settings);
    }, { fallbackValue: [], showToUser: true }, { documentUri: params.textDocument.uri });
});

connection.onRequest(OutlineRequests.outlineLegacy, (params: OutlineParams): Promise<LegacyEntryJson[]> => {
    return errorHandler.handleAsync('outline-legacy', async () => {
        const document = documents.get(params.textDocument.uri);
        if (!document) {
            return [];
        }
        const settings = await getDocumentSettings(document.uri);
        return handleLegacyOutlineRequest(document, settings);
    }, { fallbackValue: [], showToUser: true }, { documentUri: params.textDocument.uri });
});

documents.listen(connection);

connection.listen();
