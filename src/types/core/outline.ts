/**
 * Outline type definitions
 */

import { Position } from 'vscode-languageserver-textdocument';

/** Declaration kinds that can appear in an outline */
export enum DefKind {
    Function = 'Function',
    Class = 'Class',
    Method = 'Method',
    Property = 'Property',
    Const = 'Const',
    Enum = 'Enum',
    Interface = 'Interface',
    Trait = 'Trait',
    Typeconst = 'Typeconst'
}

/** Canonical declaration modifiers */
export enum Modifier {
    Final = 'Final',
    Static = 'Static',
    Abstract = 'Abstract',
    Private = 'Private',
    Public = 'Public',
    Protected = 'Protected',
    Async = 'Async'
}

/** A range resolved against the document it came from */
export interface AbsolutePos {
    /** Document URI or path, empty for anonymous content */
    filename: string;
    start: Position;
    end: Position;
    startOffset: number;
    endOffset: number;
}

/** One outline entry */
export interface Def {
    readonly kind: DefKind;
    /** Namespace stripped for functions and classes */
    readonly name: string;
    /** Anchor, usually the name */
    readonly pos: AbsolutePos;
    /** Whole declaration; always contains `pos` */
    readonly span: AbsolutePos;
    /** Source order, not deduplicated */
    readonly modifiers: readonly Modifier[];
    /** Members of Class, Interface, Trait and Enum; empty otherwise */
    readonly children: readonly Def[];
}

export type Outline = readonly Def[];

/** Kind labels understood by the legacy `--outline` consumer */
export type LegacyKindLabel = 'function' | 'class' | 'method' | 'static method';

/** One flattened outline entry */
export interface LegacyEntry {
    readonly pos: AbsolutePos;
    /** Method names are qualified by their `::`-joined containers */
    readonly name: string;
    readonly type: LegacyKindLabel;
}

export interface PosJson {
    filename: string;
    line: number;
    char_start: number;
    char_end: number;
}

export interface MultilinePosJson {
    filename: string;
    line_start: number;
    char_start: number;
    line_end: number;
    char_end: number;
}

/** Structured tree encoding of a Def */
export interface DefJson {
    kind: string;
    name: string;
    position: PosJson;
    span: MultilinePosJson;
    modifiers: string[];
    children: DefJson[];
}

/** Legacy flat encoding of a LegacyEntry */
export interface LegacyEntryJson {
    name: string;
    type: LegacyKindLabel;
    line: number;
    char_start: number;
    char_end: number;
}
