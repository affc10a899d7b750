/**
 * Label tables for outline kinds and modifiers
 */

import { DefKind, Modifier } from '../../types/core/outline';

const KIND_LABELS: Readonly<Record<DefKind, string>> = {
    [DefKind.Function]: 'function',
    [DefKind.Class]: 'class',
    [DefKind.Method]: 'method',
    [DefKind.Property]: 'property',
    [DefKind.Const]: 'const',
    [DefKind.Enum]: 'enum',
    [DefKind.Interface]: 'interface',
    [DefKind.Trait]: 'trait',
    [DefKind.Typeconst]: 'typeconst'
};

const MODIFIER_LABELS: Readonly<Record<Modifier, string>> = {
    [Modifier.Final]: 'final',
    [Modifier.Static]: 'static',
    [Modifier.Abstract]: 'abstract',
    [Modifier.Private]: 'private',
    [Modifier.Public]: 'public',
    [Modifier.Protected]: 'protected',
    [Modifier.Async]: 'async'
};

export function stringOfKind(kind: DefKind): string {
    return KIND_LABELS[kind];
}

export function stringOfModifier(modifier: Modifier): string {
    return MODIFIER_LABELS[modifier];
}

export function assertNever(value: never): never {
    throw new Error(`Unhandled outline value: ${String(value)}`);
}
