/**
 * Modifier normalization
 */

import { FunKind, ModifierKeyword } from '../parsers/ast';
import { Modifier } from '../../types/core/outline';
import { assertNever } from './labels';

/**
 * Maps modifier keywords to canonical modifiers, keeping source order.
 * Never yields Async; see `modifierOfFunKind`.
 */
export function modifiersOfAstKinds(kinds: readonly ModifierKeyword[]): Modifier[] {
    return kinds.map(kind => {
        switch (kind) {
            case ModifierKeyword.Final: return Modifier.Final;
            case ModifierKeyword.Static: return Modifier.Static;
            case ModifierKeyword.Abstract: return Modifier.Abstract;
            case ModifierKeyword.Private: return Modifier.Private;
            case ModifierKeyword.Public: return Modifier.Public;
            case ModifierKeyword.Protected: return Modifier.Protected;
            default: return assertNever(kind);
        }
    });
}

/**
 * Appends Async for async functions and async generators
 */
export function modifierOfFunKind(acc: readonly Modifier[], funKind: FunKind): Modifier[] {
    switch (funKind) {
        case FunKind.Async:
        case FunKind.AsyncGenerator:
            return [...acc, Modifier.Async];
        case FunKind.Sync:
        case FunKind.Generator:
            return [...acc];
        default:
            return assertNever(funKind);
    }
}
