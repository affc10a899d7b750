export * from './types/core/outline';
export { ModifierKeyword, FunKind, ClassKind } from './server/parsers/ast';
export type { Pos, Program, ParseDiagnostic, ParseResult } from './server/parsers/ast';
export { parse, parseBestEffort } from './server/parsers/hack-parser';
export { outline, outlineAst, outlineDocument, stripNs } from './server/outline/file-outline';
export { modifiersOfAstKinds } from './server/outline/modifiers';
export { stringOfKind, stringOfModifier } from './server/outline/labels';
export { toLegacy, outlineLegacy, toJsonLegacy } from './server/outline/legacy';
export { toJson, print } from './server/outline/serializers';
export type { TextSink } from './server/outline/serializers';
