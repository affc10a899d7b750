/**
 * Declaration-level syntax tree for Hack source files
 *
 * Only the shapes the outline needs are modelled in detail. Statements and
 * expressions are kept as opaque spans.
 */

/** Character offsets into the parsed content, end exclusive */
export interface Pos {
    start: number;
    end: number;
}

export interface Id {
    pos: Pos;
    name: string;
}

/** Modifier keywords accepted on classes and class members */
export enum ModifierKeyword {
    Final = 'final',
    Static = 'static',
    Abstract = 'abstract',
    Private = 'private',
    Public = 'public',
    Protected = 'protected'
}

export enum FunKind {
    Sync = 'sync',
    Async = 'async',
    Generator = 'generator',
    AsyncGenerator = 'async-generator'
}

export enum ClassKind {
    Normal = 'normal',
    Abstract = 'abstract',
    Interface = 'interface',
    Trait = 'trait',
    Enum = 'enum'
}

export interface Fun {
    tag: 'Fun';
    /** Namespace-qualified, with a leading backslash */
    name: Id;
    span: Pos;
    funKind: FunKind;
}

export interface Method {
    tag: 'Method';
    /** Modifier keywords in source order */
    kinds: ModifierKeyword[];
    name: Id;
    span: Pos;
    funKind: FunKind;
}

export interface ClassVar {
    span: Pos;
    /** Property name without the leading `$` */
    id: Id;
}

export interface ClassVars {
    tag: 'ClassVars';
    kinds: ModifierKeyword[];
    vars: ClassVar[];
}

export interface XhpAttr {
    tag: 'XhpAttr';
    var: ClassVar;
}

export interface ClassConst {
    id: Id;
    /** Span of the initializer expression */
    exprPos: Pos;
}

export interface Const {
    tag: 'Const';
    consts: ClassConst[];
}

export interface AbsConst {
    tag: 'AbsConst';
    id: Id;
}

export interface TypeConst {
    tag: 'TypeConst';
    name: Id;
    abstract: boolean;
    span: Pos;
}

export interface ClassUse {
    tag: 'ClassUse';
    span: Pos;
}

export interface ClassTraitRequire {
    tag: 'ClassTraitRequire';
    span: Pos;
}

export interface XhpCategory {
    tag: 'XhpCategory';
    span: Pos;
}

export interface XhpChildren {
    tag: 'XhpChildren';
    span: Pos;
}

export interface XhpAttrUse {
    tag: 'XhpAttrUse';
    name: Id;
}

export type ClassElt =
    | Method
    | ClassVars
    | XhpAttr
    | Const
    | AbsConst
    | TypeConst
    | ClassUse
    | ClassTraitRequire
    | XhpCategory
    | XhpChildren
    | XhpAttrUse;

export interface Class {
    tag: 'Class';
    /** Namespace-qualified, with a leading backslash */
    name: Id;
    span: Pos;
    classKind: ClassKind;
    final: boolean;
    body: ClassElt[];
}

export interface Stmt {
    tag: 'Stmt';
    span: Pos;
}

export interface Typedef {
    tag: 'Typedef';
    name: Id;
    span: Pos;
}

export interface Constant {
    tag: 'Constant';
    span: Pos;
}

export interface Namespace {
    tag: 'Namespace';
    name: Id;
}

export interface NamespaceUse {
    tag: 'NamespaceUse';
    span: Pos;
}

export type Def = Fun | Class | Stmt | Typedef | Constant | Namespace | NamespaceUse;

export type Program = Def[];

export interface ParseDiagnostic {
    message: string;
    pos: Pos;
}

export interface ParseResult {
    ast: Program;
    diagnostics: ParseDiagnostic[];
}
