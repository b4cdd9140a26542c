/**
 * @file types.ts
 * @module model/types
 * @created 2026-10-12
 * @license MIT
 *
 * @fileoverview Element model for extracted API reference documentation.
 */

/**
 * All element kinds the extractor can produce.
 */
export const ELEMENT_KINDS = [
    'namespace',
    'class',
    'function',
    'member',
    'enum',
    'enum-value',
    'alias',
    'parameter',
] as const;

export type ElementKind = (typeof ELEMENT_KINDS)[number];

/**
 * Protection or visibility level of an element.
 */
export type Protection = 'public' | 'protected' | 'private';

/**
 * Keyword a class-like element was declared with.
 */
export type ClassKeyword = 'class' | 'struct' | 'interface' | 'protocol' | 'union';

/**
 * Symbolic use of a type. Resolved by name when rendered.
 */
export interface TypeRef {
    /** Referenced type name, possibly partially qualified (e.g., "geo::Point") */
    name: string;
    /** Qualifiers in front of the name (e.g., "const ") */
    prefix?: string;
    /** Qualifiers after the name (e.g., "&", "*") */
    suffix?: string;
    /** Template or generic arguments */
    args?: TypeRef[];
}

/**
 * Parameter of a function or a type parameter of a template.
 */
export interface Parameter {
    name: string;
    type?: TypeRef;
    description?: string;
    defaultValue?: string;
}

/**
 * Value returned from a function.
 */
export interface ReturnValue {
    type?: TypeRef;
    description?: string;
}

/**
 * Error or exception a function may throw.
 */
export interface ThrowsClause {
    type: TypeRef;
    description?: string;
}

/**
 * Extra documentation block with a special meaning (e.g., "Note", "Since").
 */
export interface DocSection {
    title: string;
    text: string;
}

/**
 * Fields shared by every element kind.
 */
export interface ElementCore {
    /** Identifier, unique within a generation run */
    readonly id: string;
    /** Short name (e.g., "Point") */
    readonly name: string;
    /** Fully qualified name (e.g., "geo::Point") */
    readonly qualifiedName: string;
    /** Language the element is declared in (e.g., "cpp", "java") */
    readonly language: string;
    readonly brief: string;
    readonly description: string;
    readonly sections: readonly DocSection[];
    /** Header, module or package needed to use the element */
    readonly include?: string;
    readonly prot?: Protection;
    readonly parentId?: string;
    /** Owned elements in declaration order */
    readonly childIds: readonly string[];
}

export interface NamespaceElement extends ElementCore {
    readonly kind: 'namespace';
}

export interface ClassElement extends ElementCore {
    readonly kind: 'class';
    readonly keyword: ClassKeyword;
    readonly bases: readonly TypeRef[];
    readonly typeParams: readonly Parameter[];
}

export interface FunctionElement extends ElementCore {
    readonly kind: 'function';
    readonly params: readonly Parameter[];
    readonly returns?: ReturnValue;
    readonly throws: readonly ThrowsClause[];
    readonly typeParams: readonly Parameter[];
    readonly isStatic: boolean;
    readonly isConst: boolean;
}

export interface MemberElement extends ElementCore {
    readonly kind: 'member';
    readonly type?: TypeRef;
    readonly initializer?: string;
    readonly isStatic: boolean;
}

export interface EnumElement extends ElementCore {
    readonly kind: 'enum';
    readonly underlying?: TypeRef;
}

export interface EnumValueElement extends ElementCore {
    readonly kind: 'enum-value';
    readonly initializer?: string;
}

export interface AliasElement extends ElementCore {
    readonly kind: 'alias';
    readonly target?: TypeRef;
}

export interface ParameterElement extends ElementCore {
    readonly kind: 'parameter';
    readonly type?: TypeRef;
    readonly defaultValue?: string;
}

/**
 * One documented program construct.
 *
 * Discriminated on `kind`; consumers switch over it exhaustively.
 */
export type Element =
    | NamespaceElement
    | ClassElement
    | FunctionElement
    | MemberElement
    | EnumElement
    | EnumValueElement
    | AliasElement
    | ParameterElement;

/**
 * Element kinds that open a naming scope for relative lookups.
 */
export function isContainerKind(kind: ElementKind): boolean {
    return kind === 'namespace' || kind === 'class' || kind === 'enum';
}

/**
 * Raw element record as produced by the extractor adapter.
 *
 * Cross-element references are symbolic names, never pre-resolved ids
 * (apart from `children`, which lists owned element ids).
 */
export interface ElementRecord {
    id: string;
    name: string;
    qualifiedName?: string;
    kind: ElementKind;
    language: string;
    brief?: string;
    description?: string;
    sections?: DocSection[];
    include?: string;
    prot?: Protection;
    children?: string[];
    keyword?: ClassKeyword;
    bases?: TypeRef[];
    typeParams?: Parameter[];
    params?: Parameter[];
    returns?: ReturnValue;
    throws?: ThrowsClause[];
    static?: boolean;
    const?: boolean;
    type?: TypeRef;
    initializer?: string;
    underlying?: TypeRef;
    target?: TypeRef;
    defaultValue?: string;
}
