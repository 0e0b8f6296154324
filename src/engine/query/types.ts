/**
 * blockquery — Block query engine type definitions
 *
 * Token types, the compiled predicate AST, registry entry types,
 * world accessor interfaces, and error types.
 */

// ============================================================
// Token types
// ============================================================

export type TokenKind =
  | 'NOT'
  | 'IDENT'
  | 'TYPE_TAG'
  | 'STRICT_TYPE_TAG'
  | 'MATERIAL'
  | 'PROPERTY_GROUP'
  | 'REFERENCE';

export interface Token {
  kind: TokenKind;
  /** Raw span, including sigil or brackets */
  text: string;
  /** Name without sigil, or the bracket interior for PROPERTY_GROUP */
  value: string;
  /** Offset of the token within its segment */
  offset: number;
}

// ============================================================
// Registry entry types
// ============================================================

export interface TypeTag {
  readonly name: string;
  readonly parent?: TypeTag;
}

export interface MaterialTag {
  readonly name: string;
}

export interface BlockDefinition {
  /** Canonical `namespace:name` identifier */
  readonly identifier: string;
  readonly typeTag: TypeTag;
  readonly material: MaterialTag;
  /** Whether positions holding this block count as empty (air) */
  readonly empty: boolean;
}

// ============================================================
// Predicate AST
// ============================================================

export type Predicate =
  | { readonly kind: 'matchAny' }
  | { readonly kind: 'matchNone' }
  | { readonly kind: 'or'; readonly children: readonly Predicate[] }
  | { readonly kind: 'and'; readonly children: readonly Predicate[] }
  | { readonly kind: 'not'; readonly child: Predicate }
  | { readonly kind: 'byIdentity'; readonly identifier: string }
  | { readonly kind: 'byStateValue'; readonly stateKey: string }
  | { readonly kind: 'byTypeTag'; readonly tag: TypeTag; readonly strict: boolean }
  | { readonly kind: 'byProperty'; readonly name: string; readonly values: readonly string[] }
  | { readonly kind: 'byMaterialTag'; readonly material: MaterialTag }
  | { readonly kind: 'hasAdjacentWater'; readonly water: MaterialTag }
  | { readonly kind: 'hasAirAbove' }
  | { readonly kind: 'inAltitudeRange'; readonly minHeight: number; readonly maxHeight: number };

// ============================================================
// World accessor types
// ============================================================

export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** Read-only view of the block state at one position. */
export interface StateView {
  identifier(): string;
  typeTag(): TypeTag;
  materialTag(): MaterialTag;
  /** Property value for `name`, looked up case-insensitively; undefined when absent. */
  propertyValue(name: string): string | undefined;
  /** Canonical `namespace:name[key=value,...]` form, keys sorted and lower-cased. */
  stateKey(): string;
}

export interface WorldView {
  stateAt(position: Position): StateView;
  isEmpty(position: Position): boolean;
}

// ============================================================
// Compile-time collaborator types
// ============================================================

export interface NameResolver {
  resolveIdentifier(text: string): string | undefined;
  resolveTypeTag(text: string): TypeTag | undefined;
  resolveMaterialTag(text: string): MaterialTag | undefined;
}

export interface PredefinedQueryLookup {
  lookup(name: string): Predicate | undefined;
}

export interface CompileContext {
  resolver: NameResolver;
  predefined: PredefinedQueryLookup;
  /** Property name used by bare bracket values (default: "variant") */
  defaultPropertyName?: string;
}

export const DEFAULT_PROPERTY_NAME = 'variant';

// ============================================================
// Saved query storage types
// ============================================================

export interface SavedQuery {
  id: string;
  name: string;
  description?: string;
  queryText: string;
  createdAt: string;
  updatedAt: string;
}

export interface SaveQueryInput {
  name: string;
  description?: string;
  queryText: string;
}

// ============================================================
// Error types
// ============================================================

export class BlockQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BlockQueryError';
  }
}

export type CompileErrorCode =
  | 'SYNTAX'
  | 'UNKNOWN_IDENTIFIER'
  | 'UNKNOWN_TYPE_TAG'
  | 'UNKNOWN_MATERIAL'
  | 'UNKNOWN_PREDEFINED_QUERY';

/** Base class of every error raised by `compile`. */
export class QueryCompileError extends BlockQueryError {
  readonly code: CompileErrorCode;
  /** The segment being compiled when the error occurred */
  readonly fragment: string;

  constructor(code: CompileErrorCode, message: string, fragment: string) {
    super(message);
    this.name = 'QueryCompileError';
    this.code = code;
    this.fragment = fragment;
  }
}

export class QuerySyntaxError extends QueryCompileError {
  /** Unparsed input starting at the offending position */
  readonly remainder: string;

  constructor(fragment: string, remainder: string, detail?: string) {
    const suffix = detail !== undefined ? `: ${detail}` : '';
    super('SYNTAX', `Syntax error in '${fragment}' at '${remainder}'${suffix}`, fragment);
    this.name = 'QuerySyntaxError';
    this.remainder = remainder;
  }
}

export class UnknownIdentifierError extends QueryCompileError {
  readonly identifier: string;

  constructor(identifier: string, fragment: string) {
    super('UNKNOWN_IDENTIFIER', `No block called '${identifier}' in '${fragment}'`, fragment);
    this.name = 'UnknownIdentifierError';
    this.identifier = identifier;
  }
}

export class UnknownTypeTagError extends QueryCompileError {
  readonly tagName: string;

  constructor(tagName: string, fragment: string) {
    super('UNKNOWN_TYPE_TAG', `No block type tag called '${tagName}' in '${fragment}'`, fragment);
    this.name = 'UnknownTypeTagError';
    this.tagName = tagName;
  }
}

export class UnknownMaterialError extends QueryCompileError {
  readonly materialName: string;

  constructor(materialName: string, fragment: string) {
    super('UNKNOWN_MATERIAL', `No block material called '${materialName}' in '${fragment}'`, fragment);
    this.name = 'UnknownMaterialError';
    this.materialName = materialName;
  }
}

export class UnknownPredefinedQueryError extends QueryCompileError {
  readonly queryName: string;

  constructor(queryName: string, fragment: string) {
    super(
      'UNKNOWN_PREDEFINED_QUERY',
      `No predefined query named '${queryName}' in '${fragment}'`,
      fragment,
    );
    this.name = 'UnknownPredefinedQueryError';
    this.queryName = queryName;
  }
}

export class RegistryFrozenError extends BlockQueryError {
  constructor(what: string) {
    super(`Cannot modify ${what} after it has been frozen`);
    this.name = 'RegistryFrozenError';
  }
}

export class CatalogError extends BlockQueryError {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}
