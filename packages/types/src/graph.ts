/**
 * Type graph types - shapes of a rustdoc JSON document
 *
 * Only the parts the generator reads are modelled. Item and type variants
 * are externally tagged in the JSON (`{ "struct": {...} }`), so they are
 * typed as partial maps: exactly one key is present on a well-formed value,
 * unknown variants simply have none of the keys below.
 */

/**
 * Opaque item id. Older format versions use strings ("0:42:1773"),
 * newer ones use integers.
 */
export type ItemId = string | number;

// ============================================================================
// Type expressions
// ============================================================================

export interface GenericArgsAngleBracketed {
  args: GenericArg[];
  constraints?: unknown[];
  bindings?: unknown[];
}

export interface GenericArgsMap {
  angle_bracketed: GenericArgsAngleBracketed;
  parenthesized: { inputs: GraphType[]; output: GraphType | null };
}

export type GenericArgs = Partial<GenericArgsMap>;

export interface GenericArgMap {
  lifetime: string;
  type: GraphType;
  const: unknown;
}

/** `"infer"` is serialized as a bare string */
export type GenericArg = Partial<GenericArgMap> | string;

/** Path to a named item, as used by `resolved_path` and impl `trait` */
export interface PathRef {
  /** Older formats */
  name?: string;
  /** Newer formats (full path as written) */
  path?: string;
  id: ItemId;
  args: GenericArgs | null;
}

export interface BorrowedRef {
  lifetime: string | null;
  mutable: boolean;
  type: GraphType;
}

export interface QualifiedPath {
  name: string;
  args: GenericArgs | null;
  self_type: GraphType;
  trait: PathRef | null;
}

export interface GraphTypeMap {
  resolved_path: PathRef;
  dyn_trait: unknown;
  generic: string;
  primitive: string;
  function_pointer: unknown;
  tuple: GraphType[];
  slice: GraphType;
  array: { type: GraphType; len: string };
  pat: unknown;
  impl_trait: unknown[];
  raw_pointer: { mutable: boolean; type: GraphType };
  borrowed_ref: BorrowedRef;
  qualified_path: QualifiedPath;
}

/**
 * A type expression. Unit variants (`"infer"`) serialize as plain strings.
 */
export type GraphType = Partial<GraphTypeMap> | string;

// ============================================================================
// Items
// ============================================================================

export interface GenericParamDef {
  name: string;
  kind: Partial<{ lifetime: unknown; type: unknown; const: unknown }>;
}

export interface Generics {
  params: GenericParamDef[];
  where_predicates: unknown[];
}

export type StructKind = Partial<{
  plain: { fields: ItemId[]; fields_stripped?: boolean; has_stripped_fields?: boolean };
  tuple: Array<ItemId | null>;
}> | 'unit';

export interface StructInner {
  kind: StructKind;
  generics: Generics;
  impls: ItemId[];
}

export interface EnumInner {
  generics: Generics;
  variants: ItemId[];
  impls: ItemId[];
}

export interface ImplInner {
  generics?: Generics;
  /** Trait being implemented, null for an inherent impl */
  trait: PathRef | null;
  for: GraphType;
  items: ItemId[];
  is_synthetic?: boolean;
  synthetic?: boolean;
  blanket_impl?: GraphType | null;
}

/** Function signature; called `decl` up to format 33 and `sig` after */
export interface FunctionSignature {
  inputs: Array<[string, GraphType]>;
  output: GraphType | null;
  c_variadic?: boolean;
  is_c_variadic?: boolean;
}

export interface FunctionInner {
  decl?: FunctionSignature;
  sig?: FunctionSignature;
  generics: Generics;
  has_body?: boolean;
}

export interface AssocTypeInner {
  generics?: Generics;
  bounds?: unknown[];
  /** Called `default` in older formats */
  default?: GraphType | null;
  type?: GraphType | null;
}

export interface ItemInnerMap {
  struct: StructInner;
  enum: EnumInner;
  impl: ImplInner;
  function: FunctionInner;
  struct_field: GraphType;
  assoc_type: AssocTypeInner;
}

export type ItemInner = Partial<ItemInnerMap> & Record<string, unknown>;

export type Visibility = 'public' | 'default' | 'crate' | { restricted: unknown };

/** Attribute strings ("#[reflect(ignore)]") or structured attributes in newer formats */
export type ItemAttribute = string | Record<string, unknown>;

export interface GraphItem {
  id: ItemId;
  crate_id: number;
  name: string | null;
  docs: string | null;
  attrs: ItemAttribute[];
  visibility: Visibility;
  inner: ItemInner;
}

export interface ItemSummary {
  crate_id: number;
  path: string[];
  kind: string;
}

/**
 * A whole rustdoc JSON document
 */
export interface TypeGraphDocument {
  root: ItemId;
  crate_version?: string | null;
  includes_private?: boolean;
  index: Record<string, GraphItem>;
  paths: Record<string, ItemSummary>;
  external_crates?: Record<string, { name: string; html_root_url?: string | null }>;
  format_version: number;
}
