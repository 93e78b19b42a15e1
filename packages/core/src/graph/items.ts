/**
 * Narrowing helpers over rustdoc items and type expressions
 */

import type {
  FunctionInner,
  FunctionSignature,
  Generics,
  GraphItem,
  GraphType,
  GraphTypeMap,
  ItemId,
  ItemInnerMap,
  PathRef,
} from '@scriptwrap/types';
import { GraphError } from '../errors/ScriptwrapError.js';

export type ItemKind = 'struct' | 'enum' | 'impl' | 'function' | 'struct_field' | 'assoc_type' | 'other';

const KNOWN_KINDS: readonly (keyof ItemInnerMap)[] = ['struct', 'enum', 'impl', 'function', 'struct_field', 'assoc_type'];

/**
 * Index key for an id (JSON object keys are always strings)
 */
export function idKey(id: ItemId): string {
  return String(id);
}

export function itemKind(item: GraphItem): ItemKind {
  for (const kind of KNOWN_KINDS) {
    if (item.inner[kind] !== undefined) {
      return kind;
    }
  }
  return 'other';
}

/**
 * Signature of a function item, whichever field name the format uses
 */
export function functionSignature(fn: FunctionInner, item: GraphItem): FunctionSignature {
  const signature = fn.sig ?? fn.decl;
  if (!signature) {
    throw new GraphError(
      `Function item ${idKey(item.id)} has no signature`,
      'ERR_GRAPH_INVALID',
      { itemId: idKey(item.id) }
    );
  }
  return signature;
}

/**
 * Number of generic parameters: lifetimes, types and consts alike.
 */
export function genericParamCount(generics: Generics | undefined): number {
  return generics?.params.length ?? 0;
}

/**
 * Last path segment of a path reference ("std::ops::Add" -> "Add")
 */
export function pathRefName(ref: PathRef): string {
  const full = ref.name ?? ref.path ?? '';
  const segments = full.split('::');
  return segments[segments.length - 1] ?? full;
}

/**
 * Attribute check that works for both string and structured attributes.
 * Whitespace is ignored so `#[reflect( ignore )]` still matches.
 */
export function hasAttribute(item: GraphItem, attribute: string): boolean {
  const wanted = attribute.replace(/\s+/g, '');
  return item.attrs.some(attr => {
    const candidates = typeof attr === 'string' ? [attr] : Object.values(attr).filter((v): v is string => typeof v === 'string');
    return candidates.some(text => text.replace(/\s+/g, '') === wanted);
  });
}

/**
 * The single variant tag of a type expression, or the bare string form
 */
export function typeVariant(type: GraphType): keyof GraphTypeMap | string {
  if (typeof type === 'string') return type;
  const keys = Object.keys(type);
  return keys[0] ?? 'unknown';
}
