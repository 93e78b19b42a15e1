/**
 * ArgType - semantic category of a type expression
 *
 * Every operand and return type that crosses into the scripting language is
 * classified into this closed set, then mapped to a wrapper strategy:
 *
 *   Vec3            -> wrapped    -> Wrapped(Vec3)
 *   f32             -> primitive  -> Raw(f32)
 *   &mut Self       -> reference  -> &mut self
 *   Option<Vec3>    -> unsupported (unless Option is configured)
 *
 * Classification failure is a message, not an exception, so a caller can
 * collect several failures for one method.
 */

import type { GenericArgs, GraphType, TypeTables } from '@scriptwrap/types';
import { pathRefName, typeVariant } from '../graph/items.js';

export type ArgType =
  | { kind: 'self' }
  | { kind: 'reference'; mutable: boolean; inner: ArgType }
  | { kind: 'primitive'; name: string; args: ArgType[] }
  | { kind: 'wrapped'; name: string; args: ArgType[] }
  | { kind: 'generic'; name: string }
  | { kind: 'unsupported'; name: string; args: ArgType[] };

/**
 * How a classified type is passed across:
 * - none: as is (the receiver, or the reflected fallback for fields)
 * - raw: by value, for primitives
 * - wrapped: through the generated proxy
 */
export type ArgWrapperType = 'none' | 'raw' | 'wrapped';

export type Classification =
  | { ok: true; value: ArgType }
  | { ok: false; error: string };

function success(value: ArgType): Classification {
  return { ok: true, value };
}

function failure(error: string): Classification {
  return { ok: false, error };
}

function classifyNamed(name: string, args: ArgType[], tables: TypeTables): ArgType {
  if (tables.primitives.has(name)) return { kind: 'primitive', name, args };
  if (tables.wrapped.has(name)) return { kind: 'wrapped', name, args };
  return { kind: 'unsupported', name, args };
}

/**
 * Classify the type arguments of a path (`Vec<T>` -> [T]).
 * Lifetimes are skipped; inferred and const arguments fail.
 */
function classifyGenericArgs(args: GenericArgs | null, tables: TypeTables): { ok: true; value: ArgType[] } | { ok: false; error: string } {
  if (!args) return { ok: true, value: [] };
  if (args.parenthesized) {
    return { ok: false, error: 'parenthesized generic arguments are not supported' };
  }

  const classified: ArgType[] = [];
  for (const arg of args.angle_bracketed?.args ?? []) {
    if (typeof arg === 'string') {
      return { ok: false, error: `generic argument "${arg}" is not supported` };
    }
    if (arg.lifetime !== undefined) continue;
    if (arg.type === undefined) {
      return { ok: false, error: 'const generic arguments are not supported' };
    }
    const inner = classifyType(arg.type, tables);
    if (!inner.ok) return inner;
    classified.push(inner.value);
  }
  return { ok: true, value: classified };
}

/**
 * Classify a type expression.
 *
 * Priority: Self, reference, configured primitive, generic parameter,
 * configured wrapped type, anything else named is unsupported.
 */
export function classifyType(type: GraphType, tables: TypeTables): Classification {
  if (typeof type === 'string') {
    return failure(`type form "${type}" is not supported`);
  }

  if (type.generic !== undefined) {
    if (type.generic === 'Self') return success({ kind: 'self' });
    if (tables.primitives.has(type.generic)) {
      return success({ kind: 'primitive', name: type.generic, args: [] });
    }
    return success({ kind: 'generic', name: type.generic });
  }

  if (type.borrowed_ref !== undefined) {
    const inner = classifyType(type.borrowed_ref.type, tables);
    if (!inner.ok) return inner;
    return success({ kind: 'reference', mutable: type.borrowed_ref.mutable, inner: inner.value });
  }

  if (type.primitive !== undefined) {
    return success(classifyNamed(type.primitive, [], tables));
  }

  if (type.resolved_path !== undefined) {
    const args = classifyGenericArgs(type.resolved_path.args, tables);
    if (!args.ok) return args;
    return success(classifyNamed(pathRefName(type.resolved_path), args.value, tables));
  }

  if (type.qualified_path !== undefined) {
    return success(classifyNamed(type.qualified_path.name, [], tables));
  }

  return failure(`${typeVariant(type)} types are not supported`);
}

/**
 * Innermost non-reference type (`&&mut T` -> T)
 */
export function innermost(arg: ArgType): Exclude<ArgType, { kind: 'reference' }> {
  return arg.kind === 'reference' ? innermost(arg.inner) : arg;
}

export function isSelf(arg: ArgType): boolean {
  return innermost(arg).kind === 'self';
}

/**
 * Name used for table lookups; undefined for Self, which the caller
 * resolves to the declaring type.
 */
export function baseIdent(arg: ArgType): string | undefined {
  const base = innermost(arg);
  return base.kind === 'self' ? undefined : base.name;
}

/**
 * Wrapper strategy for a classified type, or undefined when none exists.
 */
export function wrapperFor(arg: ArgType, selfTypeName: string, tables: TypeTables): ArgWrapperType | undefined {
  if (isSelf(arg)) return 'none';
  const name = baseIdent(arg) ?? selfTypeName;
  if (tables.primitives.has(name)) return 'raw';
  if (tables.wrapped.has(name)) return 'wrapped';
  return undefined;
}

/**
 * Plain rendering, used inside wrappers and in exclusion messages
 */
export function formatArgType(arg: ArgType): string {
  switch (arg.kind) {
    case 'self':
      return 'self';
    case 'reference':
      return `&${arg.mutable ? 'mut ' : ''}${formatArgType(arg.inner)}`;
    case 'generic':
      return arg.name;
    case 'primitive':
    case 'wrapped':
    case 'unsupported':
      return arg.args.length > 0
        ? `${arg.name}<${arg.args.map(formatArgType).join(', ')}>`
        : arg.name;
  }
}

/**
 * Descriptor rendering of an argument under a wrapper strategy.
 *
 * References keep their `&`/`&mut ` prefix outside the wrapper:
 * `&Wrapped(Vec3)`, `&mut self`.
 */
export function renderArg(arg: ArgType, wrapper: ArgWrapperType): string {
  if (arg.kind === 'reference') {
    return `&${arg.mutable ? 'mut ' : ''}${renderArg(arg.inner, wrapper)}`;
  }
  if (arg.kind === 'self') return 'self';

  const plain = formatArgType(arg);
  switch (wrapper) {
    case 'none':
      return plain;
    case 'raw':
      return `Raw(${plain})`;
    case 'wrapped':
      return `Wrapped(${plain})`;
  }
}
