/**
 * OperatorMapper - arithmetic operator implementations
 *
 * Binary operators are read from `Add`/`Sub`/... impls whose receiver is
 * the wrapped type itself or a configured primitive. The result type comes
 * from the impl's `Output` associated type. Implementations that cannot be
 * described are left out without a trail.
 */

import type { GraphType, ImplInner } from '@scriptwrap/types';
import { functionSignature, pathRefName } from '../graph/items.js';
import type { TypeGraph } from '../graph/TypeGraph.js';
import type { EmitContext } from '../emit/EmitContext.js';
import { baseIdent, classifyType, renderArg, wrapperFor } from './ArgType.js';
import type { ImplMember, WrappedItem } from './MemberCollector.js';

interface OperatorDef {
  /** Method name, e.g. "add" */
  method: string;
  /** Trait name and display token, e.g. "Add" */
  trait: string;
}

export const BINARY_OPERATORS: readonly OperatorDef[] = [
  { method: 'add', trait: 'Add' },
  { method: 'sub', trait: 'Sub' },
  { method: 'div', trait: 'Div' },
  { method: 'mul', trait: 'Mul' },
  { method: 'rem', trait: 'Rem' },
];

export const UNARY_OPERATORS: readonly OperatorDef[] = [
  { method: 'neg', trait: 'Neg' },
];

function implementsTrait(impl: ImplInner, trait: string): boolean {
  return impl.trait !== null && pathRefName(impl.trait) === trait;
}

/**
 * Receiver filter: the wrapped type itself (when it is in the wrapped
 * table) or a configured primitive.
 */
function hasAcceptedReceiver(impl: ImplInner, item: WrappedItem, ctx: EmitContext): boolean {
  const receiver = classifyType(impl.for, ctx.tables);
  if (!receiver.ok) return false;
  const base = baseIdent(receiver.value) ?? item.wrappedType;
  const isWrapper = base === item.wrappedType && ctx.tables.wrapped.has(base);
  return isWrapper || ctx.tables.primitives.has(base);
}

/**
 * The `Output` associated type of an impl, if declared
 */
function outputType(impl: ImplInner, graph: TypeGraph): GraphType | undefined {
  for (const id of impl.items) {
    const assoc = graph.requireItem(id);
    if (assoc.name !== 'Output' || !assoc.inner.assoc_type) continue;
    return assoc.inner.assoc_type.type ?? assoc.inner.assoc_type.default ?? undefined;
  }
  return undefined;
}

/**
 * Describe one binary implementation, or give the reason it is dropped.
 */
function describeBinary(entry: ImplMember, op: OperatorDef, item: WrappedItem, ctx: EmitContext): { ok: true; line: string } | { ok: false; reason: string } {
  const fn = entry.member.inner.function;
  if (!fn) return { ok: false, reason: 'not a function' };

  const operands: string[] = [];
  for (const [, inputType] of functionSignature(fn, entry.member).inputs) {
    const classified = classifyType(inputType, ctx.tables);
    if (!classified.ok) return { ok: false, reason: classified.error };
    const wrapper = wrapperFor(classified.value, item.wrappedType, ctx.tables);
    if (wrapper === undefined) return { ok: false, reason: 'operand is not a wrapped type or primitive' };
    operands.push(renderArg(classified.value, wrapper));
  }

  const output = outputType(entry.impl, item.graph);
  if (output === undefined) return { ok: false, reason: 'no Output type' };
  const classified = classifyType(output, ctx.tables);
  if (!classified.ok) return { ok: false, reason: classified.error };
  const wrapper = wrapperFor(classified.value, item.wrappedType, ctx.tables);
  if (wrapper === undefined || wrapper === 'none') {
    return { ok: false, reason: 'Output is not a wrapped type or primitive' };
  }

  return { ok: true, line: `${operands.join(` ${op.trait} `)} -> ${renderArg(classified.value, wrapper)},` };
}

/**
 * Lines for `BinOps(...)`, operators in table order.
 */
export function mapBinaryOperators(item: WrappedItem, ctx: EmitContext): string[] {
  const lines: string[] = [];
  for (const op of BINARY_OPERATORS) {
    for (const entry of item.implItems.get(op.method) ?? []) {
      if (!implementsTrait(entry.impl, op.trait)) continue;
      if (!hasAcceptedReceiver(entry.impl, item, ctx)) continue;

      const described = describeBinary(entry, op, item, ctx);
      if (described.ok) {
        lines.push(described.line);
      } else {
        ctx.diagnostics.add({
          code: 'OPERATOR_DROPPED',
          severity: 'info',
          message: `${item.wrappedType} ${op.trait} implementation dropped: ${described.reason}`,
          typeName: item.wrappedType,
          member: op.method,
        });
      }
    }
  }
  return lines;
}

/**
 * Lines for `UnaryOps(...)`. The implementation's signature is not read:
 * any `Neg` impl yields `Neg self -> self`.
 */
export function mapUnaryOperators(item: WrappedItem): string[] {
  return UNARY_OPERATORS
    .filter(op => (item.implItems.get(op.method) ?? []).some(entry => implementsTrait(entry.impl, op.trait)))
    .map(op => `${op.trait} self -> self`);
}
