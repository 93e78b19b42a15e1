/**
 * MethodSelector - decides which methods of a wrapped type are exposed
 *
 * Every candidate is evaluated completely: all reasons against it are
 * collected before the decision, so an excluded method's trail lists
 * everything wrong with it.
 *
 * Output lines (inside `Methods(...)`):
 *
 *   /// Returns the length
 *   length(&self:) -> Raw(f32),
 *   from_xyz(Raw(f32),Raw(f32),Raw(f32)) -> Wrapped(Vec3),
 *
 * and, with trails enabled, for an excluded method:
 *
 *   // Exclusion reason: Generics on the method
 *   // extend(self:<invalid: T>)
 *
 */

import type { FunctionInner, GraphItem } from '@scriptwrap/types';
import { functionSignature, genericParamCount, pathRefName } from '../graph/items.js';
import { docLines } from '../emit/DescriptorWriter.js';
import type { EmitContext } from '../emit/EmitContext.js';
import { classifyType, formatArgType, renderArg, wrapperFor } from './ArgType.js';
import type { ImplMember, WrappedItem } from './MemberCollector.js';

export interface MethodSelection {
  lines: string[];
  /** Names of selected methods, for field renaming */
  usedNames: Set<string>;
  /** True iff a selected method has no receiver */
  hasGlobalMethods: boolean;
}

/**
 * Result of evaluating one candidate
 */
interface MethodCandidate {
  name: string;
  /** Doc lines followed by the signature (without trailing separator) */
  rendered: string[];
  reasons: string[];
  /** A reference return; the candidate is dropped without a trail */
  returnsReference: boolean;
  hasReceiver: boolean;
}

/**
 * Trait members are only candidates when the trait is accepted for the type.
 */
function isAcceptedSource(entry: ImplMember, item: WrappedItem): boolean {
  const trait = entry.impl.trait;
  if (!trait) return true;
  const traitName = pathRefName(trait);
  return item.config.traits.some(accepted => accepted.name === traitName);
}

function evaluateMethod(member: GraphItem, fn: FunctionInner, name: string, item: WrappedItem, ctx: EmitContext): MethodCandidate {
  const signature = functionSignature(fn, member);
  const reasons: string[] = [];

  if (genericParamCount(fn.generics) > 0) {
    reasons.push('Generics on the method');
  }

  let hasReceiver = false;
  let rendered = `${name}(`;
  signature.inputs.forEach(([inputName, inputType], index) => {
    const classified = classifyType(inputType, ctx.tables);
    if (!classified.ok) {
      reasons.push(`Unsupported argument, not a simple type: ${classified.error}`);
    } else {
      const wrapper = wrapperFor(classified.value, item.wrappedType, ctx.tables);
      if (wrapper === undefined) {
        const shown = formatArgType(classified.value);
        reasons.push(`Unsupported argument ${shown}, not a wrapped type or primitive`);
        rendered += `<invalid: ${shown}>`;
      } else {
        rendered += renderArg(classified.value, wrapper);
      }
    }

    if (inputName === 'self') {
      hasReceiver = true;
      rendered += ':';
    } else if (index + 1 < signature.inputs.length) {
      rendered += ',';
    }
  });
  rendered += ')';

  let returnsReference = false;
  if (signature.output !== null) {
    const classified = classifyType(signature.output, ctx.tables);
    if (!classified.ok) {
      reasons.push(`Unsupported argument, not a simple type: ${classified.error}`);
    } else if (classified.value.kind === 'reference') {
      returnsReference = true;
      reasons.push('references are not supported as return types');
    } else {
      const wrapper = wrapperFor(classified.value, item.wrappedType, ctx.tables);
      if (wrapper === undefined) {
        const shown = formatArgType(classified.value);
        reasons.push(`Unsupported argument ${shown}, not a wrapped type or primitive`);
        rendered += ` -> <invalid: ${shown}>`;
      } else {
        rendered += ` -> ${renderArg(classified.value, wrapper)}`;
      }
    }
  }

  return {
    name,
    rendered: [...docLines(member.docs), rendered],
    reasons,
    returnsReference,
    hasReceiver,
  };
}

/**
 * Evaluate every member of a wrapped type in collection order.
 */
export function selectMethods(item: WrappedItem, ctx: EmitContext): MethodSelection {
  const lines: string[] = [];
  const usedNames = new Set<string>();
  let hasGlobalMethods = false;

  for (const [name, entries] of item.implItems) {
    for (const entry of entries) {
      if (!isAcceptedSource(entry, item)) continue;
      const fn = entry.member.inner.function;
      if (!fn) continue;

      const candidate = evaluateMethod(entry.member, fn, name, item, ctx);

      if (candidate.reasons.length > 0) {
        ctx.diagnostics.add({
          code: 'METHOD_EXCLUDED',
          severity: 'warning',
          message: `${item.wrappedType}::${name} excluded: ${candidate.reasons.join(', ')}`,
          typeName: item.wrappedType,
          member: name,
          reasons: candidate.reasons,
        });
        ctx.logger.debug('Method excluded', { type: item.wrappedType, method: name, reasons: candidate.reasons });

        if (ctx.printErrors && !candidate.returnsReference) {
          lines.push(`// Exclusion reason: ${candidate.reasons.join(',')}`);
          lines.push(...candidate.rendered.map(line => `// ${line}`));
          lines.push('');
        }
        continue;
      }

      const signature = candidate.rendered.length - 1;
      lines.push(...candidate.rendered.map((line, index) => (index === signature ? `${line},` : line)));
      usedNames.add(name);
      if (!candidate.hasReceiver) {
        hasGlobalMethods = true;
      }
    }
  }

  return { lines, usedNames, hasGlobalMethods };
}
