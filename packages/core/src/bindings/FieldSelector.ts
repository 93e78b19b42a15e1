/**
 * FieldSelector - public fields of plain structs
 *
 * Fields are never dropped for their type: a field whose type has no
 * wrapper is exposed through the reflection placeholder instead.
 */

import { hasAttribute } from '../graph/items.js';
import { docLines } from '../emit/DescriptorWriter.js';
import type { EmitContext } from '../emit/EmitContext.js';
import { classifyType, renderArg, wrapperFor } from './ArgType.js';
import type { WrappedItem } from './MemberCollector.js';

export const REFLECTED_VALUE = 'Raw(ReflectedValue)';

const IGNORE_ATTRIBUTE = '#[reflect(ignore)]';

/**
 * Field lines for `Fields(...)`.
 *
 * @param usedNames - names taken by selected methods; a field with such a
 *   name is emitted as `_name` with a rename annotation
 */
export function selectFields(item: WrappedItem, usedNames: ReadonlySet<string>, ctx: EmitContext): string[] {
  const kind = item.item.inner.struct?.kind;
  if (kind === undefined || typeof kind === 'string' || !kind.plain) {
    return [];
  }

  const lines: string[] = [];
  for (const fieldId of kind.plain.fields) {
    const field = item.graph.requireItem(fieldId);
    const fieldType = field.inner.struct_field;
    if (fieldType === undefined || field.name === null) continue;
    if (field.visibility !== 'public') continue;
    if (hasAttribute(field, IGNORE_ATTRIBUTE)) continue;

    let rendered = REFLECTED_VALUE;
    const classified = classifyType(fieldType, ctx.tables);
    if (classified.ok) {
      const wrapper = wrapperFor(classified.value, item.wrappedType, ctx.tables);
      if (wrapper !== undefined && wrapper !== 'none') {
        rendered = renderArg(classified.value, wrapper);
      }
    }

    if (rendered === REFLECTED_VALUE) {
      ctx.diagnostics.add({
        code: 'FIELD_REFLECTED',
        severity: 'info',
        message: `${item.wrappedType}.${field.name} is exposed as a reflected value`,
        typeName: item.wrappedType,
        member: field.name,
      });
    }

    lines.push(...docLines(field.docs));
    if (usedNames.has(field.name)) {
      lines.push(`#[rename("${field.name}")]`);
      lines.push(`_${field.name}: ${rendered},`);
    } else {
      lines.push(`${field.name}: ${rendered},`);
    }
  }
  return lines;
}
