/**
 * BindingEmitter - one descriptor block per wrapped type
 *
 * Block layout:
 *
 *   #[cfg(feature="math")]
 *   impl_script_newtype!{
 *   #[languages(on_feature(lua))]
 *   /// A 3-dimensional vector.
 *   bevy::math::Vec3 :
 *   Clone +
 *   Debug +
 *   Methods(
 *   ...
 *   )
 *   + Fields(
 *   ...
 *   )
 *   + BinOps(
 *   ...
 *   )
 *   + UnaryOps(
 *   ...
 *   )
 *   lua impl {
 *   ...
 *   }
 *   }
 */

import type { DescriptorWriter } from './DescriptorWriter.js';
import { docLines, splitLines } from './DescriptorWriter.js';
import type { EmitContext } from './EmitContext.js';
import type { WrappedItem } from '../bindings/MemberCollector.js';
import { selectMethods } from '../bindings/MethodSelector.js';
import { selectFields } from '../bindings/FieldSelector.js';
import { mapBinaryOperators, mapUnaryOperators } from '../bindings/OperatorMapper.js';

/**
 * Feature guard lines; none for an empty feature list.
 */
export function featureGuard(features: readonly string[]): string[] {
  if (features.length === 0) return [];
  if (features.length === 1) return [`#[cfg(feature="${features[0]}")]`];
  return ['#[cfg(all(', ...features.map(feature => `feature="${feature}",`), '))]'];
}

/**
 * Path written as the block's subject: the import path override, or the
 * resolved path
 */
export function fullPath(item: WrappedItem): string {
  return item.config.importPath.length > 0 ? item.config.importPath : item.pathComponents.join('::');
}

/**
 * `Clone +`/`Debug +` for implemented traits, then configured flags with
 * ` +` after each flag's last line.
 */
export function deriveFlagLines(item: WrappedItem): string[] {
  const lines: string[] = [];
  if (item.implementedTraits.has('Clone')) lines.push('Clone +');
  if (item.implementedTraits.has('Debug')) lines.push('Debug +');

  for (const flag of item.config.deriveFlags) {
    const flagLines = splitLines(flag);
    if (flagLines.length === 0) continue;
    const last = flagLines.length - 1;
    lines.push(...flagLines.map((line, index) => (index === last ? `${line} +` : line)));
  }
  return lines;
}

function section(writer: DescriptorWriter, opener: string, body: readonly string[]): void {
  writer.line(opener).lines(body).line(')');
}

/**
 * Write one block and record the type's accepted interfaces for the
 * scaffolding imports. Sets `item.hasGlobalMethods`.
 */
export function emitBinding(writer: DescriptorWriter, item: WrappedItem, ctx: EmitContext): void {
  const { config } = ctx;

  const methods = selectMethods(item, ctx);
  item.hasGlobalMethods = methods.hasGlobalMethods;
  const fields = selectFields(item, methods.usedNames, ctx);
  const binaryOps = mapBinaryOperators(item, ctx);
  const unaryOps = mapUnaryOperators(item);

  writer.lines(featureGuard(item.config.requiredFeatures));
  writer.line(`${config.macroName}!{`);
  writer.line(`#[languages(on_feature(${config.language}))]`);
  writer.lines(docLines(item.config.doc ?? item.item.docs));
  writer.line(`${fullPath(item)} :`);
  writer.lines(deriveFlagLines(item));

  section(writer, 'Methods(', methods.lines);
  section(writer, '+ Fields(', fields);
  section(writer, '+ BinOps(', binaryOps);
  section(writer, '+ UnaryOps(', unaryOps);

  writer.line(`${config.language} impl {`);
  writer.lines(item.config.extraMethods.map(method => `${method};`));
  writer.line('}');
  writer.line('}');

  for (const trait of item.config.traits) {
    if (!ctx.importedTraits.has(trait.name)) {
      ctx.importedTraits.set(trait.name, trait.importPath);
    }
  }

  ctx.logger.debug('Emitted binding', {
    type: item.wrappedType,
    methods: methods.usedNames.size,
    fields: fields.filter(line => !line.startsWith('///') && !line.startsWith('#[')).length,
    binaryOps: binaryOps.length,
    unaryOps: unaryOps.length,
  });
}
