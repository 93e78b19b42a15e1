/**
 * Scaffolding - the registration code written once after all blocks
 *
 * - `use` lines for every accepted interface (first-use order)
 * - `<Api>Globals` and its instance registry
 * - `Lua<Api>Provider` with attach, documentation and registration hooks
 *
 * Each generated item is guarded by the config's `requiredFeatures`.
 */

import type { BindingConfig } from '@scriptwrap/types';
import type { WrappedItem } from '../bindings/MemberCollector.js';
import type { DescriptorWriter } from './DescriptorWriter.js';
import { featureGuard } from './BindingEmitter.js';
import type { EmitContext } from './EmitContext.js';

const MLU = 'bevy_mod_scripting_lua::tealr::mlu';

/**
 * Prefix of generated proxy names, e.g. "Lua" for "LuaVec3"
 */
export function wrapperPrefix(config: Pick<BindingConfig, 'language'>): string {
  return config.language.charAt(0).toUpperCase() + config.language.slice(1);
}

interface GlobalInstance {
  /** Name of the global in the script */
  globalName: string;
  /** Proxy type registered under it */
  proxyType: string;
  dummy: boolean;
}

/**
 * Global instances: types with global methods, then external types that
 * request one.
 */
export function globalInstances(items: readonly WrappedItem[], config: BindingConfig): GlobalInstance[] {
  return [
    ...items
      .filter(item => item.hasGlobalMethods)
      .map(item => ({ globalName: item.wrappedType, proxyType: item.wrapperName, dummy: false })),
    ...config.externalTypes
      .filter(external => external.includeGlobalProxy)
      .map(external => ({ globalName: external.proxyName, proxyType: external.name, dummy: external.useDummyProxy })),
  ];
}

function instanceLine(instance: GlobalInstance): string {
  const constructor = instance.dummy
    ? `crate::lua::util::DummyTypeName::<${instance.proxyType}>::new`
    : `${MLU}::UserDataProxy::<${instance.proxyType}>::new`;
  return `instances.add_instance("${instance.globalName}", ${constructor})?;`;
}

/**
 * Types documented by the provider, with whether a global proxy is also
 * documented for them
 */
function documentedTypes(items: readonly WrappedItem[], config: BindingConfig): Array<[string, boolean]> {
  return [
    ...items.map((item): [string, boolean] => [item.wrapperName, item.hasGlobalMethods]),
    ...config.externalTypes
      .filter(external => !external.dontProcess)
      .map((external): [string, boolean] => [external.name, external.includeGlobalProxy]),
  ];
}

export function emitScaffolding(writer: DescriptorWriter, items: readonly WrappedItem[], ctx: EmitContext): void {
  const { config } = ctx;
  const guard = featureGuard(config.requiredFeatures);
  const globals = `${config.apiName}Globals`;
  const provider = `${wrapperPrefix(config)}${config.apiName}Provider`;

  for (const importPath of ctx.importedTraits.values()) {
    writer.line(`use ${importPath};`);
  }

  // globals
  writer.lines(guard);
  writer.line('#[derive(Default)]');
  writer.line(`pub(crate) struct ${globals};`);

  writer.lines(guard);
  writer.line(`impl ${MLU}::ExportInstances for ${globals} {`);
  writer.line(`fn add_instances<'lua, T: ${MLU}::InstanceCollector<'lua>>(self, instances: &mut T) -> ${MLU}::mlua::Result<()> {`);
  writer.lines(globalInstances(items, config).map(instanceLine));
  writer.line('Ok(())');
  writer.line('}');
  writer.line('}');

  // provider
  writer.lines(guard);
  writer.line(`pub struct ${provider};`);

  writer.lines(guard);
  writer.line(`impl APIProvider for ${provider} {`);
  writer.line(`type APITarget = Mutex<${MLU}::mlua::Lua>;`);
  writer.line(`type ScriptContext = Mutex<${MLU}::mlua::Lua>;`);
  writer.line('type DocTarget = LuaDocFragment;');

  writer.line('fn attach_api(&mut self, ctx: &mut Self::APITarget) -> Result<(), ScriptError> {');
  writer.line('let ctx = ctx.get_mut().expect("Unable to acquire lock on Lua context");');
  writer.line(`${MLU}::set_global_env(${globals},ctx).map_err(|e| ScriptError::Other(e.to_string()))`);
  writer.line('}');

  writer.line('fn get_doc_fragment(&self) -> Option<Self::DocTarget> {');
  writer.line(`Some(LuaDocFragment::new("${config.apiName}", |tw| {`);
  writer.line('tw');
  writer.line(`.document_global_instance::<${globals}>().expect("Something went wrong documenting globals")`);
  for (const [typeName, withProxy] of documentedTypes(items, config)) {
    writer.line(`.process_type::<${typeName}>()`);
    if (withProxy) {
      writer.line(`.process_type::<${MLU}::UserDataProxy<${typeName}>>()`);
    }
  }
  writer.line('}))');
  writer.line('}');

  writer.text(config.apiDefaults);

  writer.line('fn register_with_app(&self, app: &mut App) {');
  for (const typeName of [...items.map(item => item.wrappedType), ...config.primitives]) {
    writer.line(`app.register_foreign_lua_type::<${typeName}>();`);
  }
  writer.line('}');
  writer.line('}');
}
