/**
 * Scaffolding tests - globals registry, provider and registration
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  DescriptorWriter,
  emitScaffolding,
  globalInstances,
  wrapperPrefix,
  type WrappedItem,
} from '@scriptwrap/core';
import type { BindingConfig } from '@scriptwrap/types';
import { TypeGraphBuilder } from '../../helpers/TypeGraphBuilder.js';
import { makeConfig, makeContext, wrapType } from '../../helpers/bindings.js';

const MLU = 'bevy_mod_scripting_lua::tealr::mlu';

function items(config: BindingConfig): WrappedItem[] {
  const b = new TypeGraphBuilder();
  const vec3 = b.addStruct('Vec3');
  const quat = b.addStruct('Quat');
  const graph = b.build();
  const vec3Item = wrapType(graph, vec3, config);
  vec3Item.hasGlobalMethods = true;
  return [vec3Item, wrapType(graph, quat, config)];
}

const config = makeConfig({
  apiName: 'Bevy',
  requiredFeatures: ['lua'],
  apiDefaults: 'fn setup_script(&mut self) {}',
  externalTypes: [
    { name: 'LuaWorld', proxyName: 'world', includeGlobalProxy: true, useDummyProxy: true },
    { name: 'LuaEntity', dontProcess: true },
    { name: 'LuaTime', includeGlobalProxy: true },
  ],
  types: [{ type: 'Vec3' }, { type: 'Quat' }],
});

function scaffolding(): string[] {
  const writer = new DescriptorWriter();
  const ctx = makeContext(config);
  ctx.importedTraits.set('Add', 'std::ops::Add');
  emitScaffolding(writer, items(config), ctx);
  return writer.toString().split('\n');
}

describe('wrapperPrefix', () => {
  it('should capitalize the language', () => {
    assert.strictEqual(wrapperPrefix({ language: 'lua' }), 'Lua');
  });
});

describe('globalInstances', () => {
  it('should list types with global methods, then external types requesting a proxy', () => {
    assert.deepStrictEqual(globalInstances(items(config), config), [
      { globalName: 'Vec3', proxyType: 'LuaVec3', dummy: false },
      { globalName: 'world', proxyType: 'LuaWorld', dummy: true },
      { globalName: 'LuaTime', proxyType: 'LuaTime', dummy: false },
    ]);
  });
});

describe('emitScaffolding', () => {
  it('should start with the interface imports', () => {
    assert.strictEqual(scaffolding()[0], 'use std::ops::Add;');
  });

  it('should guard every scaffolding item', () => {
    const lines = scaffolding();
    const guarded = lines
      .map((line, index) => (line === '#[cfg(feature="lua")]' ? lines[index + 1] : undefined))
      .filter((line): line is string => line !== undefined);

    assert.deepStrictEqual(guarded, [
      '#[derive(Default)]',
      `impl ${MLU}::ExportInstances for BevyGlobals {`,
      'pub struct LuaBevyProvider;',
      'impl APIProvider for LuaBevyProvider {',
    ]);
  });

  it('should register global instances', () => {
    assert.deepStrictEqual(scaffolding().filter(line => line.startsWith('instances.add_instance')), [
      `instances.add_instance("Vec3", ${MLU}::UserDataProxy::<LuaVec3>::new)?;`,
      'instances.add_instance("world", crate::lua::util::DummyTypeName::<LuaWorld>::new)?;',
      `instances.add_instance("LuaTime", ${MLU}::UserDataProxy::<LuaTime>::new)?;`,
    ]);
  });

  it('should document wrapped and external types', () => {
    assert.deepStrictEqual(scaffolding().filter(line => line.startsWith('.process_type')), [
      '.process_type::<LuaVec3>()',
      `.process_type::<${MLU}::UserDataProxy<LuaVec3>>()`,
      '.process_type::<LuaQuat>()',
      '.process_type::<LuaWorld>()',
      `.process_type::<${MLU}::UserDataProxy<LuaWorld>>()`,
      '.process_type::<LuaTime>()',
      `.process_type::<${MLU}::UserDataProxy<LuaTime>>()`,
    ]);
  });

  it('should copy the provider defaults before the registration hook', () => {
    const lines = scaffolding();
    const defaults = lines.indexOf('fn setup_script(&mut self) {}');

    assert.ok(defaults > 0);
    assert.strictEqual(lines[defaults + 1], 'fn register_with_app(&self, app: &mut App) {');
  });

  it('should register wrapped types, then primitives', () => {
    assert.deepStrictEqual(scaffolding().filter(line => line.startsWith('app.register_foreign_lua_type')), [
      'app.register_foreign_lua_type::<Vec3>();',
      'app.register_foreign_lua_type::<Quat>();',
      'app.register_foreign_lua_type::<f32>();',
      'app.register_foreign_lua_type::<bool>();',
      'app.register_foreign_lua_type::<usize>();',
    ]);
  });

  it('should write the bare scaffolding for an empty run', () => {
    const empty = makeConfig({ primitives: [], types: [] });
    const writer = new DescriptorWriter();

    emitScaffolding(writer, [], makeContext(empty));

    assert.strictEqual(writer.toString(), [
      '#[derive(Default)]',
      'pub(crate) struct ApiGlobals;',
      `impl ${MLU}::ExportInstances for ApiGlobals {`,
      `fn add_instances<'lua, T: ${MLU}::InstanceCollector<'lua>>(self, instances: &mut T) -> ${MLU}::mlua::Result<()> {`,
      'Ok(())',
      '}',
      '}',
      'pub struct LuaApiProvider;',
      'impl APIProvider for LuaApiProvider {',
      `type APITarget = Mutex<${MLU}::mlua::Lua>;`,
      `type ScriptContext = Mutex<${MLU}::mlua::Lua>;`,
      'type DocTarget = LuaDocFragment;',
      'fn attach_api(&mut self, ctx: &mut Self::APITarget) -> Result<(), ScriptError> {',
      'let ctx = ctx.get_mut().expect("Unable to acquire lock on Lua context");',
      `${MLU}::set_global_env(ApiGlobals,ctx).map_err(|e| ScriptError::Other(e.to_string()))`,
      '}',
      'fn get_doc_fragment(&self) -> Option<Self::DocTarget> {',
      'Some(LuaDocFragment::new("Api", |tw| {',
      'tw',
      '.document_global_instance::<ApiGlobals>().expect("Something went wrong documenting globals")',
      '}))',
      '}',
      'fn register_with_app(&self, app: &mut App) {',
      '}',
      '}',
      '',
    ].join('\n'));
  });
});
