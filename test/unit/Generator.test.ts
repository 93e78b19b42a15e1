/**
 * Generator tests - whole runs over small type graphs
 *
 * - all unmatched names reported in one error
 * - exclusion trails only with printErrors
 * - reference returns never written
 * - reflected field placeholder and field renaming
 * - global instance registration
 * - configuration order and byte-identical reruns
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  DiagnosticCollector,
  FILE_HEADER,
  generateBindings,
  matchTypes,
  UnmatchedTypesError,
  type TypeGraph,
} from '@scriptwrap/core';
import { t, TypeGraphBuilder } from '../helpers/TypeGraphBuilder.js';
import { makeConfig } from '../helpers/bindings.js';

const f32 = t.prim('f32');

function orderedGraph(names: string[]): TypeGraph {
  const b = new TypeGraphBuilder('bevy_math');
  for (const name of names) {
    const id = b.addStruct(name);
    b.addImpl(id, { items: [b.method('length', [['self', t.ref(t.self)]], f32)] });
  }
  return b.build();
}

function vec3Graph(): TypeGraph {
  const b = new TypeGraphBuilder('bevy_math');
  const vec3 = b.addStruct('Vec3', {
    fields: [
      { name: 'value', type: f32 },
      { name: 'mesh', type: t.path('Handle') },
    ],
  });
  b.addImpl(vec3, {
    items: [
      b.method('new', [['value', f32]], t.self),
      b.method('value', [['self', t.ref(t.self)]], f32),
      b.method('set_mesh', [['self', t.ref(t.self, true)], ['mesh', t.path('Handle')]], null),
      b.method('as_quat', [['self', t.ref(t.self)]], t.ref(t.path('Quat'))),
    ],
  });
  const quat = b.addStruct('Quat');
  b.addImpl(quat, { items: [b.method('length', [['self', t.ref(t.self)]], f32)] });
  return b.build();
}

const vec3Config = makeConfig({ types: [{ type: 'Vec3' }, { type: 'Quat' }] });

function lines(output: string): string[] {
  return output.split('\n');
}

describe('generateBindings', () => {
  describe('type matching', () => {
    it('should report every missing name in one error', () => {
      const config = makeConfig({ types: [{ type: 'Vec3' }, { type: 'Mat5' }, { type: 'Quat2' }] });

      assert.throws(
        () => generateBindings([vec3Graph()], config),
        (err: unknown) => {
          assert.ok(err instanceof UnmatchedTypesError);
          assert.deepStrictEqual(err.missing, ['Mat5', 'Quat2']);
          assert.strictEqual(
            err.message,
            'Some configured types could not be matched in the given type graphs (not found: Mat5, Quat2)'
          );
          return true;
        }
      );
    });

    it('should report names found in several graphs as ambiguous', () => {
      const glam = new TypeGraphBuilder('glam');
      glam.addStruct('Vec3');
      const config = makeConfig({ types: [{ type: 'Vec3' }] });

      assert.throws(
        () => matchTypes([vec3Graph(), glam.build()], config),
        (err: unknown) => err instanceof UnmatchedTypesError
          && err.ambiguous.length === 1
          && err.ambiguous[0] === 'Vec3'
          && err.missing.length === 0
      );
    });

    it('should disambiguate by source', () => {
      const glam = new TypeGraphBuilder('glam');
      glam.addStruct('Vec3');
      const config = makeConfig({ types: [{ type: 'Vec3', source: 'glam' }] });

      const output = generateBindings([vec3Graph(), glam.build()], config);

      assert.strictEqual(lines(output)[1], 'use glam::Vec3;');
    });

    it('should only match structs and enums', () => {
      const b = new TypeGraphBuilder();
      b.addFunction('Vec3');
      const config = makeConfig({ types: [{ type: 'Vec3' }] });

      assert.throws(
        () => matchTypes([b.build()], config),
        (err: unknown) => err instanceof UnmatchedTypesError && err.missing[0] === 'Vec3'
      );
    });
  });

  describe('exclusions', () => {
    it('should leave out unsupported methods without trails', () => {
      const output = generateBindings([vec3Graph()], vec3Config);

      assert.ok(lines(output).every(line => !line.includes('set_mesh')));
    });

    it('should write unsupported methods as comments with trails', () => {
      const out = lines(generateBindings([vec3Graph()], vec3Config, { printErrors: true }));
      const trail = out.indexOf('// set_mesh(&mut self:<invalid: Handle>)');

      assert.ok(trail > 0);
      assert.strictEqual(out[trail - 1], '// Exclusion reason: Unsupported argument Handle, not a wrapped type or primitive');
      assert.strictEqual(out[trail + 1], '');
    });

    it('should never write methods returning references', () => {
      for (const printErrors of [false, true]) {
        const output = generateBindings([vec3Graph()], vec3Config, { printErrors });
        assert.ok(lines(output).every(line => !line.includes('as_quat')));
      }
    });

    it('should collect exclusions in the given collector', () => {
      const diagnostics = new DiagnosticCollector();
      generateBindings([vec3Graph()], vec3Config, { diagnostics });

      assert.deepStrictEqual(diagnostics.getByCode('METHOD_EXCLUDED').map(d => d.member), ['set_mesh', 'as_quat']);
      assert.strictEqual(diagnostics.summary(), '2 methods excluded, 1 field reflected');
    });
  });

  describe('fields', () => {
    it('should expose unsupported fields as reflected values', () => {
      assert.ok(lines(generateBindings([vec3Graph()], vec3Config)).includes('mesh: Raw(ReflectedValue),'));
    });

    it('should rename a field that shares its name with a method', () => {
      const out = lines(generateBindings([vec3Graph()], vec3Config));
      const rename = out.indexOf('#[rename("value")]');

      assert.ok(out.includes('value(&self:) -> Raw(f32),'));
      assert.ok(rename > 0);
      assert.strictEqual(out[rename + 1], '_value: Raw(f32),');
    });
  });

  describe('global methods', () => {
    it('should register a global instance only for types with receiver-less methods', () => {
      const registry = lines(generateBindings([vec3Graph()], vec3Config))
        .filter(line => line.startsWith('instances.add_instance'));

      assert.deepStrictEqual(registry, [
        'instances.add_instance("Vec3", bevy_mod_scripting_lua::tealr::mlu::UserDataProxy::<LuaVec3>::new)?;',
      ]);
    });
  });

  describe('layout and ordering', () => {
    const config = makeConfig({
      imports: 'use std::sync::Mutex;\n',
      other: 'struct Marker;',
      types: [{ type: 'Alpha' }, { type: 'Beta' }, { type: 'Gamma' }],
    });

    it('should write the preamble in configuration order', () => {
      const out = lines(generateBindings([orderedGraph(['Gamma', 'Alpha', 'Beta'])], config));

      assert.deepStrictEqual(out.slice(0, 6), [
        FILE_HEADER,
        'use std::sync::Mutex;',
        'use bevy::math::Alpha;',
        'use bevy::math::Beta;',
        'use bevy::math::Gamma;',
        'impl_script_newtype!{',
      ]);
    });

    it('should write blocks in configuration order regardless of graph order', () => {
      const out = lines(generateBindings([orderedGraph(['Gamma', 'Alpha', 'Beta'])], config));
      const subjects = out.filter(line => line.endsWith(' :'));

      assert.deepStrictEqual(subjects, ['bevy::math::Alpha :', 'bevy::math::Beta :', 'bevy::math::Gamma :']);
    });

    it('should copy the other block between the blocks and the scaffolding', () => {
      const out = lines(generateBindings([orderedGraph(['Alpha', 'Beta', 'Gamma'])], config));
      const marker = out.indexOf('struct Marker;');

      assert.strictEqual(out[marker - 1], '}');
      assert.strictEqual(out[marker + 1], '#[derive(Default)]');
    });

    it('should produce identical output for identical inputs', () => {
      const first = generateBindings([orderedGraph(['Alpha', 'Beta', 'Gamma'])], config);
      const second = generateBindings([orderedGraph(['Alpha', 'Beta', 'Gamma'])], config);
      const shuffled = generateBindings([orderedGraph(['Beta', 'Gamma', 'Alpha'])], config);

      assert.strictEqual(first, second);
      assert.strictEqual(first, shuffled);
    });
  });

  describe('graph formats', () => {
    it('should record a diagnostic for untested format versions', () => {
      const b = new TypeGraphBuilder('bevy_math', 10);
      b.addStruct('Vec3');
      const diagnostics = new DiagnosticCollector();

      generateBindings([b.build('old.json')], makeConfig({ types: [{ type: 'Vec3' }] }), { diagnostics });

      assert.deepStrictEqual(diagnostics.getByCode('GRAPH_FORMAT_UNTESTED').map(d => d.message), [
        'old.json uses type graph format 10, outside the tested range 20-45',
      ]);
    });
  });
});
