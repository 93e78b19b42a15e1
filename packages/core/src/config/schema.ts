/**
 * JSON schema of the binding configuration file as users write it.
 *
 * Everything except `types[].type` is optional; ConfigLoader fills in
 * DEFAULT_CONFIG and per-type defaults after validation.
 */

import type { SchemaObject } from 'ajv';
import type { ExternalTypeConfig, ScriptLanguage, TraitConfig, UmbrellaConfig } from '@scriptwrap/types';

export interface RawTypeConfig {
  type: string;
  source?: string;
  importPath?: string;
  doc?: string;
  requiredFeatures?: string[];
  traits?: TraitConfig[];
  deriveFlags?: string[];
  extraMethods?: string[];
}

export interface RawBindingConfig {
  outputFile?: string;
  apiName?: string;
  language?: ScriptLanguage;
  macroName?: string;
  requiredFeatures?: string[];
  umbrella?: UmbrellaConfig;
  imports?: string;
  other?: string;
  apiDefaults?: string;
  primitives?: string[];
  wrappedTypes?: string[];
  externalTypes?: Array<Partial<ExternalTypeConfig> & { name: string }>;
  types: RawTypeConfig[];
}

const identifier = { type: 'string', minLength: 1 };
const stringList = { type: 'array', items: identifier };

export const BINDING_CONFIG_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['types'],
  additionalProperties: false,
  properties: {
    outputFile: identifier,
    apiName: identifier,
    language: { type: 'string', enum: ['lua'] },
    macroName: identifier,
    requiredFeatures: stringList,
    umbrella: {
      type: 'object',
      required: ['prefix', 'alias'],
      additionalProperties: false,
      properties: {
        prefix: identifier,
        alias: identifier,
      },
    },
    imports: { type: 'string' },
    other: { type: 'string' },
    apiDefaults: { type: 'string' },
    primitives: stringList,
    wrappedTypes: stringList,
    externalTypes: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name'],
        additionalProperties: false,
        properties: {
          name: identifier,
          proxyName: identifier,
          includeGlobalProxy: { type: 'boolean' },
          useDummyProxy: { type: 'boolean' },
          dontProcess: { type: 'boolean' },
        },
      },
    },
    types: {
      type: 'array',
      items: {
        type: 'object',
        required: ['type'],
        additionalProperties: false,
        properties: {
          type: identifier,
          source: { type: 'string' },
          importPath: { type: 'string' },
          doc: { type: 'string' },
          requiredFeatures: stringList,
          traits: {
            type: 'array',
            items: {
              type: 'object',
              required: ['name', 'importPath'],
              additionalProperties: false,
              properties: {
                name: identifier,
                importPath: identifier,
              },
            },
          },
          deriveFlags: { type: 'array', items: { type: 'string' } },
          extraMethods: { type: 'array', items: { type: 'string' } },
        },
      },
    },
  },
};
