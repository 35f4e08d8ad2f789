/**
 * core/catalog_loader.ts
 *
 * Reads config/catalog.json at startup, validates every definition against
 * the schema below and builds the TweakCatalog.
 *
 * Unlike most config, a bad catalog is fatal: an entry that fails validation
 * aborts the load with every violation listed, rather than being skipped.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { TweakDefinition } from './types';
import { CatalogError, errorMessage } from './errors';
import { TweakCatalog } from './catalog';
import { buildTweak } from './tweak_kinds';
import { scopedLogger } from './logger';

const log = scopedLogger('core/catalog_loader');
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true, strictTypes: false });

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const nonEmpty = { type: 'string', minLength: 1 };

// value must fit its registry type: DWORDs unsigned 32-bit, QWORDs either a
// safe integer or a decimal string, strings as strings
const valueByType = [
  { if: { properties: { type: { const: 'DWord' } } }, then: { properties: { value: { type: 'integer', minimum: 0, maximum: 4294967295 } } } },
  {
    if: { properties: { type: { const: 'QWord' } } },
    then: {
      properties: {
        value: {
          anyOf: [
            { type: 'integer', minimum: Number.MIN_SAFE_INTEGER, maximum: Number.MAX_SAFE_INTEGER },
            { type: 'string', pattern: '^-?[0-9]+$' }
          ]
        }
      }
    }
  },
  { if: { properties: { type: { enum: ['String', 'ExpandString'] } } }, then: { properties: { value: { type: 'string' } } } }
];

function settingWrite(properties: Record<string, unknown>, required: string[]) {
  return {
    type: 'object',
    properties: { ...properties, name: nonEmpty, type: { enum: ['DWord', 'QWord', 'String', 'ExpandString'] }, value: {} },
    required: [...required, 'name', 'type', 'value'],
    additionalProperties: false,
    allOf: valueByType
  };
}

const base = {
  id:                { type: 'string', pattern: '^[a-z][a-z0-9_]*$' },
  name:              nonEmpty,
  description:       nonEmpty,
  category:          { enum: ['System', 'Network', 'Graphics'] },
  requiresElevation: { type: 'boolean' }
};
const baseRequired = ['id', 'name', 'description', 'category', 'requiresElevation', 'kind'];

function kindSchema(kind: string, properties: Record<string, unknown>, required: string[]) {
  return {
    type: 'object',
    properties: { ...base, kind: { const: kind }, ...properties },
    required: [...baseRequired, ...required],
    additionalProperties: false
  };
}

const definitionSchema = {
  type: 'object',
  required: ['kind'],
  properties: { kind: { enum: ['settings', 'interfaceSettings', 'service', 'powerScheme', 'cacheClear'] } },
  allOf: [
    {
      if: { properties: { kind: { const: 'settings' } } },
      then: kindSchema('settings', {
        writes: {
          type: 'array',
          minItems: 1,
          items: settingWrite({ path: nonEmpty }, ['path'])
        }
      }, ['writes'])
    },
    {
      if: { properties: { kind: { const: 'interfaceSettings' } } },
      then: kindSchema('interfaceSettings', {
        parentPath: nonEmpty,
        writes: {
          type: 'array',
          minItems: 1,
          items: settingWrite({}, [])
        }
      }, ['parentPath', 'writes'])
    },
    {
      if: { properties: { kind: { const: 'service' } } },
      then: kindSchema('service', {
        serviceName: nonEmpty,
        mode: { enum: ['Automatic', 'Manual', 'Disabled'] },
        stop: { type: 'boolean' }
      }, ['serviceName', 'mode', 'stop'])
    },
    {
      if: { properties: { kind: { const: 'powerScheme' } } },
      then: kindSchema('powerScheme', {
        schemeGuid: { type: 'string', pattern: '^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$' }
      }, ['schemeGuid'])
    },
    {
      if: { properties: { kind: { const: 'cacheClear' } } },
      then: kindSchema('cacheClear', {
        paths: { type: 'array', minItems: 1, items: nonEmpty }
      }, ['paths'])
    }
  ]
};

const validateCatalog = ajv.compile<TweakDefinition[]>({
  type: 'array',
  minItems: 1,
  items: definitionSchema
});

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/** Validate raw definitions and build the catalog. Throws CatalogError. */
export function buildCatalog(definitions: unknown, source = '<inline>'): TweakCatalog {
  if (!validateCatalog(definitions)) {
    const violations = (validateCatalog.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
    throw new CatalogError(`Tweak catalog ${source} failed validation`, { source, violations });
  }
  return new TweakCatalog(definitions.map(buildTweak));
}

export class CatalogLoader {
  private readonly catalogFile: string;

  constructor(catalogFile?: string) {
    // Default to config/catalog.json relative to the project root (where package.json lives)
    this.catalogFile = catalogFile ?? path.resolve(process.cwd(), 'config', 'catalog.json');
  }

  /** Read and validate the catalog file. Call once at startup. */
  load(): TweakCatalog {
    if (!fs.existsSync(this.catalogFile)) {
      throw new CatalogError(`Tweak catalog not found: ${this.catalogFile}`, { file: this.catalogFile });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.catalogFile, 'utf-8'));
    } catch (e) {
      throw new CatalogError(
        `Tweak catalog ${this.catalogFile} is not valid JSON: ${errorMessage(e)}`,
        { file: this.catalogFile }
      );
    }

    const catalog = buildCatalog(raw, this.catalogFile);
    log.info({ file: this.catalogFile, total: catalog.size }, 'Tweak catalog loaded');
    return catalog;
  }
}
