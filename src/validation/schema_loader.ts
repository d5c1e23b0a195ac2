/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { AnySchemaObject } from 'ajv';

const schemaDir = fileURLToPath(new URL('../../schemas/', import.meta.url));
const schemaCache = new Map<string, AnySchemaObject>();

export function loadSchema(schemaName: string): AnySchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) return cached;

  const schemaJson = readFileSync(`${schemaDir}${schemaName}.schema.json`, 'utf-8');
  const schema: AnySchemaObject = JSON.parse(schemaJson);

  schemaCache.set(schemaName, schema);
  return schema;
}
