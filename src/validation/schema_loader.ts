/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { SchemaObject } from 'ajv';

export type SchemaName = 'rate_table.v1' | 'quote_chart.v1' | 'dashboard_view.v1';

const schemaCache = new Map<string, SchemaObject>();

export function loadSchema(schemaName: SchemaName, projectRoot: string = process.cwd()): SchemaObject {
  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const cached = schemaCache.get(schemaPath);
  if (cached) {
    return cached;
  }

  const parsed: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Schema ${schemaName} is not a JSON object: ${schemaPath}`);
  }

  const schema: SchemaObject = { ...parsed };
  schemaCache.set(schemaPath, schema);
  return schema;
}
