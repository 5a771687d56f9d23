/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for SoF records, plus the derived response
 * shape handed to the LLM as a Structured Outputs constraint.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { SoFRecord } from './types';

const SOF_RECORD_SCHEMA_FILE = 'sof_record.schema.json';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});

// Schema loading - lazy loaded on first use
let sofRecordSchema: SchemaObject | null = null;
let sofRecordValidator: ValidateFunction<SoFRecord> | null = null;

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      logger.debug('Loaded schema', { schema: schemaName, path: schemaPath });
      return schema;
    }
  }

  // No permissive fallback: a record that cannot be validated must not be returned
  throw new Error(`Schema file not found: ${schemaName} (searched ${possiblePaths.join(', ')})`);
}

function getSofRecordSchema(): SchemaObject {
  if (!sofRecordSchema) {
    sofRecordSchema = loadSchema(SOF_RECORD_SCHEMA_FILE);
  }
  return sofRecordSchema;
}

function getSofRecordValidator(): ValidateFunction<SoFRecord> {
  if (!sofRecordValidator) {
    sofRecordValidator = ajv.compile<SoFRecord>(getSofRecordSchema());
  }
  return sofRecordValidator;
}

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

/**
 * Validate a candidate SoF record against sof_record.schema.json
 */
export function validateSofRecord(data: unknown): ValidationResult<SoFRecord> {
  const validate = getSofRecordValidator();

  if (!validate(data)) {
    const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('SoFRecord validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true, value: data };
}

// ============================================================================
// Structured Outputs response shape
// ============================================================================

/** A JSON Schema node as plain data. */
export type SchemaNode = { [key: string]: unknown };

/**
 * OpenAI Structured Outputs json_schema descriptor
 */
export interface SofResponseFormat {
  name: string;
  strict: true;
  schema: SchemaNode;
}

// Keywords strict mode rejects or ignores
const STRICT_MODE_DROPPED_KEYWORDS = new Set(['$schema', '$id', 'title', 'minimum', 'maximum']);

function isSchemaNode(value: unknown): value is SchemaNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mapNodes(nodes: SchemaNode): SchemaNode {
  const mapped: SchemaNode = {};
  for (const [name, child] of Object.entries(nodes)) {
    if (isSchemaNode(child)) {
      mapped[name] = toStrictNode(child);
    }
  }
  return mapped;
}

/**
 * Strict mode wants every property listed as required. Optional properties in
 * the contract already admit null, so listing them keeps them optional in value.
 */
function toStrictNode(node: SchemaNode): SchemaNode {
  const strict: SchemaNode = {};

  for (const [key, value] of Object.entries(node)) {
    if (STRICT_MODE_DROPPED_KEYWORDS.has(key)) continue;

    if (key === 'properties' && isSchemaNode(value)) {
      strict.properties = mapNodes(value);
      strict.required = Object.keys(value);
      strict.additionalProperties = false;
    } else if (key === '$defs' && isSchemaNode(value)) {
      strict.$defs = mapNodes(value);
    } else if (key === 'items' && isSchemaNode(value)) {
      strict.items = toStrictNode(value);
    } else if (key === 'anyOf' && Array.isArray(value)) {
      strict.anyOf = value.filter(isSchemaNode).map(toStrictNode);
    } else if (key !== 'required') {
      strict[key] = value;
    }
  }

  return strict;
}

let sofResponseFormat: SofResponseFormat | null = null;

/**
 * Build the response shape constraint sent with every extraction and
 * adjudication request, derived from the same contract used for validation.
 */
export function buildSofResponseFormat(): SofResponseFormat {
  if (!sofResponseFormat) {
    sofResponseFormat = {
      name: 'sof_record',
      strict: true,
      schema: toStrictNode(getSofRecordSchema()),
    };
  }
  return sofResponseFormat;
}

// Re-export schemas for use in LLM prompts
export const schemas = {
  get sofRecord() {
    return getSofRecordSchema();
  },
};
