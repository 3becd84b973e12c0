/**
 * Mapping Loader / Validator
 * Parses (and if needed repairs) mapping JSON, then validates it against the mapping contract
 */

import { z } from 'zod';
import { InvalidMappingError, MalformedInputError } from '../lib/error-handler';
import { repairJson } from './json-repair';
import { GenerationWarning, MappingDocument, STRATEGIES } from './types';

const derivedMetricSchema = z.object({
  numerator_code: z.string().min(1),
  denominator_code: z.string().min(1),
});

const columnMappingSchema = z.object({
  source_column: z.string().trim().min(1).default('UNMAPPED'),
  target_column: z.string().trim().min(1),
  transformation: z.string().nullish(),
  target_type: z.string().optional(),
  source_type: z.string().optional(),
  derived_metric: derivedMetricSchema.optional(),
  notes: z.string().nullish(),
});

const tableMappingSchema = z.object({
  source_table: z.string().trim().min(1),
  target_table: z.string().trim().min(1),
  column_mappings: z.array(columnMappingSchema).min(1),
  primary_key: z.array(z.string().trim().min(1)).default([]),
  strategy: z.enum(STRATEGIES).optional(),
  derived_metric: derivedMetricSchema.optional(),
  mapping_errors: z.array(z.object({
    error_type: z.string(),
    severity: z.string().optional(),
    target_column: z.string().optional(),
    message: z.string(),
  })).optional(),
});

const mappingDocumentSchema = z.object({
  mappings: z.array(tableMappingSchema),
});

/**
 * Canonical envelope is {"mapping": {"mappings": [...]}}; a bare {"mappings": [...]} is accepted too
 */
function unwrapEnvelope(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'mapping' in value) {
    return value.mapping;
  }
  return value;
}

export interface LoadedMapping {
  document: MappingDocument;
  warnings: GenerationWarning[];
}

function parseDiagnostic(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse mapping text, attempting a single repair pass on failure
 */
export function parseMappingText(text: string, allowRepair: boolean = true): { value: unknown; repaired: boolean } {
  try {
    return { value: JSON.parse(text), repaired: false };
  } catch (error) {
    const diagnostic = parseDiagnostic(error);
    if (!allowRepair) {
      throw new MalformedInputError(diagnostic, false);
    }

    try {
      return { value: JSON.parse(repairJson(text)), repaired: true };
    } catch {
      throw new MalformedInputError(diagnostic, true);
    }
  }
}

/**
 * Validate a parsed value as a mapping document
 */
export function validateMappingDocument(value: unknown): MappingDocument {
  const result = mappingDocumentSchema.safeParse(unwrapEnvelope(value));

  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new InvalidMappingError(issues);
  }

  const document: MappingDocument = result.data;

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const mapping of document.mappings) {
    if (seen.has(mapping.target_table)) {
      duplicates.push(`duplicate target_table '${mapping.target_table}'`);
    }
    seen.add(mapping.target_table);
  }
  if (duplicates.length > 0) {
    throw new InvalidMappingError(duplicates);
  }

  return document;
}

/**
 * Load a mapping document from raw text
 */
export function loadMappingDocument(text: string, allowRepair: boolean = true): LoadedMapping {
  const { value, repaired } = parseMappingText(text, allowRepair);
  const document = validateMappingDocument(value);

  const warnings: GenerationWarning[] = [];
  if (repaired) {
    warnings.push({
      kind: 'RepairedInput',
      message: 'The initial JSON was malformed and has been automatically repaired. ' +
        'Please review the generated SQL carefully, as it may be based on incomplete mapping rules.',
    });
  }

  return { document, warnings };
}
