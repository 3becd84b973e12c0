/**
 * ETL SQL Generator
 * =================
 * Converts a JSON mapping document into an ordered SQL script.
 *
 * Pure and synchronous: no I/O, no logging, no shared state. Statements are
 * emitted in tier order (dim → fact → agg → other); the order is the only
 * guarantee that later tiers read already-populated tables.
 */

import { GenerationReport } from './generation-report';
import { loadMappingDocument } from './mapping-loader';
import { SCRIPT_BANNER, STATEMENT_DELIMITER, renderStatement } from './statement-renderer';
import { selectStrategy } from './strategy-selector';
import { orderByTier } from './tier-orderer';
import {
  GenerateOptions,
  GenerationResult,
  MappingDocument,
  ResolvedGenerateOptions,
  resolveOptions,
} from './types';

const REPAIRED_BANNER =
  '-- WARNING: The initial JSON was malformed and has been automatically repaired. ' +
  'Please review the generated SQL carefully, as it may be based on incomplete mapping rules.';

/**
 * Render every mapping of an already-validated document into `report`
 */
export function renderDocument(
  document: MappingDocument,
  options: ResolvedGenerateOptions,
  report: GenerationReport
): void {
  for (const { tier, mapping } of orderByTier(document.mappings)) {
    if (tier === 'other') {
      const skipped = options.untieredTargets === 'skip';
      report.addWarning({
        kind: 'UntieredTarget',
        targetTable: mapping.target_table,
        message: skipped
          ? `'${mapping.target_table}' has no dim_/fact_/agg_ prefix and was skipped`
          : `'${mapping.target_table}' has no dim_/fact_/agg_ prefix; rendered after the aggregate tier`,
      });
      if (skipped) continue;
    }

    report.addStatement(renderStatement(mapping, selectStrategy(mapping), options));
  }
}

/**
 * Assemble the final script text from a finished report
 */
export function assembleScript(report: GenerationReport): string {
  const header = report.summary().repairedInput ? `${SCRIPT_BANNER}\n${REPAIRED_BANNER}\n` : `${SCRIPT_BANNER}\n`;
  const blocks = report.getStatements().map(statement => `${statement.sqlText}\n${STATEMENT_DELIMITER}\n`);
  return [header, ...blocks].join('\n');
}

/**
 * Generate the SQL script for a mapping document given as text
 *
 * @throws MalformedInputError when the text cannot be parsed, even after repair
 * @throws InvalidMappingError when the document breaks the mapping contract
 */
export function generate(mappingDocumentText: string, options: GenerateOptions = {}): GenerationResult {
  const resolved = resolveOptions(options);
  const { document, warnings } = loadMappingDocument(mappingDocumentText, resolved.allowRepair);

  const report = new GenerationReport();
  report.addWarnings(warnings);
  renderDocument(document, resolved, report);

  return {
    sqlText: assembleScript(report),
    warnings: report.getWarnings(),
    statements: report.getStatements(),
    summary: report.summary(),
  };
}
