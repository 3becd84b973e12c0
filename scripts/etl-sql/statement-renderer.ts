/**
 * Statement Renderer
 * Assembles INSERT / MERGE text for one table mapping
 */

import {
  ColumnExpression,
  formatColumn,
  pivotExpressions,
  selectExpressions,
} from './column-expressions';
import { splitSourceTables } from './strategy-selector';
import {
  GenerationWarning,
  RenderedStatement,
  ResolvedGenerateOptions,
  Strategy,
  TableMapping,
} from './types';

export const STATEMENT_DELIMITER = '-- ------------------------------------------------------------------';

export const SCRIPT_BANNER = [
  '-- ####################################################',
  '-- #          Generated ETL SQL Script                #',
  '-- ####################################################',
].join('\n');

const MERGE_SOURCE_ALIAS = 'S';
const MERGE_TARGET_ALIAS = 'T';

export function quoteTable(name: string): string {
  return `\`${name.replace(/`/g, '').trim()}\``;
}

function targetColumns(mapping: TableMapping): string[] {
  return mapping.column_mappings.map(column => column.target_column);
}

function selectLine(columns: ColumnExpression[]): string {
  return `SELECT ${columns.map(formatColumn).join(', ')}`;
}

/**
 * A SELECT body, without the trailing semicolon
 */
interface SelectBody {
  lines: string[];
  description: string;
}

function directBody(mapping: TableMapping, options: ResolvedGenerateOptions, sourceAlias?: string): SelectBody {
  const source = mapping.source_table.trim();
  const columns = selectExpressions(mapping, { strategy: 'DIRECT', sourceAlias, options });
  const from = sourceAlias ? `FROM ${quoteTable(source)} AS ${sourceAlias}` : `FROM ${quoteTable(source)}`;

  return {
    lines: [selectLine(columns), from],
    description: `from '${source}'`,
  };
}

function unionBody(mapping: TableMapping, options: ResolvedGenerateOptions, sourceAlias?: string): SelectBody {
  const sources = splitSourceTables(mapping.source_table);
  const columns = selectExpressions(mapping, { strategy: 'UNION', sourceAlias, options });
  const lines: string[] = [];

  sources.forEach((source, index) => {
    const from = sourceAlias ? `FROM ${quoteTable(source)} AS ${sourceAlias}` : `FROM ${quoteTable(source)}`;
    if (index > 0) lines.push('UNION ALL');
    lines.push(`${selectLine(columns)} ${from}`);
  });

  return {
    lines,
    description: `by UNIONing ${sources.length} sources: ${sources.join(', ')}`,
  };
}

function pivotBody(mapping: TableMapping, options: ResolvedGenerateOptions): SelectBody {
  const source = splitSourceTables(mapping.source_table)[0] ?? mapping.source_table.trim();
  const { columns, groupBy } = pivotExpressions(mapping, options);

  return {
    lines: [selectLine(columns), `FROM ${quoteTable(source)}`, `GROUP BY ${groupBy.join(', ')}`],
    description: `by PIVOTING from '${source}'`,
  };
}

function buildBody(
  strategy: Exclude<Strategy, 'MISSING_SOURCE'>,
  mapping: TableMapping,
  options: ResolvedGenerateOptions,
  sourceAlias?: string
): SelectBody {
  switch (strategy) {
    case 'UNION':
      return unionBody(mapping, options, sourceAlias);
    case 'PIVOT':
      return pivotBody(mapping, options);
    case 'DIRECT':
      return directBody(mapping, options, sourceAlias);
  }
}

function renderInsert(mapping: TableMapping, body: SelectBody): string {
  return [
    `-- Populating '${mapping.target_table}' ${body.description}`,
    `INSERT INTO ${quoteTable(mapping.target_table)} (${targetColumns(mapping).join(', ')})`,
    ...body.lines,
  ].join('\n') + ';';
}

function renderMerge(mapping: TableMapping, body: SelectBody): string {
  const t = MERGE_TARGET_ALIAS;
  const s = MERGE_SOURCE_ALIAS;
  const columns = targetColumns(mapping);

  const onClause = mapping.primary_key.map(key => `${t}.${key} = ${s}.${key}`).join(' AND ');
  const updates = columns.map(column => `${t}.${column} = ${s}.${column}`).join(', ');
  const values = columns.map(column => `${s}.${column}`).join(', ');

  return [
    `-- Merging into '${mapping.target_table}' ${body.description} (idempotent)`,
    `MERGE ${quoteTable(mapping.target_table)} AS ${t}`,
    'USING (',
    ...body.lines.map(line => `  ${line}`),
    `) AS ${s}`,
    `ON ${onClause}`,
    `WHEN MATCHED THEN UPDATE SET ${updates}`,
    `WHEN NOT MATCHED THEN INSERT (${columns.join(', ')}) VALUES (${values});`,
  ].join('\n');
}

function renderMissingSource(mapping: TableMapping): string {
  return [
    `-- WARNING: No source table found for target '${mapping.target_table}'.`,
    '-- Please define the source and complete the query below.',
    `-- INSERT INTO ${quoteTable(mapping.target_table)} (${targetColumns(mapping).join(', ')})`,
    '-- SELECT ... ;',
  ].join('\n');
}

/**
 * Render one table mapping. Upstream mapping_errors ride along as warnings.
 */
export function renderStatement(
  mapping: TableMapping,
  strategy: Strategy,
  options: ResolvedGenerateOptions
): RenderedStatement {
  const warnings: GenerationWarning[] = (mapping.mapping_errors ?? []).map(error => ({
    kind: 'MappingError',
    targetTable: mapping.target_table,
    message: `${error.severity ?? 'WARNING'} ${error.error_type}: ${error.message}`,
  }));

  if (strategy === 'MISSING_SOURCE') {
    warnings.push({
      kind: 'MissingSource',
      targetTable: mapping.target_table,
      message: `No source table found for target '${mapping.target_table}'; a placeholder was rendered`,
    });
    return { targetTable: mapping.target_table, strategy, sqlText: renderMissingSource(mapping), warnings };
  }

  let sqlText: string;
  if (options.idempotent && mapping.primary_key.length > 0) {
    const alias = strategy === 'PIVOT' ? undefined : MERGE_SOURCE_ALIAS;
    sqlText = renderMerge(mapping, buildBody(strategy, mapping, options, alias));
  } else {
    if (options.idempotent) {
      warnings.push({
        kind: 'MergeFallback',
        targetTable: mapping.target_table,
        message: `No primary_key for '${mapping.target_table}'; rendered a plain INSERT instead of a MERGE`,
      });
    }
    sqlText = renderInsert(mapping, buildBody(strategy, mapping, options));
  }

  return { targetTable: mapping.target_table, strategy, sqlText, warnings };
}
