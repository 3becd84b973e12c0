/**
 * Column Expression Synthesizer
 *
 * Turns each ColumnMapping into a SELECT expression. Every column resolves to
 * exactly one of: an explicit transformation, a default literal, or a direct
 * reference to the source column.
 */

import { sortBy, uniq } from 'lodash';
import { InvalidMappingError } from '../lib/error-handler';
import {
  ColumnMapping,
  DerivedMetric,
  GENERATED,
  ResolvedGenerateOptions,
  TableMapping,
  UNMAPPED,
} from './types';

export interface ColumnExpression {
  expression: string;
  alias: string;
}

export interface PivotColumns {
  columns: ColumnExpression[];
  groupBy: string[];
}

export interface SelectContext {
  /** 'UNION' bodies fill unmapped text columns with the data-source literal */
  strategy: 'DIRECT' | 'UNION';
  /** Qualify source columns with this alias (MERGE source subqueries) */
  sourceAlias?: string;
  options: ResolvedGenerateOptions;
}

const DEFAULT_PREFIX = 'DEFAULT:';

const TEMPORAL_DEFAULTS: Record<string, string> = {
  TIMESTAMP: 'CURRENT_TIMESTAMP()',
  DATETIME: 'CURRENT_DATETIME()',
  DATE: 'CURRENT_DATE()',
};

const NUMERIC_TYPES = new Set(['INT64', 'INTEGER', 'INT', 'BIGINT', 'FLOAT64', 'FLOAT', 'NUMERIC', 'BIGNUMERIC', 'DECIMAL']);
const BOOLEAN_TYPES = new Set(['BOOL', 'BOOLEAN']);

/**
 * Quote a value as a SQL string literal
 */
export function sqlString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * First single-quoted substring, e.g. the indicator code in "... WHERE indicator_code = 'SP.POP.TOTL'"
 */
export function firstQuotedLiteral(text: string): string | null {
  const match = /'([^']*)'/.exec(text);
  return match ? match[1] : null;
}

function isUnmapped(column: ColumnMapping): boolean {
  if (column.source_column === UNMAPPED) return true;
  return column.source_column === GENERATED && !column.transformation?.trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Prefix bare occurrences of `columnName` with `alias.`, leaving quoted literals
 * and already-qualified references alone
 */
export function qualifyColumnTokens(expression: string, columnName: string, alias: string): string {
  const token = new RegExp(`(?<![\\w.\`])${escapeRegExp(columnName)}(?![\\w\`])`, 'g');
  return expression
    .split(/('(?:[^'\\]|\\.)*'|"(?:[^"\\]|\\.)*")/)
    .map((part, index) => (index % 2 === 1 ? part : part.replace(token, `${alias}.${columnName}`)))
    .join('');
}

/**
 * Default for an unmapped target column. A declared target_type decides when it
 * is known; otherwise the column name does ("created_at", "load_date" get a timestamp).
 */
export function defaultExpression(column: ColumnMapping, placeholder: string): string {
  const declared = column.target_type?.trim().toUpperCase().split('(')[0].trim();

  if (declared) {
    if (declared in TEMPORAL_DEFAULTS) return TEMPORAL_DEFAULTS[declared];
    if (NUMERIC_TYPES.has(declared)) return '0';
    if (BOOLEAN_TYPES.has(declared)) return 'FALSE';
    if (declared === 'STRING') return sqlString(placeholder);
  }

  const name = column.target_column.toLowerCase();
  if (name.includes('at') || name.includes('date')) {
    return 'CURRENT_TIMESTAMP()';
  }
  return sqlString(placeholder);
}

/**
 * Expression for one column of a DIRECT or UNION SELECT body
 */
export function selectExpression(column: ColumnMapping, context: SelectContext): ColumnExpression {
  const alias = column.target_column;
  const transformation = column.transformation?.trim();
  const placeholder = context.strategy === 'UNION'
    ? context.options.defaults.dataSourceLiteral
    : context.options.defaults.stringLiteral;

  if (transformation) {
    if (transformation.startsWith(DEFAULT_PREFIX)) {
      const value = transformation.slice(DEFAULT_PREFIX.length).trim();
      return { expression: value || defaultExpression(column, placeholder), alias };
    }

    if (transformation.includes('WHERE')) {
      const code = firstQuotedLiteral(transformation);
      if (code !== null) {
        return { expression: sqlString(code), alias };
      }
    }

    const namedSource = column.source_column !== UNMAPPED && column.source_column !== GENERATED;
    const expression = context.sourceAlias && namedSource
      ? qualifyColumnTokens(transformation, column.source_column, context.sourceAlias)
      : transformation;
    return { expression, alias };
  }

  if (isUnmapped(column)) {
    return { expression: defaultExpression(column, placeholder), alias };
  }

  const reference = context.sourceAlias
    ? `${context.sourceAlias}.${column.source_column}`
    : column.source_column;
  return { expression: reference, alias };
}

export function selectExpressions(mapping: TableMapping, context: SelectContext): ColumnExpression[] {
  return mapping.column_mappings.map(column => selectExpression(column, context));
}

function pivotValue(code: string, options: ResolvedGenerateOptions): string {
  const { keyColumn, valueColumn } = options.pivot;
  return `MAX(IF(${keyColumn} = ${sqlString(code)}, ${valueColumn}, NULL))`;
}

function resolveDerivedMetric(
  column: ColumnMapping,
  mapping: TableMapping,
  options: ResolvedGenerateOptions
): DerivedMetric {
  return column.derived_metric ?? mapping.derived_metric ?? options.pivot.derivedMetric;
}

/**
 * Expressions for a PIVOT body, plus the sorted GROUP BY key set
 */
export function pivotExpressions(mapping: TableMapping, options: ResolvedGenerateOptions): PivotColumns {
  const columns: ColumnExpression[] = [];
  const groupKeys: string[] = [];

  for (const column of mapping.column_mappings) {
    const alias = column.target_column;
    const transformation = column.transformation?.trim();

    if (transformation && transformation.includes('WHERE')) {
      const code = firstQuotedLiteral(transformation);
      if (code === null) {
        throw new InvalidMappingError([
          `${mapping.target_table}.${alias}: pivot filter has no quoted indicator code`
        ]);
      }
      columns.push({ expression: pivotValue(code, options), alias });
    } else if (transformation && transformation.startsWith(DEFAULT_PREFIX)) {
      const value = transformation.slice(DEFAULT_PREFIX.length).trim();
      columns.push({ expression: value || 'NULL', alias });
    } else if (isUnmapped(column)) {
      const metric = resolveDerivedMetric(column, mapping, options);
      const ratio = `SAFE_DIVIDE(${pivotValue(metric.numerator_code, options)}, ${pivotValue(metric.denominator_code, options)})`;
      columns.push({ expression: ratio, alias });
    } else {
      groupKeys.push(column.source_column);
      columns.push({ expression: column.source_column, alias });
    }
  }

  if (groupKeys.length === 0) {
    throw new InvalidMappingError([
      `${mapping.target_table}: pivot mapping needs at least one grouping column`
    ]);
  }

  return { columns, groupBy: sortBy(uniq(groupKeys)) };
}

export function formatColumn(column: ColumnExpression): string {
  return `${column.expression} AS ${column.alias}`;
}
