import { NO_MATCHING_SOURCE, Strategy, TableMapping, tableBaseName } from './types';

/**
 * Pick the SELECT-body shape for a table mapping.
 * The missing-source sentinel always wins; after it an explicit `strategy` on the
 * mapping, then the string heuristics.
 */
export function selectStrategy(mapping: TableMapping): Strategy {
  if (mapping.source_table.trim() === NO_MATCHING_SOURCE) return 'MISSING_SOURCE';
  if (mapping.strategy) return mapping.strategy;

  if (mapping.source_table.includes(',')) return 'UNION';
  if (tableBaseName(mapping.target_table).includes('agg_')) return 'PIVOT';
  return 'DIRECT';
}

export function splitSourceTables(sourceTable: string): string[] {
  return sourceTable
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);
}
