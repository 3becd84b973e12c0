/**
 * Dependency Orderer
 *
 * Dimensions load first, facts second (they reference dimension keys), aggregates
 * last (they read the populated fact tables). Targets with none of the three
 * prefixes land in an explicit "other" tier after the aggregates.
 */

import { groupBy } from 'lodash';
import { TableMapping, tableBaseName } from './types';

export type Tier = 'dim' | 'fact' | 'agg' | 'other';

export const TIER_ORDER: readonly Tier[] = ['dim', 'fact', 'agg', 'other'];

const TIER_PREFIXES: ReadonlyArray<[string, Tier]> = [
  ['dim_', 'dim'],
  ['fact_', 'fact'],
  ['agg_', 'agg'],
];

export interface TieredMapping {
  tier: Tier;
  mapping: TableMapping;
}

export function classifyTier(targetTable: string): Tier {
  const baseName = tableBaseName(targetTable);
  for (const [prefix, tier] of TIER_PREFIXES) {
    if (baseName.startsWith(prefix)) return tier;
  }
  return 'other';
}

/**
 * Stable bucket sort by tier; document order is kept within each tier
 */
export function orderByTier(mappings: readonly TableMapping[]): TieredMapping[] {
  const buckets = groupBy(
    mappings.map(mapping => ({ tier: classifyTier(mapping.target_table), mapping })),
    entry => entry.tier
  );

  return TIER_ORDER.flatMap(tier => buckets[tier] ?? []);
}
