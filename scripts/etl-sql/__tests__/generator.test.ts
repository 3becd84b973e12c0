/**
 * Tests for the ETL SQL Generator
 *
 * Covers ordering, strategy fan-out, repair handling and the full script layout
 */

import * as fs from 'fs';
import * as path from 'path';
import { MalformedInputError } from '../../lib/error-handler';
import { generate } from '../generator';
import { SCRIPT_BANNER, STATEMENT_DELIMITER } from '../statement-renderer';
import { TableMapping } from '../types';

function documentText(mappings: TableMapping[], pretty: boolean = false): string {
  return JSON.stringify({ mapping: { mappings } }, null, pretty ? 2 : undefined);
}

function simple(target: string, source: string = 'staging.src'): TableMapping {
  return {
    source_table: source,
    target_table: target,
    column_mappings: [
      { source_column: 'id', target_column: 'id' },
      { source_column: 'value', target_column: 'value' },
    ],
    primary_key: ['id'],
  };
}

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

const dimCountry: TableMapping = {
  source_table: 'staging.countries',
  target_table: 'target.dim_country',
  column_mappings: [{ source_column: 'country_code', target_column: 'country_key' }],
  primary_key: ['country_key'],
};

describe('generate', () => {
  test('should render the end-to-end dimension example', () => {
    const result = generate(documentText([dimCountry]));

    expect(result.sqlText).toContain('INSERT INTO `target.dim_country` (country_key)');
    expect(result.sqlText).toContain('SELECT country_code AS country_key');
    expect(result.sqlText).toContain('FROM `staging.countries`');
    expect(result.warnings).toEqual([]);
  });

  test('should lay out the script as banner, statements and delimiters', () => {
    const result = generate(documentText([dimCountry]));

    expect(result.sqlText).toBe(
      `${SCRIPT_BANNER}\n\n${result.statements[0].sqlText}\n${STATEMENT_DELIMITER}\n`
    );
  });

  test('should be byte-identical across runs', () => {
    const text = documentText([simple('t.fact_a', 's.a, s.b'), dimCountry, simple('t.agg_a')]);
    expect(generate(text).sqlText).toBe(generate(text).sqlText);
    expect(generate(text, { idempotent: true }).sqlText).toBe(generate(text, { idempotent: true }).sqlText);
  });

  test('should emit dim before fact before agg, keeping input order within a tier', () => {
    const text = documentText([
      simple('t.agg_one'),
      simple('t.fact_one'),
      simple('t.dim_one'),
      simple('t.dim_two'),
      simple('t.fact_two'),
    ]);

    const result = generate(text);

    expect(result.statements.map(statement => statement.targetTable)).toEqual([
      't.dim_one', 't.dim_two', 't.fact_one', 't.fact_two', 't.agg_one',
    ]);
    expect(result.sqlText.indexOf('`t.dim_two`')).toBeLessThan(result.sqlText.indexOf('`t.fact_one`'));
  });

  test('should keep every mapped column, in order, in the column list and the aliases', () => {
    const mapping: TableMapping = {
      source_table: 'staging.people',
      target_table: 'target.dim_person',
      column_mappings: [
        { source_column: 'pid', target_column: 'person_key' },
        { source_column: 'first', target_column: 'first_name' },
        { source_column: 'last', target_column: 'last_name' },
      ],
      primary_key: ['person_key'],
    };

    const result = generate(documentText([mapping]));

    expect(result.sqlText).toContain('INSERT INTO `target.dim_person` (person_key, first_name, last_name)');
    expect(result.sqlText).toContain('SELECT pid AS person_key, first AS first_name, last AS last_name');
  });

  test('should fan a two-source mapping out into two SELECT blocks', () => {
    const mapping: TableMapping = {
      source_table: 't1, t2',
      target_table: 'target.fact_values',
      column_mappings: [
        { source_column: 'v', target_column: 'v' },
        { source_column: 'UNMAPPED', target_column: 'origin' },
      ],
      primary_key: ['v'],
    };

    const { sqlText, statements } = generate(documentText([mapping]));

    expect(statements[0].strategy).toBe('UNION');
    expect(countOccurrences(sqlText, 'UNION ALL')).toBe(1);
    expect(sqlText).toContain("SELECT v AS v, 'World Bank Staging' AS origin FROM `t1`\nUNION ALL\nSELECT v AS v, 'World Bank Staging' AS origin FROM `t2`;");
  });

  test('should render a placeholder for the missing-source sentinel even with an explicit strategy', () => {
    const mapping: TableMapping = {
      source_table: 'NO_MATCHING_SOURCE_TABLES',
      target_table: 't.dim_x',
      strategy: 'DIRECT',
      column_mappings: [{ source_column: 'a', target_column: 'a' }],
      primary_key: ['a'],
    };

    const { sqlText, statements, summary } = generate(documentText([mapping]));

    expect(statements[0].strategy).toBe('MISSING_SOURCE');
    expect(sqlText).toContain('-- INSERT INTO `t.dim_x` (a)');
    expect(sqlText).not.toContain('FROM `NO_MATCHING_SOURCE_TABLES`');
    expect(summary.missingSourceTargets).toEqual(['t.dim_x']);
    expect(summary.requiresReview).toBe(true);
  });

  test('should leave double-quoted literals alone when aliasing a merge source', () => {
    const mapping: TableMapping = {
      source_table: 's.codes',
      target_table: 't.dim_code',
      column_mappings: [{ source_column: 'code', target_column: 'k', transformation: 'CONCAT(code, "code")' }],
      primary_key: ['k'],
    };

    const { sqlText } = generate(documentText([mapping]), { idempotent: true });

    expect(sqlText).toContain('  SELECT CONCAT(S.code, "code") AS k\n  FROM `s.codes` AS S\n');
  });

  test('should group pivots by the sorted grouping set', () => {
    const mapping: TableMapping = {
      source_table: 'target.fact_values',
      target_table: 'target.agg_values',
      column_mappings: [
        { source_column: 'b', target_column: 'b' },
        { source_column: 'a', target_column: 'a' },
      ],
      primary_key: ['a', 'b'],
    };

    expect(generate(documentText([mapping])).sqlText).toContain('GROUP BY a, b;');
  });

  test('should render a warning placeholder for a missing source', () => {
    const mapping: TableMapping = {
      ...simple('target.dim_rating', 'NO_MATCHING_SOURCE_TABLES'),
      column_mappings: [{ source_column: 'GENERATED', target_column: 'rating_id', transformation: 'DEFAULT: 0' }],
    };

    const result = generate(documentText([mapping]));

    expect(result.sqlText).toContain("-- WARNING: No source table found for target 'target.dim_rating'.");
    expect(result.sqlText).toContain('-- INSERT INTO `target.dim_rating` (rating_id)');
    expect(result.summary.missingSourceTargets).toEqual(['target.dim_rating']);
    expect(result.summary.requiresReview).toBe(true);
  });

  test('should repair a document missing its final brace and say so', () => {
    const truncated = documentText([dimCountry], true).slice(0, -1);

    const result = generate(truncated);

    expect(result.summary.repairedInput).toBe(true);
    expect(result.warnings.map(warning => warning.kind)).toEqual(['RepairedInput']);
    expect(result.sqlText.startsWith(`${SCRIPT_BANNER}\n-- WARNING: The initial JSON was malformed`)).toBe(true);
    expect(result.sqlText).toContain('INSERT INTO `target.dim_country` (country_key)');
  });

  test('should fail on two unrelated structural defects', () => {
    const broken = '{"mapping": {"mappings": [{"source_table" "s.a"}]';
    expect(() => generate(broken)).toThrow(MalformedInputError);
  });

  test('should fail without repairing when repair is disabled', () => {
    const truncated = documentText([dimCountry], true).slice(0, -1);
    expect(() => generate(truncated, { allowRepair: false })).toThrow(MalformedInputError);
  });

  test('should render untiered targets last with a warning', () => {
    const result = generate(documentText([simple('t.lookup_codes'), simple('t.dim_one')]));

    expect(result.statements.map(statement => statement.targetTable)).toEqual(['t.dim_one', 't.lookup_codes']);
    expect(result.summary.untieredTargets).toEqual(['t.lookup_codes']);
  });

  test('should skip untiered targets when asked, still reporting them', () => {
    const result = generate(documentText([simple('t.lookup_codes'), simple('t.dim_one')]), { untieredTargets: 'skip' });

    expect(result.statements.map(statement => statement.targetTable)).toEqual(['t.dim_one']);
    expect(result.warnings).toEqual([{
      kind: 'UntieredTarget',
      targetTable: 't.lookup_codes',
      message: "'t.lookup_codes' has no dim_/fact_/agg_ prefix and was skipped",
    }]);
  });

  test('should render only the banner for an empty document', () => {
    const result = generate(documentText([]));
    expect(result.sqlText).toBe(`${SCRIPT_BANNER}\n`);
    expect(result.summary.statementCount).toBe(0);
  });
});

describe('generate with the sample mapping', () => {
  const sample = fs.readFileSync(path.join(__dirname, '../../../samples/mapping_rules.json'), 'utf-8');

  test('should order and classify every table', () => {
    const result = generate(sample);

    expect(result.statements.map(statement => `${statement.strategy} ${statement.targetTable}`)).toEqual([
      'DIRECT target.dim_country',
      'MISSING_SOURCE target.dim_risk_rating',
      'UNION target.fact_indicator_values',
      'PIVOT target.agg_country_year',
    ]);
    expect(result.summary.byStrategy).toEqual({ DIRECT: 1, UNION: 1, PIVOT: 1, MISSING_SOURCE: 1 });
    expect(result.warnings.map(warning => warning.kind)).toEqual(['MappingError', 'MissingSource']);
  });

  test('should produce one MERGE per sourced table in idempotent mode', () => {
    const { sqlText } = generate(sample, { idempotent: true });

    expect(countOccurrences(sqlText, 'MERGE `')).toBe(3);
    expect(sqlText).toContain('SELECT S.country_code AS country_key, CAST(S.year AS INT64) AS year');
    expect(sqlText).toContain("'World Bank Staging' AS source_system, CURRENT_TIMESTAMP() AS loaded_at FROM `staging.indicator_gdp` AS S");
    expect(countOccurrences(sqlText, STATEMENT_DELIMITER)).toBe(4);
  });
});
