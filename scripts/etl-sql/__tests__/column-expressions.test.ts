/**
 * Unit Tests for the Column Expression Synthesizer
 */

import { InvalidMappingError } from '../../lib/error-handler';
import {
  defaultExpression,
  firstQuotedLiteral,
  pivotExpressions,
  qualifyColumnTokens,
  selectExpression,
  sqlString,
} from '../column-expressions';
import { ColumnMapping, TableMapping, resolveOptions } from '../types';

const options = resolveOptions();
const direct = { strategy: 'DIRECT' as const, options };
const union = { strategy: 'UNION' as const, options };
const merged = { strategy: 'DIRECT' as const, sourceAlias: 'S', options };

function column(source: string, target: string, extra: Partial<ColumnMapping> = {}): ColumnMapping {
  return { source_column: source, target_column: target, ...extra };
}

function pivotMapping(columns: ColumnMapping[], extra: Partial<TableMapping> = {}): TableMapping {
  return {
    source_table: 'target.fact_indicator_values',
    target_table: 'target.agg_country_year',
    column_mappings: columns,
    primary_key: ['country_key', 'year'],
    ...extra,
  };
}

const GDP = "MAX(IF(indicator_code = 'NY.GDP.MKTP.CD', numeric_value, NULL))";
const POP = "MAX(IF(indicator_code = 'SP.POP.TOTL', numeric_value, NULL))";

describe('helpers', () => {
  test('sqlString should escape quotes and backslashes', () => {
    expect(sqlString('World Bank Staging')).toBe("'World Bank Staging'");
    expect(sqlString("O'Brien")).toBe("'O\\'Brien'");
    expect(sqlString('a\\b')).toBe("'a\\\\b'");
  });

  test('firstQuotedLiteral should return the first quoted substring', () => {
    expect(firstQuotedLiteral("value WHERE indicator_code = 'SP.POP.TOTL' OR x = 'Y'")).toBe('SP.POP.TOTL');
    expect(firstQuotedLiteral('value WHERE x = 1')).toBeNull();
  });

  test('qualifyColumnTokens should only touch bare tokens outside literals', () => {
    expect(qualifyColumnTokens('CAST(year AS INT64)', 'year', 'S')).toBe('CAST(S.year AS INT64)');
    expect(qualifyColumnTokens("CONCAT(name, ' name')", 'name', 'S')).toBe("CONCAT(S.name, ' name')");
    expect(qualifyColumnTokens('year_start + src.year', 'year', 'S')).toBe('year_start + src.year');
    expect(qualifyColumnTokens('CONCAT(code, "code")', 'code', 'S')).toBe('CONCAT(S.code, "code")');
  });
});

describe('defaultExpression', () => {
  test('should use the naming convention without a declared type', () => {
    expect(defaultExpression(column('UNMAPPED', 'created_at'), 'Default')).toBe('CURRENT_TIMESTAMP()');
    expect(defaultExpression(column('UNMAPPED', 'load_date'), 'Default')).toBe('CURRENT_TIMESTAMP()');
    expect(defaultExpression(column('UNMAPPED', 'country_name'), 'Default')).toBe("'Default'");
  });

  test('should follow a declared target_type', () => {
    expect(defaultExpression(column('UNMAPPED', 'is_active', { target_type: 'BOOL' }), 'Default')).toBe('FALSE');
    expect(defaultExpression(column('UNMAPPED', 'row_count', { target_type: 'INT64' }), 'Default')).toBe('0');
    expect(defaultExpression(column('UNMAPPED', 'amount', { target_type: 'NUMERIC(10,2)' }), 'Default')).toBe('0');
    expect(defaultExpression(column('UNMAPPED', 'load_day', { target_type: 'date' }), 'Default')).toBe('CURRENT_DATE()');
    expect(defaultExpression(column('UNMAPPED', 'updated_at', { target_type: 'STRING' }), 'Default')).toBe("'Default'");
  });
});

describe('selectExpression', () => {
  test('should use a transformation verbatim', () => {
    const result = selectExpression(column('year', 'year', { transformation: 'CAST(year AS INT64)' }), direct);
    expect(result).toEqual({ expression: 'CAST(year AS INT64)', alias: 'year' });
  });

  test('should alias the source column inside a transformation for MERGE sources', () => {
    const result = selectExpression(column('year', 'year', { transformation: 'CAST(year AS INT64)' }), merged);
    expect(result.expression).toBe('CAST(S.year AS INT64)');
  });

  test('should turn an indicator filter into a constant', () => {
    const col = column('indicator_code', 'indicator_code', {
      transformation: "indicator_code WHERE indicator_code = 'SP.POP.TOTL'",
    });
    expect(selectExpression(col, direct).expression).toBe("'SP.POP.TOTL'");
  });

  test('should strip the DEFAULT: prefix of generated columns', () => {
    const col = column('GENERATED', 'rating_agency', { transformation: "DEFAULT: 'UNKNOWN'" });
    expect(selectExpression(col, direct).expression).toBe("'UNKNOWN'");
  });

  test('should default unmapped columns per strategy', () => {
    const col = column('UNMAPPED', 'source_system');
    expect(selectExpression(col, direct).expression).toBe("'Default'");
    expect(selectExpression(col, union).expression).toBe("'World Bank Staging'");
  });

  test('should treat GENERATED without a transformation as unmapped', () => {
    expect(selectExpression(column('GENERATED', 'loaded_at'), direct).expression).toBe('CURRENT_TIMESTAMP()');
  });

  test('should reference the source column directly, aliased for MERGE sources', () => {
    const col = column('country_code', 'country_key');
    expect(selectExpression(col, direct)).toEqual({ expression: 'country_code', alias: 'country_key' });
    expect(selectExpression(col, merged)).toEqual({ expression: 'S.country_code', alias: 'country_key' });
  });
});

describe('pivotExpressions', () => {
  test('should pivot indicator filters, derive the ratio and group by the rest', () => {
    const result = pivotExpressions(pivotMapping([
      column('country_key', 'country_key'),
      column('year', 'year'),
      column('numeric_value', 'gdp_usd', { transformation: "numeric_value WHERE indicator_code = 'NY.GDP.MKTP.CD'" }),
      column('numeric_value', 'population', { transformation: "numeric_value WHERE indicator_code = 'SP.POP.TOTL'" }),
      column('UNMAPPED', 'gdp_per_capita'),
    ]), options);

    expect(result.columns).toEqual([
      { expression: 'country_key', alias: 'country_key' },
      { expression: 'year', alias: 'year' },
      { expression: GDP, alias: 'gdp_usd' },
      { expression: POP, alias: 'population' },
      { expression: `SAFE_DIVIDE(${GDP}, ${POP})`, alias: 'gdp_per_capita' },
    ]);
    expect(result.groupBy).toEqual(['country_key', 'year']);
  });

  test('should sort the grouping set', () => {
    const result = pivotExpressions(pivotMapping([column('b', 'b'), column('a', 'a'), column('b', 'b_again')]), options);
    expect(result.groupBy).toEqual(['a', 'b']);
  });

  test('should take ratio operands from the column, then the table', () => {
    const mapping = pivotMapping(
      [
        column('country_key', 'country_key'),
        column('UNMAPPED', 'ratio_table'),
        column('UNMAPPED', 'ratio_column', { derived_metric: { numerator_code: 'C1', denominator_code: 'C2' } }),
      ],
      { derived_metric: { numerator_code: 'T1', denominator_code: 'T2' } }
    );

    const [, fromTable, fromColumn] = pivotExpressions(mapping, options).columns;

    expect(fromTable.expression).toBe(
      "SAFE_DIVIDE(MAX(IF(indicator_code = 'T1', numeric_value, NULL)), MAX(IF(indicator_code = 'T2', numeric_value, NULL)))"
    );
    expect(fromColumn.expression).toBe(
      "SAFE_DIVIDE(MAX(IF(indicator_code = 'C1', numeric_value, NULL)), MAX(IF(indicator_code = 'C2', numeric_value, NULL)))"
    );
  });

  test('should use configured key and value columns', () => {
    const custom = resolveOptions({ pivot: { keyColumn: 'metric', valueColumn: 'amount' } });
    const result = pivotExpressions(pivotMapping([
      column('country_key', 'country_key'),
      column('amount', 'revenue', { transformation: "amount WHERE metric = 'REV'" }),
    ]), custom);

    expect(result.columns[1].expression).toBe("MAX(IF(metric = 'REV', amount, NULL))");
  });

  test('should reject a pivot without grouping columns', () => {
    const mapping = pivotMapping([column('UNMAPPED', 'gdp_per_capita')]);
    expect(() => pivotExpressions(mapping, options)).toThrow(InvalidMappingError);
  });

  test('should reject an indicator filter without a quoted code', () => {
    const mapping = pivotMapping([
      column('country_key', 'country_key'),
      column('numeric_value', 'gdp_usd', { transformation: 'numeric_value WHERE indicator_code = code' }),
    ]);
    expect(() => pivotExpressions(mapping, options)).toThrow(InvalidMappingError);
  });
});
