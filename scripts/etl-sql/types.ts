/**
 * Mapping Document Types
 * Shapes of the JSON mapping contract and of the generator's output
 */

export const NO_MATCHING_SOURCE = 'NO_MATCHING_SOURCE_TABLES';
export const UNMAPPED = 'UNMAPPED';
export const GENERATED = 'GENERATED';

export const STRATEGIES = ['DIRECT', 'UNION', 'PIVOT', 'MISSING_SOURCE'] as const;

export type Strategy = typeof STRATEGIES[number];

export interface DerivedMetric {
  numerator_code: string;
  denominator_code: string;
}

export interface UpstreamMappingError {
  error_type: string;
  severity?: string;
  target_column?: string;
  message: string;
}

export interface ColumnMapping {
  source_column: string;       // 'UNMAPPED' | 'GENERATED' | column name
  target_column: string;
  transformation?: string | null;
  target_type?: string;
  source_type?: string;
  derived_metric?: DerivedMetric;
  notes?: string | null;
}

export interface TableMapping {
  source_table: string;        // qualified name, comma-joined list, or NO_MATCHING_SOURCE_TABLES
  target_table: string;
  column_mappings: ColumnMapping[];
  primary_key: string[];
  strategy?: Strategy;
  derived_metric?: DerivedMetric;
  mapping_errors?: UpstreamMappingError[];
}

export interface MappingDocument {
  mappings: TableMapping[];
}

export type WarningKind = 'RepairedInput' | 'MissingSource' | 'UntieredTarget' | 'MappingError' | 'MergeFallback';

export interface GenerationWarning {
  kind: WarningKind;
  message: string;
  targetTable?: string;
}

export interface RenderedStatement {
  targetTable: string;
  strategy: Strategy;
  sqlText: string;
  warnings: GenerationWarning[];
}

export interface GenerationSummary {
  statementCount: number;
  byStrategy: Record<Strategy, number>;
  missingSourceTargets: string[];
  untieredTargets: string[];
  repairedInput: boolean;
  warningCount: number;
  requiresReview: boolean;
}

export interface GenerationResult {
  sqlText: string;
  warnings: GenerationWarning[];
  statements: RenderedStatement[];
  summary: GenerationSummary;
}

export type UntieredPolicy = 'render' | 'skip';

export interface GenerateOptions {
  idempotent?: boolean;
  allowRepair?: boolean;
  untieredTargets?: UntieredPolicy;
  defaults?: {
    stringLiteral?: string;
    dataSourceLiteral?: string;
  };
  pivot?: {
    keyColumn?: string;
    valueColumn?: string;
    derivedMetric?: DerivedMetric;
  };
}

/**
 * Options with every default filled in
 */
export interface ResolvedGenerateOptions {
  idempotent: boolean;
  allowRepair: boolean;
  untieredTargets: UntieredPolicy;
  defaults: {
    stringLiteral: string;
    dataSourceLiteral: string;
  };
  pivot: {
    keyColumn: string;
    valueColumn: string;
    derivedMetric: DerivedMetric;
  };
}

export const DEFAULT_GENERATE_OPTIONS: ResolvedGenerateOptions = {
  idempotent: false,
  allowRepair: true,
  untieredTargets: 'render',
  defaults: {
    stringLiteral: 'Default',
    dataSourceLiteral: 'World Bank Staging',
  },
  pivot: {
    keyColumn: 'indicator_code',
    valueColumn: 'numeric_value',
    derivedMetric: {
      numerator_code: 'NY.GDP.MKTP.CD',
      denominator_code: 'SP.POP.TOTL',
    },
  },
};

export function resolveOptions(options: GenerateOptions = {}): ResolvedGenerateOptions {
  const base = DEFAULT_GENERATE_OPTIONS;
  return {
    idempotent: options.idempotent ?? base.idempotent,
    allowRepair: options.allowRepair ?? base.allowRepair,
    untieredTargets: options.untieredTargets ?? base.untieredTargets,
    defaults: {
      stringLiteral: options.defaults?.stringLiteral ?? base.defaults.stringLiteral,
      dataSourceLiteral: options.defaults?.dataSourceLiteral ?? base.defaults.dataSourceLiteral,
    },
    pivot: {
      keyColumn: options.pivot?.keyColumn ?? base.pivot.keyColumn,
      valueColumn: options.pivot?.valueColumn ?? base.pivot.valueColumn,
      derivedMetric: options.pivot?.derivedMetric ?? base.pivot.derivedMetric,
    },
  };
}

/**
 * Final dot-separated segment of a qualified table name
 */
export function tableBaseName(qualifiedName: string): string {
  const parts = qualifiedName.split('.');
  return parts[parts.length - 1].trim();
}
