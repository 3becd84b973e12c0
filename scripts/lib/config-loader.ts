import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { GenerateOptions, UntieredPolicy } from '../etl-sql/types';

export interface GeneratorConfig {
  input: {
    mappingPath: string;
  };
  output: {
    sqlPath: string;
  };
  generation: {
    idempotent: boolean;
    allowRepair: boolean;
    untieredTargets: UntieredPolicy;
  };
  defaults: {
    stringLiteral: string;      // 'Default'
    dataSourceLiteral: string;  // 'World Bank Staging'
  };
  pivot: {
    keyColumn: string;
    valueColumn: string;
    derivedMetric: {
      numeratorCode: string;
      denominatorCode: string;
    };
  };
  execution: {
    dataset: string;
    datasetPlaceholder: string;
  };
}

/**
 * Partial config as it may appear in appsettings.json or in overrides
 */
export interface GeneratorConfigOverrides {
  input?: Partial<GeneratorConfig['input']>;
  output?: Partial<GeneratorConfig['output']>;
  generation?: Partial<GeneratorConfig['generation']>;
  defaults?: Partial<GeneratorConfig['defaults']>;
  pivot?: Partial<Omit<GeneratorConfig['pivot'], 'derivedMetric'>> & {
    derivedMetric?: Partial<GeneratorConfig['pivot']['derivedMetric']>;
  };
  execution?: Partial<GeneratorConfig['execution']>;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['true', '1', 'yes'].includes(value.toLowerCase());
}

function parseUntieredPolicy(value: string | undefined): UntieredPolicy | undefined {
  if (value === 'render' || value === 'skip') return value;
  return undefined;
}

const fileConfigSchema = z.object({
  input: z.object({ mappingPath: z.string() }).partial().optional(),
  output: z.object({ sqlPath: z.string() }).partial().optional(),
  generation: z.object({
    idempotent: z.boolean(),
    allowRepair: z.boolean(),
    untieredTargets: z.enum(['render', 'skip']),
  }).partial().optional(),
  defaults: z.object({
    stringLiteral: z.string(),
    dataSourceLiteral: z.string(),
  }).partial().optional(),
  pivot: z.object({
    keyColumn: z.string(),
    valueColumn: z.string(),
    derivedMetric: z.object({
      numeratorCode: z.string(),
      denominatorCode: z.string(),
    }).partial(),
  }).partial().optional(),
  execution: z.object({
    dataset: z.string(),
    datasetPlaceholder: z.string(),
  }).partial().optional(),
});

function readFileConfig(configPath: string): GeneratorConfigOverrides {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  try {
    const parsed = fileConfigSchema.safeParse(JSON.parse(fs.readFileSync(configPath, 'utf-8')));
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      console.warn(`⚠️  Warning: Ignoring invalid ${path.basename(configPath)}: ${issues}`);
      return {};
    }
    return parsed.data;
  } catch (error) {
    console.warn(`⚠️  Warning: Failed to parse ${path.basename(configPath)}: ${error}`);
    return {};
  }
}

/**
 * Load generator configuration from appsettings.json and environment variables
 *
 * Priority:
 * 1. Overrides (passed as parameter, e.g. from command-line flags)
 * 2. Environment variables
 * 3. appsettings.json
 * 4. Default values
 */
export function loadConfig(
  overrides?: GeneratorConfigOverrides,
  configPath: string = path.join(process.cwd(), 'appsettings.json')
): GeneratorConfig {
  const fileConfig = readFileConfig(configPath);
  const env = process.env;

  const config: GeneratorConfig = {
    input: {
      mappingPath: env.MAPPING_PATH || fileConfig.input?.mappingPath || 'mapping_rules.json',
    },
    output: {
      sqlPath: env.OUTPUT_SQL_PATH || fileConfig.output?.sqlPath || 'generated_etl.sql',
    },
    generation: {
      idempotent: parseBoolean(env.ETL_IDEMPOTENT) ?? fileConfig.generation?.idempotent ?? false,
      allowRepair: parseBoolean(env.ETL_ALLOW_REPAIR) ?? fileConfig.generation?.allowRepair ?? true,
      untieredTargets: parseUntieredPolicy(env.ETL_UNTIERED_TARGETS) ?? fileConfig.generation?.untieredTargets ?? 'render',
    },
    defaults: {
      stringLiteral: env.DEFAULT_STRING_LITERAL || fileConfig.defaults?.stringLiteral || 'Default',
      dataSourceLiteral: env.DEFAULT_DATA_SOURCE || fileConfig.defaults?.dataSourceLiteral || 'World Bank Staging',
    },
    pivot: {
      keyColumn: env.PIVOT_KEY_COLUMN || fileConfig.pivot?.keyColumn || 'indicator_code',
      valueColumn: env.PIVOT_VALUE_COLUMN || fileConfig.pivot?.valueColumn || 'numeric_value',
      derivedMetric: {
        numeratorCode: env.DERIVED_NUMERATOR_CODE || fileConfig.pivot?.derivedMetric?.numeratorCode || 'NY.GDP.MKTP.CD',
        denominatorCode: env.DERIVED_DENOMINATOR_CODE || fileConfig.pivot?.derivedMetric?.denominatorCode || 'SP.POP.TOTL',
      },
    },
    execution: {
      dataset: env.TARGET_DATASET || fileConfig.execution?.dataset || '',
      datasetPlaceholder: env.DATASET_PLACEHOLDER || fileConfig.execution?.datasetPlaceholder || 'your_dataset_name',
    },
  };

  // Apply overrides
  if (overrides) {
    Object.assign(config.input, overrides.input);
    Object.assign(config.output, overrides.output);
    Object.assign(config.generation, overrides.generation);
    Object.assign(config.defaults, overrides.defaults);
    Object.assign(config.execution, overrides.execution);
    if (overrides.pivot) {
      const { derivedMetric, ...pivot } = overrides.pivot;
      Object.assign(config.pivot, pivot);
      Object.assign(config.pivot.derivedMetric, derivedMetric);
    }
  }

  return config;
}

/**
 * Validate configuration
 */
export function validateConfig(config: GeneratorConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.input.mappingPath) errors.push('Mapping file path is required');
  if (!config.pivot.keyColumn) errors.push('Pivot key column is required');
  if (!config.pivot.valueColumn) errors.push('Pivot value column is required');
  if (!config.pivot.derivedMetric.numeratorCode || !config.pivot.derivedMetric.denominatorCode) {
    errors.push('Derived metric needs both a numerator and a denominator code');
  }
  if (!['render', 'skip'].includes(config.generation.untieredTargets)) {
    errors.push(`Unknown untieredTargets policy '${config.generation.untieredTargets}'`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Generator options from configuration
 */
export function toGenerateOptions(config: GeneratorConfig): GenerateOptions {
  return {
    idempotent: config.generation.idempotent,
    allowRepair: config.generation.allowRepair,
    untieredTargets: config.generation.untieredTargets,
    defaults: { ...config.defaults },
    pivot: {
      keyColumn: config.pivot.keyColumn,
      valueColumn: config.pivot.valueColumn,
      derivedMetric: {
        numerator_code: config.pivot.derivedMetric.numeratorCode,
        denominator_code: config.pivot.derivedMetric.denominatorCode,
      },
    },
  };
}

/**
 * Print configuration (for debugging)
 */
export function printConfig(config: GeneratorConfig): void {
  console.log('\n📋 ETL SQL Generator Configuration:');
  console.log('════════════════════════════════════════════════════════════════');
  console.log(JSON.stringify(config, null, 2));
  console.log('════════════════════════════════════════════════════════════════\n');
}
