#!/usr/bin/env node
/**
 * ETL SQL Generator CLI
 * =====================
 * Generates the warehouse load script from a JSON mapping document
 *
 * Usage:
 *   npx tsx scripts/generate-etl-sql.ts [mapping.json] [options]
 *
 * Options:
 *   --out <file>       Write the SQL script to <file> (default: generated_etl.sql)
 *   --stdout           Print only the SQL script to stdout
 *   --dataset <name>   Replace the dataset placeholder (your_dataset_name) with <name>
 *   --merge            Idempotent MERGE statements keyed on primary_key
 *   --insert           Plain INSERT statements (default)
 *   --no-repair        Fail on malformed JSON instead of attempting a repair
 *   --skip-untiered    Drop targets without a dim_/fact_/agg_ prefix
 *   --summary-json     Print the generation summary as JSON
 *   --strict           Exit with code 2 when the output needs human review
 *   --print-config     Print the resolved configuration
 *
 * Exit codes:
 *   0  script written
 *   1  generation failed (malformed or invalid mapping, I/O error)
 *   2  script written, but warnings require review (--strict only)
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { generate } from './etl-sql/generator';
import {
  GeneratorConfigOverrides,
  loadConfig,
  printConfig,
  toGenerateOptions,
  validateConfig,
} from './lib/config-loader';
import { formatError } from './lib/error-handler';
import { ProgressReporter } from './lib/progress-reporter';
import { substituteDataset } from './lib/script-runner';

export interface CliArgs {
  overrides: GeneratorConfigOverrides;
  stdout: boolean;
  summaryJson: boolean;
  strict: boolean;
  printConfig: boolean;
}

export function parseArgs(args: string[]): CliArgs {
  const overrides: GeneratorConfigOverrides = {};
  const parsed: CliArgs = { overrides, stdout: false, summaryJson: false, strict: false, printConfig: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--out': {
        const value = args[++i];
        if (!value) throw new Error('--out needs a file path');
        overrides.output = { sqlPath: value };
        break;
      }
      case '--dataset': {
        const value = args[++i];
        if (!value) throw new Error('--dataset needs a dataset name');
        overrides.execution = { ...overrides.execution, dataset: value };
        break;
      }
      case '--stdout':
        parsed.stdout = true;
        break;
      case '--merge':
        overrides.generation = { ...overrides.generation, idempotent: true };
        break;
      case '--insert':
        overrides.generation = { ...overrides.generation, idempotent: false };
        break;
      case '--no-repair':
        overrides.generation = { ...overrides.generation, allowRepair: false };
        break;
      case '--skip-untiered':
        overrides.generation = { ...overrides.generation, untieredTargets: 'skip' };
        break;
      case '--summary-json':
        parsed.summaryJson = true;
        break;
      case '--strict':
        parsed.strict = true;
        break;
      case '--print-config':
        parsed.printConfig = true;
        break;
      default:
        if (arg.startsWith('--')) throw new Error(`Unknown option ${arg}`);
        overrides.input = { mappingPath: arg };
    }
  }

  return parsed;
}

export function main(argv: string[]): number {
  const reporter = new ProgressReporter();
  const startTime = Date.now();

  try {
    const args = parseArgs(argv);
    const config = loadConfig(args.overrides);

    const validation = validateConfig(config);
    if (!validation.valid) {
      console.error('❌ Invalid configuration:');
      validation.errors.forEach(error => console.error(`   - ${error}`));
      return 1;
    }

    if (args.printConfig) {
      printConfig(config);
    }

    const inputPath = path.resolve(config.input.mappingPath);
    const mode = config.generation.idempotent ? 'MERGE (idempotent)' : 'INSERT';
    const text = fs.readFileSync(inputPath, 'utf-8');
    const { dataset, datasetPlaceholder } = config.execution;

    if (args.stdout) {
      const result = generate(text, toGenerateOptions(config));
      process.stdout.write(substituteDataset(result.sqlText, dataset, datasetPlaceholder));
      return args.strict && result.summary.requiresReview ? 2 : 0;
    }

    reporter.logRunStart('Generation', inputPath, mode);
    const result = generate(text, toGenerateOptions(config));

    result.statements.forEach((statement, index) => {
      reporter.logStatement(statement.targetTable, statement.strategy, index + 1, result.statements.length);
    });
    if (result.summary.repairedInput) {
      reporter.logInfo('Mapping JSON was repaired before generation');
    }
    reporter.logWarnings(result.warnings);
    reporter.logSummary(result.summary);

    const outputPath = path.resolve(config.output.sqlPath);
    if (dataset) {
      reporter.logInfo(`Tables under '${datasetPlaceholder}.' point at dataset '${dataset}'`);
    }
    fs.writeFileSync(outputPath, substituteDataset(result.sqlText, dataset, datasetPlaceholder), 'utf-8');
    reporter.logRunComplete(outputPath, (Date.now() - startTime) / 1000);

    if (args.summaryJson) {
      console.log(JSON.stringify({ summary: result.summary, warnings: result.warnings }, null, 2));
    }

    if (args.strict && result.summary.requiresReview) {
      reporter.logWarning('Output requires human review (--strict)');
      return 2;
    }
    return 0;
  } catch (error) {
    reporter.logRunFailure(error instanceof Error ? error : new Error(String(error)));
    console.error(formatError(error));
    return 1;
  }
}

if (require.main === module) {
  dotenv.config();
  process.exit(main(process.argv.slice(2)));
}
