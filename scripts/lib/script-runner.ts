import { STATEMENT_DELIMITER } from '../etl-sql/statement-renderer';
import { retryWithBackoff } from './error-handler';

/**
 * Execution collaborator, e.g. a warehouse client wrapper
 */
export interface StatementExecutor {
  execute(sql: string, dataset: string): Promise<{ rowsAffected?: number }>;
}

export interface ScriptRunOptions {
  executor: StatementExecutor;
  dataset: string;
  datasetPlaceholder?: string;   // replaced by `dataset` wherever it appears as `<placeholder>.`
  maxRetries?: number;
  baseDelay?: number;            // milliseconds
  onProgress?: (index: number, total: number) => void;
}

export interface StatementResult {
  index: number;
  statement: string;
  success: boolean;
  rowsAffected?: number;
  attempts: number;
  duration: number;              // seconds
  error?: Error;
}

export interface ScriptRunResult {
  success: boolean;
  results: StatementResult[];
  totalRowsAffected: number;
}

/**
 * Split a generated script into executable statements.
 * Comment lines are dropped; commented-out placeholders leave nothing behind.
 */
export function splitScript(sqlText: string): string[] {
  return sqlText
    .split(STATEMENT_DELIMITER)
    .map(block => block
      .split('\n')
      .filter(line => !line.trim().startsWith('--'))
      .join('\n')
      .trim())
    .filter(statement => statement.length > 0);
}

/**
 * Point `placeholder.` table references at the real dataset
 */
export function substituteDataset(sql: string, dataset: string, placeholder: string): string {
  if (!placeholder || !dataset) return sql;
  return sql.split(`${placeholder}.`).join(`${dataset}.`);
}

/**
 * Execute a generated script one statement at a time, in script order.
 * Transient failures are retried; the first permanent failure stops the run.
 */
export async function runScript(sqlText: string, options: ScriptRunOptions): Promise<ScriptRunResult> {
  const statements = splitScript(sqlText).map(statement =>
    substituteDataset(statement, options.dataset, options.datasetPlaceholder ?? '')
  );

  const results: StatementResult[] = [];
  let totalRowsAffected = 0;

  for (let i = 0; i < statements.length; i++) {
    const statement = statements[i];
    const startTime = Date.now();
    let attempts = 0;

    if (options.onProgress) {
      options.onProgress(i + 1, statements.length);
    }

    try {
      const outcome = await retryWithBackoff(
        () => {
          attempts++;
          return options.executor.execute(statement, options.dataset);
        },
        {
          maxRetries: options.maxRetries ?? 3,
          baseDelay: options.baseDelay ?? 1000,
        }
      );

      const rowsAffected = outcome.rowsAffected ?? 0;
      totalRowsAffected += rowsAffected;
      results.push({
        index: i,
        statement,
        success: true,
        rowsAffected,
        attempts,
        duration: (Date.now() - startTime) / 1000,
      });
    } catch (error) {
      results.push({
        index: i,
        statement,
        success: false,
        attempts,
        duration: (Date.now() - startTime) / 1000,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      return { success: false, results, totalRowsAffected };
    }
  }

  return { success: true, results, totalRowsAffected };
}
