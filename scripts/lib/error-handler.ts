/**
 * Error Handler for ETL SQL Generation
 * Generator error types, execution error classification and retry logic
 */

/**
 * Input text could not be parsed as JSON, even after the repair pass
 */
export class MalformedInputError extends Error {
  readonly diagnostic: string;
  readonly repairAttempted: boolean;

  constructor(diagnostic: string, repairAttempted: boolean) {
    super(
      repairAttempted
        ? `Could not decode mapping JSON, even after attempting repairs: ${diagnostic}`
        : `Could not decode mapping JSON: ${diagnostic}`
    );
    this.name = 'MalformedInputError';
    this.diagnostic = diagnostic;
    this.repairAttempted = repairAttempted;
  }
}

/**
 * Input parsed, but the document breaks the mapping contract
 */
export class InvalidMappingError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid mapping document (${issues.length} issue${issues.length === 1 ? '' : 's'}): ${issues.join('; ')}`);
    this.name = 'InvalidMappingError';
    this.issues = issues;
  }
}

export interface ErrorClassification {
  isTransient: boolean;
  isRecoverable: boolean;
  category: 'connection' | 'timeout' | 'rateLimit' | 'syntax' | 'notFound' | 'generation' | 'unknown';
  message: string;
  suggestion: string;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function errorCode(error: unknown): string | number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' || typeof code === 'number') return code;
  const reason = 'reason' in error ? error.reason : undefined;
  return typeof reason === 'string' ? reason : undefined;
}

/**
 * Classify an error to determine if it's transient and recoverable
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof MalformedInputError || error instanceof InvalidMappingError) {
    return {
      isTransient: false,
      isRecoverable: false,
      category: 'generation',
      message: error.message,
      suggestion: 'Fix the mapping document and generate again'
    };
  }

  const message = errorMessage(error);
  const code = errorCode(error);

  // Network errors (transient)
  if (
    code === 'ECONNRESET' ||
    code === 'ENOTFOUND' ||
    code === 'ECONNREFUSED' ||
    code === 'EAI_AGAIN' ||
    message.includes('Connection lost') ||
    message.includes('socket hang up')
  ) {
    return {
      isTransient: true,
      isRecoverable: true,
      category: 'connection',
      message: 'Warehouse connection error',
      suggestion: 'Retrying with exponential backoff'
    };
  }

  // Quota and rate limits (transient)
  if (
    code === 429 ||
    code === 'rateLimitExceeded' ||
    message.includes('Exceeded rate limits') ||
    message.includes('rate limit')
  ) {
    return {
      isTransient: true,
      isRecoverable: true,
      category: 'rateLimit',
      message: 'Warehouse rate limit exceeded',
      suggestion: 'Retrying after backoff'
    };
  }

  // Timeouts (transient)
  if (
    code === 'ETIMEDOUT' ||
    code === 'backendError' ||
    message.includes('Timeout') ||
    message.includes('timeout')
  ) {
    return {
      isTransient: true,
      isRecoverable: true,
      category: 'timeout',
      message: 'Statement timeout',
      suggestion: 'Consider splitting the load or raising the job timeout'
    };
  }

  // Missing tables or datasets (not transient)
  if (
    code === 404 ||
    code === 'notFound' ||
    message.includes('Not found:')
  ) {
    return {
      isTransient: false,
      isRecoverable: true,
      category: 'notFound',
      message: 'Table or dataset not found',
      suggestion: 'Check the target dataset and that earlier tiers have been loaded'
    };
  }

  // Syntax errors (not transient, not recoverable without regenerating)
  if (
    code === 'invalidQuery' ||
    message.includes('Syntax error') ||
    message.includes('Unrecognized name')
  ) {
    return {
      isTransient: false,
      isRecoverable: false,
      category: 'syntax',
      message: 'SQL syntax or schema error',
      suggestion: 'Fix the mapping document or review the generated SQL'
    };
  }

  return {
    isTransient: false,
    isRecoverable: true,
    category: 'unknown',
    message: message,
    suggestion: 'Review error details and logs'
  };
}

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    baseDelay?: number; // milliseconds
    maxDelay?: number; // milliseconds
    onRetry?: (attempt: number, error: unknown) => void;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30000,
    onRetry
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const classification = classifyError(error);

      if (!classification.isTransient) {
        throw error;
      }

      if (attempt === maxRetries) {
        throw error;
      }

      const exponentialDelay = Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
      const jitter = Math.random() * 0.3 * exponentialDelay;
      const delay = exponentialDelay + jitter;

      if (onRetry) {
        onRetry(attempt, error);
      }

      console.log(`  ⚠️  ${classification.message} (attempt ${attempt}/${maxRetries})`);
      console.log(`     ${classification.suggestion}`);
      console.log(`     Retrying in ${(delay / 1000).toFixed(1)}s...`);

      await sleep(delay);
    }
  }

  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const classification = classifyError(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  ERROR DETAILS                                                 ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  formatted += `  Category:    ${classification.category}\n`;
  formatted += `  Transient:   ${classification.isTransient ? 'Yes' : 'No'}\n`;
  formatted += `  Recoverable: ${classification.isRecoverable ? 'Yes' : 'No'}\n`;
  formatted += `  Message:     ${classification.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  const code = errorCode(error);
  if (code !== undefined) {
    formatted += `  Error Code:  ${code}\n`;
  }

  if (error instanceof InvalidMappingError) {
    formatted += `\n  Issues:\n`;
    for (const issue of error.issues) {
      formatted += `    - ${issue}\n`;
    }
  }

  if (error instanceof MalformedInputError) {
    formatted += `  Diagnostic:  ${error.diagnostic}\n`;
  }

  if (error instanceof Error && error.stack && classification.category !== 'generation') {
    formatted += `\n  Stack Trace:\n`;
    formatted += `  ${error.stack.split('\n').join('\n  ')}\n`;
  }

  return formatted;
}
