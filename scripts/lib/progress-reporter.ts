/**
 * Progress Reporter for ETL SQL Generation
 * Provides formatted console output for generation and script runs
 */

import { GenerationSummary, GenerationWarning, Strategy } from '../etl-sql/types';

export class ProgressReporter {
  private startTime: Date | null = null;

  /**
   * Log the start of a run
   */
  logRunStart(runName: string, inputPath: string, mode: string): void {
    this.startTime = new Date();
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  ETL SQL ${runName.padEnd(54)}║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Input:       ${inputPath}`);
    console.log(`  Mode:        ${mode}`);
    console.log(`  Started:     ${this.startTime.toISOString()}`);
    console.log('');
  }

  /**
   * Log one step, e.g. a rendered or executed statement
   */
  logStep(step: string, currentStep: number, totalSteps: number, detail?: string): void {
    const percent = totalSteps > 0 ? ((currentStep / totalSteps) * 100).toFixed(1) : '100.0';
    console.log(`  [${currentStep}/${totalSteps}] ${step} (${percent}%)`);
    if (detail) {
      console.log(`    ${detail}`);
    }
  }

  logStatement(targetTable: string, strategy: Strategy, index: number, total: number): void {
    this.logStep(targetTable, index, total, `Strategy: ${strategy}`);
  }

  /**
   * Log generation warnings, grouped by kind
   */
  logWarnings(warnings: readonly GenerationWarning[]): void {
    if (warnings.length === 0) return;
    console.log('');
    console.log(`  ⚠️  ${warnings.length} warning(s):`);
    for (const warning of warnings) {
      const target = warning.targetTable ? ` [${warning.targetTable}]` : '';
      console.log(`     - ${warning.kind}${target}: ${warning.message}`);
    }
  }

  /**
   * Log the structured generation summary
   */
  logSummary(summary: GenerationSummary): void {
    console.log('');
    console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    console.log('📊 Generation Summary');
    console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    console.log(`  Statements:      ${this.formatNumber(summary.statementCount)}`);
    for (const [strategy, count] of Object.entries(summary.byStrategy)) {
      if (count > 0) {
        console.log(`    ${strategy.padEnd(15)} ${this.formatNumber(count)}`);
      }
    }
    console.log(`  Warnings:        ${this.formatNumber(summary.warningCount)}`);
    console.log(`  Repaired input:  ${summary.repairedInput ? 'YES' : 'no'}`);
    if (summary.missingSourceTargets.length > 0) {
      console.log(`  Missing sources: ${summary.missingSourceTargets.join(', ')}`);
    }
    if (summary.untieredTargets.length > 0) {
      console.log(`  Untiered:        ${summary.untieredTargets.join(', ')}`);
    }
    console.log(`  Needs review:    ${summary.requiresReview ? 'YES' : 'no'}`);
  }

  /**
   * Log run completion
   */
  logRunComplete(outputDescription: string, totalDuration: number): void {
    console.log('');
    console.log(`✅ Wrote ${outputDescription} in ${this.formatDuration(totalDuration)}`);
    console.log('');
  }

  /**
   * Log run failure
   */
  logRunFailure(error: Error): void {
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  ETL SQL Generation FAILED                                     ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Error: ${error.message}`);
    console.log('');
  }

  logWarning(message: string): void {
    console.log(`  ⚠️  ${message}`);
  }

  logInfo(message: string): void {
    console.log(`  ℹ️  ${message}`);
  }

  private formatNumber(num: number): string {
    return num.toLocaleString('en-US');
  }

  private formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    }
    const minutes = Math.floor(seconds / 60);
    const secs = seconds % 60;
    return `${minutes}m ${secs.toFixed(0)}s`;
  }
}
