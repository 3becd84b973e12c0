import { GenerationSummary, GenerationWarning, RenderedStatement, Strategy } from './types';

/**
 * Collects warnings and rendered statements for one generation run
 */
export class GenerationReport {
  private readonly warnings: GenerationWarning[] = [];
  private readonly statements: RenderedStatement[] = [];

  addWarning(warning: GenerationWarning): void {
    this.warnings.push(warning);
  }

  addWarnings(warnings: readonly GenerationWarning[]): void {
    for (const warning of warnings) this.addWarning(warning);
  }

  addStatement(statement: RenderedStatement): void {
    this.statements.push(statement);
    this.addWarnings(statement.warnings);
  }

  getWarnings(): GenerationWarning[] {
    return [...this.warnings];
  }

  getStatements(): RenderedStatement[] {
    return [...this.statements];
  }

  private targetsOf(kind: GenerationWarning['kind']): string[] {
    return this.warnings.flatMap(warning =>
      warning.kind === kind && warning.targetTable !== undefined ? [warning.targetTable] : []
    );
  }

  summary(): GenerationSummary {
    const byStrategy: Record<Strategy, number> = { DIRECT: 0, UNION: 0, PIVOT: 0, MISSING_SOURCE: 0 };
    for (const statement of this.statements) {
      byStrategy[statement.strategy] += 1;
    }

    return {
      statementCount: this.statements.length,
      byStrategy,
      missingSourceTargets: this.targetsOf('MissingSource'),
      untieredTargets: this.targetsOf('UntieredTarget'),
      repairedInput: this.warnings.some(warning => warning.kind === 'RepairedInput'),
      warningCount: this.warnings.length,
      requiresReview: this.warnings.length > 0,
    };
  }
}
