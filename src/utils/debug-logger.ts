/**
 * Debug Logger - step-by-step tracing of pipeline operations when DEBUG is enabled
 *
 * Usage:
 *   Set DEBUG=true in the environment (or call `debugLogger.configure`) to enable.
 *   Each operation logs START and FINISH phases so slow or failing steps stand out.
 */

import chalk from 'chalk';

interface StepTimer {
  category: string;
  description: string;
  startTime: number;
}

type LogData = Record<string, unknown>;

const categoryColors: Record<string, chalk.Chalk> = {
  // Ingestion
  INGESTION: chalk.bgMagenta.white.bold,
  INGESTION_RUN: chalk.bgMagenta.white.bold,
  RSS_FETCH: chalk.bgCyan.black.bold,
  RSS_PARSE: chalk.bgCyan.black.bold,
  PROCESS_ENTRY: chalk.bgMagenta.white.bold,
  INDEXING: chalk.bgBlue.white.bold,

  // Summaries & analysis
  SUMMARY: chalk.bgYellow.black.bold,
  MULTI_ANALYSIS: chalk.bgYellow.black.bold,
  LLM: chalk.bgRed.white.bold,
  EMBED: chalk.bgBlue.white.bold,

  // Retrieval
  SEARCH: chalk.bgBlue.white.bold,
  SIMILAR: chalk.bgBlue.white.bold,
  VECTOR_STORE: chalk.bgGreen.black.bold,

  // Storage & maintenance
  DB: chalk.bgGreen.black.bold,
  CLEANUP: chalk.bgRed.white.bold,
  RECONCILE: chalk.bgRed.white.bold,

  // System
  JOB: chalk.bgWhite.black.bold,
  CONCURRENCY: chalk.bgWhite.black.bold,
  SYSTEM: chalk.bgWhite.black.bold,
  CONFIG: chalk.bgWhite.black.bold,
  ERROR: chalk.bgRed.white.bold,
};

function getCategoryLabel(category: string): string {
  const colorFn = categoryColors[category] || chalk.bgGray.white.bold;
  return colorFn(` ${category} `);
}

function formatData(data?: LogData): string {
  return data && Object.keys(data).length > 0 ? chalk.dim(` │ ${JSON.stringify(data)}`) : '';
}

class DebugLogger {
  private isDebugMode: boolean;
  private activeSteps: Map<string, StepTimer> = new Map();
  private stepCounter = 0;

  constructor() {
    this.isDebugMode = process.env.DEBUG === 'true' || process.env.DEBUG === '1';
  }

  configure(options: { enabled: boolean }): void {
    this.isDebugMode = options.enabled;
  }

  /**
   * Log the start of an operation step
   * @param category - High-level category (e.g., 'INGESTION', 'RSS_FETCH', 'SEARCH')
   * @param description - What we're about to do
   * @returns stepId for tracking this specific step
   */
  stepStart(category: string, description: string, metadata?: LogData): string {
    if (!this.isDebugMode) return '';

    const stepId = `${category}_${++this.stepCounter}`;

    this.activeSteps.set(stepId, {
      category,
      description,
      startTime: Date.now(),
    });

    console.log(`${chalk.cyan('▶')} ${getCategoryLabel(category)} ${chalk.white(description)}${formatData(metadata)}`);

    return stepId;
  }

  stepFinish(stepId: string, result?: LogData): void {
    if (!this.isDebugMode || !stepId) return;

    const step = this.activeSteps.get(stepId);
    if (!step) {
      console.warn(chalk.yellow(`⚠ Unknown step: ${stepId}`));
      return;
    }

    const duration = Date.now() - step.startTime;
    const durationColor = duration > 1000 ? chalk.yellow : duration > 500 ? chalk.cyan : chalk.green;
    console.log(
      `${chalk.green('✓')} ${getCategoryLabel(step.category)} ${chalk.white(step.description)} ${durationColor(`(${duration}ms)`)}${formatData(result)}`
    );

    this.activeSteps.delete(stepId);
  }

  /**
   * Log an error that occurred during a step. The step is closed either way.
   */
  stepError(stepId: string | null, category: string, description: string, error: unknown): void {
    let step: StepTimer | undefined;
    let duration = 0;

    if (stepId) {
      step = this.activeSteps.get(stepId);
      if (step) {
        duration = Date.now() - step.startTime;
        this.activeSteps.delete(stepId);
      }
    }

    if (!this.isDebugMode) return;

    const durationStr = duration > 0 ? chalk.dim(` (${duration}ms)`) : '';
    const errorMsg = error instanceof Error ? error.message : String(error);

    console.log(
      `${chalk.red('✗')} ${getCategoryLabel(step?.category || category)} ${chalk.white(description)}${durationStr} ${chalk.red('│')} ${chalk.red(errorMsg)}`
    );

    if (error instanceof Error && error.stack) {
      console.log(chalk.dim(`  └─ ${error.stack.split('\n')[1]?.trim() || error.stack}`));
    }
  }

  info(category: string, message: string, data?: LogData): void {
    if (!this.isDebugMode) return;
    console.log(`${chalk.blue('ℹ')} ${getCategoryLabel(category)} ${chalk.white(message)}${formatData(data)}`);
  }

  warn(category: string, message: string, data?: LogData): void {
    if (!this.isDebugMode) return;
    console.log(`${chalk.yellow('⚠')} ${getCategoryLabel(category)} ${chalk.yellow(message)}${formatData(data)}`);
  }

  /**
   * Steps that were started but never finished. Useful for spotting a
   * pipeline stage that hangs.
   */
  getActiveSteps(): Array<{ stepId: string; category: string; description: string; duration: number }> {
    const now = Date.now();
    return Array.from(this.activeSteps.entries()).map(([stepId, step]) => ({
      stepId,
      category: step.category,
      description: step.description,
      duration: now - step.startTime,
    }));
  }
}

export const debugLogger = new DebugLogger();
