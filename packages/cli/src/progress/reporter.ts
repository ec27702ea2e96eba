/**
 * Progress reporter with ora spinners
 */

import chalk from 'chalk';
import ora, { type Ora, type Color } from 'ora';
import type { StoredQuestion, StudyPair } from '@quarry/types';

import { formatDuration, formatPhaseProgress, formatQuestion } from './formatters.js';
import {
  type ColorFunctions,
  type ProgressReporterOptions,
  type RunPhase,
  type ServiceStatus,
  PHASE_NAMES,
} from './types.js';

export type { RunPhase, ServiceStatus, ProgressReporterOptions } from './types.js';

function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Totals shown after a generation run
 */
export interface GenerationSummary {
  topic: string;
  interviewId: string;
  persistedCount: number;
  batchCount: number;
  origin: string;
  unitCount: number;
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private phaseStartTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly verboseEnabled: boolean;
  private currentPhaseName: string = '';
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.verboseEnabled = options.verbose ?? false;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`Quarry v${version}`));
    console.log('');
  }

  /**
   * Display a warning message
   */
  warn(message: string): void {
    if (this.silent) return;
    this.withSpinnerPaused(() => console.log(this.c.yellow(`⚠ ${message}`)));
  }

  /**
   * Print a detail line, only with --verbose
   */
  verbose(message: string): void {
    if (this.silent || !this.verboseEnabled) return;
    this.withSpinnerPaused(() => console.log(this.c.dim(`  ${message}`)));
  }

  isVerbose(): boolean {
    return this.verboseEnabled;
  }

  /**
   * Start timing the overall run
   */
  startRun(): void {
    this.startTime = Date.now();
  }

  /**
   * Report service health check results
   */
  reportServiceStatus(services: ServiceStatus[]): void {
    if (this.silent) return;

    console.log(this.c.dim(`${PHASE_NAMES.initializing}...`));
    for (const service of services) {
      const status = service.healthy ? this.c.green('✓') : this.c.red('✗');
      const latency =
        service.latencyMs !== undefined ? this.c.dim(` - ${service.latencyMs}ms`) : '';
      const error = service.error ? this.c.red(` (${service.error})`) : '';

      console.log(`  ${status} ${service.name}${latency}${error}`);
    }
    console.log('');
  }

  /**
   * Start a new phase
   */
  startPhase(phase: RunPhase): void {
    if (this.silent) return;

    this.phaseStartTime = Date.now();
    this.currentPhaseName = PHASE_NAMES[phase];

    if (this.spinner) {
      this.spinner.stop();
    }

    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: this.currentPhaseName,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Update phase progress with a counter and the time spent so far
   */
  updateProgress(current: number, total: number): void {
    if (this.silent || !this.spinner) return;

    this.spinner.text = formatPhaseProgress(
      this.currentPhaseName,
      current,
      total,
      Date.now() - this.phaseStartTime,
    );
  }

  /**
   * Complete a phase successfully
   */
  completePhase(phase: RunPhase, detail?: string): void {
    if (this.silent) return;

    const duration = Date.now() - this.phaseStartTime;
    const durationStr = duration > 1000 ? this.c.dim(` (${formatDuration(duration)})`) : '';
    const detailStr = detail ? this.c.dim(`: ${detail}`) : '';
    const line = `${PHASE_NAMES[phase]}${detailStr}${durationStr}`;

    if (this.spinner) {
      this.spinner.succeed(line);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.green('✓')} ${line}`);
    }
  }

  /**
   * Fail a phase
   */
  failPhase(phase: RunPhase, error: string): void {
    if (this.silent) return;

    const line = `${PHASE_NAMES[phase]}: ${error}`;
    if (this.spinner) {
      this.spinner.fail(line);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.red('✗')} ${line}`);
    }
  }

  /**
   * Print the final summary of a generation run
   */
  printSummary(stats: GenerationSummary): void {
    if (this.silent) return;

    console.log('');
    console.log(this.c.bold('Summary:'));
    console.log(`  Topic: ${stats.topic}`);
    console.log(`  Interview: ${this.c.cyan(stats.interviewId)}`);
    console.log(`  Questions stored: ${stats.persistedCount} in ${stats.batchCount} batch(es)`);
    console.log(`  Sources: ${stats.unitCount} (${stats.origin})`);
    console.log(`  Total time: ${formatDuration(Date.now() - this.startTime)}`);
  }

  /**
   * Print stored questions, numbered from 1
   */
  printQuestions(questions: readonly StoredQuestion[], heading?: string): void {
    if (this.silent) return;

    console.log('');
    if (heading) {
      console.log(this.c.bold(heading));
    }
    if (questions.length === 0) {
      console.log(this.c.dim('  (no questions)'));
      return;
    }
    questions.forEach((question, index) => {
      const [first, ...rest] = formatQuestion(index, question.text, question.sourceIdentifier);
      console.log(first);
      for (const line of rest) {
        console.log(this.c.dim(line));
      }
    });
  }

  /**
   * Print study pairs with their answer blocks
   */
  printStudyPairs(pairs: readonly StudyPair[]): void {
    if (this.silent) return;

    pairs.forEach((pair, index) => {
      console.log('');
      const [first, ...rest] = formatQuestion(index, pair.question, pair.sourceIdentifier);
      console.log(this.c.bold(first ?? ''));
      for (const line of rest) {
        console.log(this.c.dim(line));
      }
      console.log(`A${index + 1}. ${pair.answer}`);
    });
  }

  /**
   * Print a message (respects silent setting)
   */
  printMessage(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  printSuccess(message: string): void {
    if (this.silent) return;
    console.log(this.c.green(`✓ ${message}`));
  }

  printWarning(message: string): void {
    if (this.silent) return;
    console.log(this.c.yellow(`⚠ ${message}`));
  }

  printError(message: string): void {
    if (this.silent) return;
    console.log(this.c.red(`✗ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  private withSpinnerPaused(print: () => void): void {
    if (!this.spinner) {
      print();
      return;
    }
    this.spinner.clear();
    print();
    this.spinner.render();
  }
}

/**
 * Create a progress callback for the generation pipeline.
 * 'corpus' and 'compose' drive spinners; 'persist' is reported as a verbose line.
 */
export function createPipelineProgressCallback(
  reporter: ProgressReporter,
): (phase: string, current: number, total: number) => void {
  let composing = false;

  return (phase: string, current: number, total: number) => {
    switch (phase) {
      case 'corpus':
        if (current === 0) {
          reporter.startPhase('corpus');
        } else {
          reporter.completePhase('corpus');
        }
        return;
      case 'compose':
        if (!composing) {
          composing = true;
          reporter.startPhase('compose');
        }
        reporter.updateProgress(current, total);
        if (current === total) {
          reporter.completePhase('compose', `${total} questions`);
          composing = false;
        }
        return;
      case 'persist':
        reporter.verbose(`Stored ${current}/${total} questions`);
        return;
      default:
        return;
    }
  };
}
