/**
 * Shared types for progress reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Run phases
 */
export type RunPhase = 'initializing' | 'corpus' | 'compose' | 'study';

/**
 * Phase display names
 */
export const PHASE_NAMES: Record<RunPhase, string> = {
  initializing: 'Checking services',
  corpus: 'Building seed corpus',
  compose: 'Composing questions',
  study: 'Preparing study pairs',
};

/**
 * Service health status
 */
export interface ServiceStatus {
  name: string;
  healthy: boolean;
  latencyMs?: number;
  error?: string;
}

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Print fetch failures and flush events (default: false) */
  verbose?: boolean;
}
