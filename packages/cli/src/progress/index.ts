/**
 * Progress module exports
 */

export type { RunPhase, ServiceStatus, ProgressReporterOptions, GenerationSummary } from './reporter.js';
export { ProgressReporter, createPipelineProgressCallback } from './reporter.js';
export { formatConfigDisplay, formatDuration, formatPhaseProgress, formatQuestion } from './formatters.js';
