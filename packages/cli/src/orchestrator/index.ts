/**
 * Orchestrator module exports
 */

export type { Services, ServiceHooks } from './services.js';
export { performHealthChecks, initializeServices, closeServices } from './services.js';

export type { GenerationJob, GenerationOutcome, StudyJob, StudyOutcome } from './orchestrator.js';
export { orchestrateGeneration, orchestrateStudy, PREVIEW_LIMIT } from './orchestrator.js';
