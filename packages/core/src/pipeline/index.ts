export {
  GenerationPipeline,
  createGenerationPipeline,
  type GenerationConfig,
  type GenerationRun,
  type GenerationResult,
  type ProgressCallback,
} from './generation-pipeline.js';
export { StudyPipeline, type StudyConfig, type StudyRun, type StudyResult } from './study-pipeline.js';
