export {
  generationRequestSchema,
  studyRequestSchema,
  validateGenerationRequest,
  validateStudyRequest,
} from './request-schema.js';
