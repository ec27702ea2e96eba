export { composeQuestion } from './question-composer.js';
export { selectParagraph, splitParagraphs } from './paragraph-selector.js';
export { scenarioQuestion, genericQuestion, fallbackParagraph } from './templates.js';
