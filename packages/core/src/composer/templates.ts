/**
 * Question templates
 */

/**
 * Scenario question anchored on salient terms
 */
export function scenarioQuestion(terms: string, topic: string): string {
  return (
    `In a production scenario involving ${terms}, what are the top non-obvious trade-offs ` +
    `you would evaluate, and how would you mitigate the top two risks? (Tie it into ${topic} context.)`
  );
}

/**
 * Generic question used when a paragraph has no salient terms
 */
export function genericQuestion(topic: string): string {
  return (
    `Describe an advanced challenge in ${topic} that can arise from the technology discussed ` +
    `in the source, and propose a step-by-step resolution strategy.`
  );
}

/**
 * Synthetic paragraph for the last tier of the corpus fallback chain
 */
export function fallbackParagraph(topic: string): string {
  return (
    `This is a fallback paragraph about ${topic}. ` +
    `Focus on real-world constraints, scaling, security, and maintainability.`
  );
}
