/**
 * IQuestionGenerator - Question Generation Port
 *
 * Stateless transform: topic in, formatted question-set text out.
 *
 * @module packages/core/ports/IQuestionGenerator
 */

export interface IQuestionGenerator {
  /** @throws GenerationError when the provider fails or returns no text */
  generate(topic: string): Promise<string>;
}
