/**
 * Document to questions: extraction failures surface as INVALID_INPUT.
 */

import { ExtractionError, documentName, type SourceDocument, type TextExtractor } from './text.js';
import { invalidInput } from '../generation/errors.js';
import type { GenerateOptions, GenerationOrchestrator } from '../generation/orchestrator.js';
import type { GenerationRequest, GenerationResult } from '../generation/types.js';

export * from './text.js';

/**
 * Extract text from a document and generate questions from it.
 *
 * @throws GenerationError INVALID_INPUT when extraction fails
 */
export async function generateFromDocument(
  orchestrator: GenerationOrchestrator,
  extractor: TextExtractor,
  document: SourceDocument,
  params: Omit<GenerationRequest, 'source_text'>,
  options: GenerateOptions = {}
): Promise<GenerationResult> {
  let source_text: string;
  try {
    source_text = await extractor.extract(document);
  } catch (error) {
    if (error instanceof ExtractionError) {
      throw invalidInput(`Extraction failed: ${error.message}`, {
        field: 'document',
        document: documentName(document),
        extractor: extractor.name,
        ...error.details,
      });
    }
    throw error;
  }

  return orchestrator.generate({ ...params, source_text }, options);
}
