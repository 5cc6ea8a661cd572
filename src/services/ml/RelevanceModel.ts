/**
 * Loading and validation of the serialized relevance model
 */

import { promises as fs } from 'fs';
import { ClassifierArtifact } from '../../types/models';
import { validateClassifierArtifact } from '../../models/validation';
import { ClassificationLoadError, errorMessage } from '../../models/errors';

export interface RelevanceModel {
  readonly version: string;
  readonly vocabulary: ReadonlyMap<string, number>;
  readonly idf: readonly number[];
  readonly weights: readonly number[];
  readonly bias: number;
  readonly threshold: number;
  readonly ngramRange: readonly [number, number];
}

/**
 * Check a parsed artifact and freeze it into a model value.
 * Any inconsistency is a ClassificationLoadError.
 */
export function parseRelevanceModel(input: unknown): RelevanceModel {
  const { error, value } = validateClassifierArtifact(input);
  if (error || !value) {
    throw new ClassificationLoadError(`Invalid relevance model: ${error ? error.message : 'empty artifact'}`);
  }

  const artifact: ClassifierArtifact = value;
  const size = artifact.weights.length;

  if (artifact.idf.length !== size) {
    throw new ClassificationLoadError(
      `Invalid relevance model: idf has ${artifact.idf.length} entries but weights has ${size}`
    );
  }

  const vocabulary = new Map<string, number>();
  for (const [term, index] of Object.entries(artifact.vocabulary)) {
    if (index >= size) {
      throw new ClassificationLoadError(
        `Invalid relevance model: term "${term}" maps to index ${index} outside ${size} features`
      );
    }
    vocabulary.set(term, index);
  }

  const [minN, maxN] = artifact.ngramRange;
  if (minN > maxN) {
    throw new ClassificationLoadError(`Invalid relevance model: ngram range [${minN}, ${maxN}]`);
  }

  return Object.freeze({
    version: artifact.version,
    vocabulary,
    idf: Object.freeze([...artifact.idf]),
    weights: Object.freeze([...artifact.weights]),
    bias: artifact.bias,
    threshold: artifact.threshold,
    ngramRange: Object.freeze([minN, maxN] as const)
  });
}

/**
 * Read and parse the model artifact at `modelPath`
 */
export async function loadRelevanceModel(modelPath: string): Promise<RelevanceModel> {
  let raw: string;
  try {
    raw = await fs.readFile(modelPath, 'utf-8');
  } catch (error) {
    throw new ClassificationLoadError(`Cannot read relevance model at ${modelPath}: ${errorMessage(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ClassificationLoadError(`Relevance model at ${modelPath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  return parseRelevanceModel(parsed);
}
