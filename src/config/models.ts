import { ConfigurationError } from '../errors/categories.js';

/**
 * A model the provider serves, with the output token budget requested for it
 */
export interface ModelSpec {
  readonly name: string;
  readonly maxOutputTokens: number;
}

/**
 * Models offered out of the box, selectable by index
 */
export const DEFAULT_MODELS: readonly ModelSpec[] = Object.freeze([
  { name: 'claude-3-5-sonnet-20240620', maxOutputTokens: 8192 },
  { name: 'claude-3-opus-20240229', maxOutputTokens: 4096 },
  { name: 'claude-3-haiku-20240307', maxOutputTokens: 4096 },
]);

export const DEFAULT_MODEL_INDEX = 0;

/**
 * Picks a model from a static list by index
 */
export function selectModel(
  models: readonly ModelSpec[] = DEFAULT_MODELS,
  index: number = DEFAULT_MODEL_INDEX
): ModelSpec {
  const model = Number.isInteger(index) ? models[index] : undefined;
  if (!model) {
    throw new ConfigurationError(
      `Model index ${index} is out of range (${models.length} models available)`,
      { index, available: models.map(m => m.name) }
    );
  }
  return model;
}
