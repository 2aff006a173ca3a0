import { readFileSync } from 'fs';
import { ConfigurationError } from '../errors/categories.js';

/**
 * Variables made available to a prompt template
 */
export type PromptVariables = Readonly<Record<string, unknown>>;

/**
 * Turns a template file and its variables into prompt text.
 * The client treats implementations as opaque.
 */
export interface TemplateRenderer {
  render(templatePath: string, variables: PromptVariables): string;
}

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

function formatValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Reads a template from disk and substitutes `{{ name }}` placeholders.
 * Unknown names render as the empty string. No control flow or filters.
 */
export class FileTemplateRenderer implements TemplateRenderer {
  render(templatePath: string, variables: PromptVariables): string {
    let source: string;
    try {
      source = readFileSync(templatePath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Unable to read prompt template: ${templatePath}`, {
        templatePath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    return source.replace(PLACEHOLDER, (_match, name: string) => formatValue(variables[name]));
  }
}
