import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '../errors/categories.js';
import { DEFAULT_MODELS, DEFAULT_MODEL_INDEX, selectModel, type ModelSpec } from './models.js';

/**
 * Default API configuration constants
 */
export const DEFAULT_BASE_URL = 'https://api.anthropic.com';
export const DEFAULT_URL = `${DEFAULT_BASE_URL}/v1/messages`;
export const DEFAULT_API_KEY_ENV_VAR = 'ANTHROPIC_API_KEY';
export const DEFAULT_API_VERSION = '2023-06-01';
export const DEFAULT_BETA_FEATURES: readonly string[] = ['max-tokens-3-5-sonnet-2024-07-15'];
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_TRANSPORT_COMMAND = 'curl';

/**
 * Prompt templates rendered into the system prompt and the user message
 */
export interface TemplateConfig {
  /** Directory the template paths are resolved against */
  readonly directory: string;
  readonly system: string;
  readonly user: string;
}

/**
 * The `templates/` directory shipped with the package, resolved from this
 * module so it is found whatever the working directory
 */
export const DEFAULT_TEMPLATE_DIRECTORY = fileURLToPath(new URL('../../templates', import.meta.url));

export const DEFAULT_TEMPLATES: TemplateConfig = {
  directory: DEFAULT_TEMPLATE_DIRECTORY,
  system: 'anthropic/fill_mode_system_prompt.xml.jinja',
  user: 'anthropic/fill_mode_user_prompt.xml.jinja',
};

/**
 * Provider configuration for one chat client
 */
export interface ChatStreamConfig {
  /**
   * Messages endpoint, passed to the transport as its final argument.
   * @default 'https://api.anthropic.com/v1/messages'
   */
  readonly url: string;

  /**
   * Name of the environment variable holding the API key.
   * @default 'ANTHROPIC_API_KEY'
   */
  readonly apiKeyEnvVar: string;

  readonly model: ModelSpec;

  /**
   * @default 0.7
   */
  readonly temperature: number;

  /**
   * Dump every outgoing request to the debug sink
   */
  readonly debug: boolean;

  /**
   * Value of the `anthropic-version` header.
   * @default '2023-06-01'
   */
  readonly apiVersion: string;

  /**
   * Values joined into the `anthropic-beta` header; the header is omitted when empty.
   */
  readonly betaFeatures: readonly string[];

  /**
   * Extra headers appended after the provider headers
   */
  readonly headers: Readonly<Record<string, string>>;

  readonly templates: TemplateConfig;

  /**
   * Executable spawned to perform the request.
   * @default 'curl'
   */
  readonly transportCommand: string;
}

const configSchema = z.object({
  url: z.string().url(),
  apiKeyEnvVar: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid environment variable name'),
  model: z.object({
    name: z.string().min(1),
    maxOutputTokens: z.number().int().positive(),
  }),
  temperature: z.number().min(0).max(1),
  debug: z.boolean(),
  apiVersion: z.string().min(1),
  betaFeatures: z.array(z.string().min(1)),
  headers: z.record(z.string()),
  templates: z.object({
    directory: z.string(),
    system: z.string().min(1),
    user: z.string().min(1),
  }),
  transportCommand: z.string().min(1),
});

/**
 * Creates the default configuration
 */
export function createDefaultConfig(): ChatStreamConfig {
  return {
    url: DEFAULT_URL,
    apiKeyEnvVar: DEFAULT_API_KEY_ENV_VAR,
    model: selectModel(DEFAULT_MODELS, DEFAULT_MODEL_INDEX),
    temperature: DEFAULT_TEMPERATURE,
    debug: false,
    apiVersion: DEFAULT_API_VERSION,
    betaFeatures: [...DEFAULT_BETA_FEATURES],
    headers: {},
    templates: { ...DEFAULT_TEMPLATES },
    transportCommand: DEFAULT_TRANSPORT_COMMAND,
  };
}

/**
 * Validates a configuration, throwing a ConfigurationError that lists every issue
 */
export function validateConfig(config: ChatStreamConfig): ChatStreamConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }
  return config;
}

/**
 * Fluent builder for ChatStreamConfig objects
 */
export class ChatStreamConfigBuilder {
  private config: ChatStreamConfig = createDefaultConfig();

  withUrl(url: string): this {
    this.config = { ...this.config, url };
    return this;
  }

  /**
   * Derives the messages endpoint from a provider base URL
   */
  withBaseUrl(baseUrl: string): this {
    return this.withUrl(`${baseUrl.replace(/\/$/, '')}/v1/messages`);
  }

  withApiKeyEnvVar(name: string): this {
    this.config = { ...this.config, apiKeyEnvVar: name };
    return this;
  }

  withModel(model: ModelSpec): this {
    this.config = { ...this.config, model };
    return this;
  }

  /**
   * Selects a model from a static list by index
   */
  withModelIndex(index: number, models: readonly ModelSpec[] = DEFAULT_MODELS): this {
    return this.withModel(selectModel(models, index));
  }

  withTemperature(temperature: number): this {
    this.config = { ...this.config, temperature };
    return this;
  }

  withDebug(debug = true): this {
    this.config = { ...this.config, debug };
    return this;
  }

  withApiVersion(apiVersion: string): this {
    this.config = { ...this.config, apiVersion };
    return this;
  }

  withBetaFeatures(features: readonly string[]): this {
    this.config = { ...this.config, betaFeatures: [...features] };
    return this;
  }

  withHeader(key: string, value: string): this {
    this.config = { ...this.config, headers: { ...this.config.headers, [key]: value } };
    return this;
  }

  withTemplates(templates: Partial<TemplateConfig>): this {
    this.config = { ...this.config, templates: { ...this.config.templates, ...templates } };
    return this;
  }

  withTransportCommand(command: string): this {
    this.config = { ...this.config, transportCommand: command };
    return this;
  }

  /**
   * Builds and validates the configuration
   */
  build(): ChatStreamConfig {
    return validateConfig(this.config);
  }

  /**
   * Creates a builder from an existing config
   */
  static from(config: ChatStreamConfig): ChatStreamConfigBuilder {
    const builder = new ChatStreamConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}

/**
 * Builds a configuration from environment variables
 *
 * Recognised variables:
 * - ANTHROPIC_BASE_URL (optional)
 * - ANTHROPIC_API_VERSION (optional)
 *
 * The API key itself is read per request, not here.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ChatStreamConfig> = {}
): ChatStreamConfig {
  const builder = new ChatStreamConfigBuilder();
  if (env.ANTHROPIC_BASE_URL) {
    builder.withBaseUrl(env.ANTHROPIC_BASE_URL);
  }
  if (env.ANTHROPIC_API_VERSION) {
    builder.withApiVersion(env.ANTHROPIC_API_VERSION);
  }
  const base = builder.build();
  return validateConfig({ ...base, ...overrides });
}
