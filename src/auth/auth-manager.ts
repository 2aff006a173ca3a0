import { MissingCredentialError } from '../errors/categories.js';
import { NoopLogger, type Logger } from '../observability/logging.js';

/**
 * Reads the API key from the environment variable named by the configuration.
 * Unset, empty and whitespace-only values are all treated as missing.
 */
export function readApiKey(variable: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[variable];
  if (value === undefined || value.trim().length === 0) {
    throw new MissingCredentialError(variable);
  }
  return value.trim();
}

/**
 * Interface for producing the provider's authentication headers
 */
export interface AuthManager {
  /**
   * Header name/value pairs in the order they are passed to the transport
   */
  getHeaders(): Record<string, string>;

  validateApiKey(): void;
}

export interface AuthManagerOptions {
  apiKey: string;
  apiVersion: string;
  betaFeatures?: readonly string[];
  customHeaders?: Readonly<Record<string, string>>;
  logger?: Logger;
}

/**
 * `x-api-key` authentication for the Anthropic Messages API
 */
export class ApiKeyAuthManager implements AuthManager {
  private readonly apiKey: string;
  private readonly apiVersion: string;
  private readonly betaFeatures: readonly string[];
  private readonly customHeaders: Readonly<Record<string, string>>;
  private readonly logger: Logger;

  constructor(options: AuthManagerOptions) {
    this.apiKey = options.apiKey;
    this.apiVersion = options.apiVersion;
    this.betaFeatures = options.betaFeatures ?? [];
    this.customHeaders = options.customHeaders ?? {};
    this.logger = options.logger ?? new NoopLogger();
    this.validateApiKey();
  }

  validateApiKey(): void {
    if (this.apiKey.trim().length === 0) {
      throw new MissingCredentialError('apiKey');
    }

    // Anthropic API keys typically start with 'sk-ant-'
    if (!this.apiKey.startsWith('sk-ant-')) {
      this.logger.warn('API key does not match expected format (should start with "sk-ant-")');
    }
  }

  getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'x-api-key': this.apiKey,
      'anthropic-version': this.apiVersion,
    };

    if (this.betaFeatures.length > 0) {
      headers['anthropic-beta'] = this.betaFeatures.join(',');
    }

    return { ...headers, ...this.customHeaders };
  }
}

export function createAuthManager(options: AuthManagerOptions): AuthManager {
  return new ApiKeyAuthManager(options);
}
