import { vi } from 'vitest';
import { createDefaultConfig, type ChatStreamConfig } from '../config/config.js';
import type { PromptVariables, TemplateRenderer } from '../templates/renderer.js';

export { FakeTransportProcess, createMockSpawn, sseEvent, sseTextStream } from './transport-process.mock.js';

export const TEST_API_KEY_VAR = 'TEST_CHAT_API_KEY';

/**
 * Mock factory for test configurations
 */
export function mockConfig(overrides?: Partial<ChatStreamConfig>): ChatStreamConfig {
  return {
    ...createDefaultConfig(),
    url: 'https://llm.example.test/v1/messages',
    apiKeyEnvVar: TEST_API_KEY_VAR,
    model: { name: 'claude-3-haiku-20240307', maxOutputTokens: 4096 },
    betaFeatures: [],
    templates: { directory: '/prompts', system: 'system.txt', user: 'user.txt' },
    ...overrides,
  };
}

/**
 * Environment holding the test API key; `null` leaves it unset
 */
export function mockEnv(apiKey: string | null = 'test-secret'): NodeJS.ProcessEnv {
  return apiKey === null ? {} : { [TEST_API_KEY_VAR]: apiKey };
}

/**
 * Renders `<template path>|<query>` so tests can see which template was used
 */
export function createMockRenderer() {
  const render = vi.fn((templatePath: string, variables: PromptVariables): string =>
    `${templatePath}|${String(variables.query ?? '')}`
  );
  const renderer: TemplateRenderer = { render };
  return { renderer, render };
}
