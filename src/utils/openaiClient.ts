/**
 * OpenAI client utility
 * One lazily created client for the OpenAI-compatible summarization endpoint
 */

import OpenAI from 'openai';

export interface OpenAIClientConfig {
  apiKey: string | null;
  baseURL: string;
}

class OpenAIClient {
  private static instance: OpenAI | null = null;

  /**
   * Get the shared client, creating it on first access
   * @throws Error when no API key is configured
   */
  static get(config: OpenAIClientConfig): OpenAI {
    if (!this.instance) {
      if (!config.apiKey) {
        throw new Error('OPENROUTER_API_KEY environment variable is missing or empty');
      }
      this.instance = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL
      });
    }
    return this.instance;
  }

  /**
   * Reset the shared instance (useful for testing)
   */
  static reset(): void {
    this.instance = null;
  }

  static isInitialized(): boolean {
    return this.instance !== null;
  }
}

export { OpenAIClient };
