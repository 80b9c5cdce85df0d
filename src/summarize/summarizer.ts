import type { EnvironmentConfig } from '../config/environment';
import { OpenAIClient } from '../utils/openaiClient';
import { logger } from '../utils/logger';

export interface SummarizeOptions {
  /** Ask the model for a JSON object response */
  json?: boolean;
}

/**
 * Black-box text generator behind cluster summaries and the daily digest.
 * Implementations reject on failure; callers decide how to degrade.
 */
export interface Summarizer {
  summarize(prompt: string, options?: SummarizeOptions): Promise<string>;
}

export class OpenRouterSummarizer implements Summarizer {
  constructor(private readonly config: EnvironmentConfig['summarizer']) {}

  async summarize(prompt: string, options: SummarizeOptions = {}): Promise<string> {
    const client = OpenAIClient.get(this.config);
    const response = await client.chat.completions.create({
      model: this.config.model,
      messages: [{ role: 'user', content: prompt }],
      ...(options.json ? { response_format: { type: 'json_object' as const } } : {})
    });

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new Error(`Empty completion from ${this.config.model}`);
    }
    return content;
  }
}

/**
 * Summarizer for the configured endpoint, or null when no API key is set
 */
export function createSummarizer(config: EnvironmentConfig['summarizer']): Summarizer | null {
  if (!config.apiKey) {
    logger.warn('OPENROUTER_API_KEY not set; cluster summaries and digest are disabled');
    return null;
  }
  return new OpenRouterSummarizer(config);
}
