import { OpenAI } from 'openai';
import { createLogger, Logger } from '../utils/logger';

export interface GenerationRequest {
  /** System message */
  instructions: string;
  /** User message carrying the transcript */
  prompt: string;
}

/**
 * Text-generation backend used by the summary assembler
 */
export interface SummaryGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

export interface OpenAIGeneratorConfig {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
}

/**
 * One chat-completions call per summary. The SDK's own retries are disabled:
 * a failed generation is reported to the operator instead.
 */
export class OpenAISummaryGenerator implements SummaryGenerator {
  private openai: OpenAI;
  private logger: Logger;
  private config: Required<OpenAIGeneratorConfig>;

  constructor(config: OpenAIGeneratorConfig) {
    this.config = {
      model: 'gpt-4o-mini',
      timeoutMs: 60000,
      maxTokens: 1500,
      temperature: 0.3,
      ...config,
    };

    this.openai = new OpenAI({
      apiKey: this.config.apiKey,
      timeout: this.config.timeoutMs,
      maxRetries: 0,
    });

    this.logger = createLogger('OpenAISummaryGenerator');
  }

  async generate(request: GenerationRequest): Promise<string> {
    const startedAt = Date.now();

    const response = await this.openai.chat.completions.create({
      model: this.config.model,
      messages: [
        { role: 'system', content: request.instructions },
        { role: 'user', content: request.prompt },
      ],
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    });

    this.logger.debug('Completion received', {
      model: this.config.model,
      promptLength: request.prompt.length,
      durationMs: Date.now() - startedAt,
      totalTokens: response.usage?.total_tokens,
    });

    return response.choices[0]?.message?.content ?? '';
  }

  getModel(): string {
    return this.config.model;
  }
}
