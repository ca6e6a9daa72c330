import OpenAI from 'openai';
import { IReportProvider, ReportRequest } from '../../core/interfaces/IReportGenerator.js';
import { GenerationError, errorMessage } from '../../core/errors/ResearchErrors.js';
import { REPORT_SYSTEM_PROMPT, buildReportPrompt } from './reportPrompt.js';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

/**
 * The part of the OpenAI SDK this provider calls
 */
export interface ChatCompletionsApi {
  create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
}

export interface OpenAIReportProviderOptions {
  name: 'openai' | 'groq';
  apiKey: string;
  timeoutMs: number;
  maxTokens?: number;
  /** Replaces the SDK client, for tests */
  completions?: ChatCompletionsApi;
}

/**
 * Report provider for OpenAI-compatible chat completion APIs.
 * Groq is served through the same SDK pointed at its compatible endpoint.
 */
export class OpenAIReportProvider implements IReportProvider {
  readonly name: 'openai' | 'groq';
  private readonly completions: ChatCompletionsApi;
  private readonly maxTokens: number;

  constructor(options: OpenAIReportProviderOptions) {
    this.name = options.name;
    this.maxTokens = options.maxTokens ?? 4000;
    this.completions =
      options.completions ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.name === 'groq' ? GROQ_BASE_URL : undefined,
        timeout: options.timeoutMs,
        maxRetries: 2,
      }).chat.completions;
  }

  async generate(request: ReportRequest): Promise<string> {
    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.completions.create({
        model: request.model,
        messages: [
          { role: 'system', content: REPORT_SYSTEM_PROMPT },
          { role: 'user', content: buildReportPrompt(request.rawData, request.query) },
        ],
        max_tokens: this.maxTokens,
        temperature: 0.1,
      });
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      throw new GenerationError(this.name, errorMessage(error), { cause: error, status });
    }

    const content = completion.choices[0]?.message.content;
    if (!content || !content.trim()) {
      throw new GenerationError(this.name, 'no content in completion');
    }
    return content;
  }
}
