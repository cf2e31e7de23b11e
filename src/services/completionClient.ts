import OpenAI, { APIConnectionError, APIError, AuthenticationError, RateLimitError } from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { AppConfig } from '../config.js';
import type { ChatTurn, CompletionParameters } from '../types/chat.js';
import {
  AuthenticationFailure,
  RateLimited,
  UpstreamServiceError,
  UpstreamUnavailable,
} from '../utils/errors.js';

export interface CompletionClient {
  /** One call to the completion service; resolves with the first choice's text. */
  complete(messages: ChatTurn[], parameters: CompletionParameters): Promise<string>;
}

export type CompletionResponse = {
  choices: Array<{ message: { content: string | null } }>;
};

/** The slice of `openai.chat.completions` this client calls. */
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): PromiseLike<CompletionResponse>;
}

export function toMessageParams(messages: ChatTurn[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
    }
  });
}

export function toCompletionError(error: unknown): unknown {
  // APIConnectionError extends APIError, so it has to be matched first.
  if (error instanceof AuthenticationError) return new AuthenticationFailure(error.message);
  if (error instanceof RateLimitError) return new RateLimited(error.message);
  if (error instanceof APIConnectionError) return new UpstreamUnavailable(error.message);
  if (error instanceof APIError) return new UpstreamServiceError(error.message);
  return error;
}

export class OpenAiCompletionClient implements CompletionClient {
  constructor(private readonly completions: ChatCompletionsApi) {}

  async complete(messages: ChatTurn[], parameters: CompletionParameters): Promise<string> {
    let response: CompletionResponse;
    try {
      response = await this.completions.create({
        model: parameters.model,
        messages: toMessageParams(messages),
        max_tokens: parameters.maxTokens,
        temperature: parameters.temperature,
      });
    } catch (error) {
      throw toCompletionError(error);
    }

    const [choice] = response.choices;
    if (!choice) {
      throw new UpstreamServiceError('Completion returned no choices');
    }
    return choice.message.content ?? '';
  }
}

/** Returns null when no credential is configured; callers report that as a configuration error. */
export function createCompletionClient(config: AppConfig): CompletionClient | null {
  if (!config.openAiApiKey) return null;
  // The SDK retries twice by default; every call here is a single attempt.
  const openAi = new OpenAI({ apiKey: config.openAiApiKey, maxRetries: 0 });
  return new OpenAiCompletionClient(openAi.chat.completions);
}
