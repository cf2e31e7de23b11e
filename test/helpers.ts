import { loadConfig, type AppConfig } from '../src/config.js';
import type { CompletionClient } from '../src/services/completionClient.js';
import type { ChatTurn, CompletionParameters } from '../src/types/chat.js';

export type RecordedCall = {
  messages: ChatTurn[];
  parameters: CompletionParameters;
};

type Responder = (messages: ChatTurn[], parameters: CompletionParameters) => string | Promise<string>;

/** In-process stand-in for the completion service that records every call. */
export class FakeCompletionClient implements CompletionClient {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(messages: ChatTurn[], parameters: CompletionParameters): Promise<string> {
    this.calls.push({ messages, parameters });
    return this.respond(messages, parameters);
  }
}

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    LOG_LEVEL: 'silent',
    OPENAI_API_KEY: 'test-key',
    LLM_MODEL: 'gpt-test',
    ...overrides,
  });
}
