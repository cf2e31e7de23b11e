import type { IntentOutcome, IntentRequest } from '../types/chat.js';
import { UpstreamError } from '../utils/errors.js';
import type { CompletionClient } from './completionClient.js';
import { completionParameters } from './intents.js';
import { assembleMessages } from './prompts.js';
import { coerceMeetingPlan, coerceTaskPlan } from './responseCoercer.js';

interface Logger {
  warn: (obj: unknown, msg?: string) => void;
}

export interface AssistantContext {
  client: CompletionClient;
  model: string;
  logger: Logger;
  now?: () => Date;
}

export async function runIntent(request: IntentRequest, context: AssistantContext): Promise<IntentOutcome> {
  const { client, model, logger } = context;
  const now = context.now ?? (() => new Date());

  const messages = assembleMessages(request, now());
  const parameters = completionParameters(request.intent, model);

  let text: string;
  try {
    text = await client.complete(messages, parameters);
  } catch (error) {
    if (error instanceof UpstreamError) {
      logger.warn(
        { intent: request.intent, kind: error.name, upstream: error.upstreamMessage },
        'Completion request failed',
      );
    }
    throw error;
  }

  switch (request.intent) {
    case 'chat':
      return {
        intent: 'chat',
        reply: { response: text, status: 'success', timestamp: now().toISOString() },
      };
    case 'task':
      return { intent: 'task', result: coerceTaskPlan(text) };
    case 'meeting':
      return { intent: 'meeting', result: coerceMeetingPlan(text) };
  }
}
