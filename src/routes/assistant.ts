import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { isCompletionConfigured, type AppConfig } from '../config.js';
import { runIntent } from '../services/assistantProcessor.js';
import type { CompletionClient } from '../services/completionClient.js';
import {
  CHAT_ROLES,
  type ChatIntentRequest,
  type IntentOutcome,
  type IntentRequest,
  type MeetingIntentRequest,
  type TaskIntentRequest,
} from '../types/chat.js';
import { ConfigurationError, ValidationError } from '../utils/errors.js';

const HistoryTurnSchema = z.object({
  role: z.enum(CHAT_ROLES).optional().default('user'),
  content: z.string().optional().default(''),
});

const ChatBodySchema = z.object({
  message: z.string().optional(),
  history: z.array(HistoryTurnSchema).optional().default([]),
});

const TaskBodySchema = z.object({
  task: z.string().optional(),
  details: z.string().optional(),
});

const MeetingBodySchema = z.object({
  details: z.string().optional(),
  meeting: z.string().optional(),
});

function requireObjectBody(body: unknown): object {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('No data provided');
  }
  return body;
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(requireObjectBody(body));
  if (!parsed.success) {
    throw new ValidationError('Invalid request', parsed.error.issues);
  }
  return parsed.data;
}

// First alias carrying non-blank text wins; the text itself is forwarded as sent.
function firstNonBlank(...candidates: Array<string | undefined>): string | undefined {
  return candidates.find((candidate) => candidate !== undefined && candidate.trim().length > 0);
}

export function parseChatRequest(body: unknown): ChatIntentRequest {
  const data = parseBody(ChatBodySchema, body);
  const message = firstNonBlank(data.message);
  if (message === undefined) {
    throw new ValidationError('No message provided');
  }
  return { intent: 'chat', message, history: data.history };
}

export function parseTaskRequest(body: unknown): TaskIntentRequest {
  const data = parseBody(TaskBodySchema, body);
  const description = firstNonBlank(data.task, data.details);
  if (description === undefined) {
    throw new ValidationError('No task provided');
  }
  return { intent: 'task', description };
}

export function parseMeetingRequest(body: unknown): MeetingIntentRequest {
  const data = parseBody(MeetingBodySchema, body);
  const description = firstNonBlank(data.details, data.meeting);
  if (description === undefined) {
    throw new ValidationError('No meeting details provided');
  }
  return { intent: 'meeting', description };
}

export function toResponseBody(outcome: IntentOutcome) {
  switch (outcome.intent) {
    case 'chat':
      return outcome.reply;
    case 'task':
    case 'meeting':
      return outcome.result.value;
  }
}

const INTENT_ROUTES: Array<{ url: string; parse: (body: unknown) => IntentRequest }> = [
  { url: '/api/chat', parse: parseChatRequest },
  { url: '/api/organize-task', parse: parseTaskRequest },
  { url: '/api/schedule-meeting', parse: parseMeetingRequest },
];

interface RegisterAssistantRoutesOptions {
  config: AppConfig;
  completionClient: CompletionClient | null;
}

export async function registerAssistantRoutes(app: FastifyInstance, options: RegisterAssistantRoutesOptions) {
  const { config, completionClient } = options;

  for (const route of INTENT_ROUTES) {
    app.post(route.url, async (request) => {
      // Validation runs before the credential check so bad input is always a 400.
      const intentRequest = route.parse(request.body);
      if (!isCompletionConfigured(config) || !completionClient) {
        throw new ConfigurationError();
      }

      const outcome = await runIntent(intentRequest, {
        client: completionClient,
        model: config.llmModel,
        logger: request.log,
      });
      return toResponseBody(outcome);
    });
  }
}
