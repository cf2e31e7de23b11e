export const CHAT_ROLES = ['system', 'user', 'assistant'] as const;

export type ChatRole = (typeof CHAT_ROLES)[number];

export type ChatTurn = {
  role: ChatRole;
  content: string;
};

export type ChatIntentRequest = {
  intent: 'chat';
  message: string;
  history: ChatTurn[];
};

export type TaskIntentRequest = {
  intent: 'task';
  description: string;
};

export type MeetingIntentRequest = {
  intent: 'meeting';
  description: string;
};

export type IntentRequest = ChatIntentRequest | TaskIntentRequest | MeetingIntentRequest;

export type Intent = IntentRequest['intent'];

export type CompletionParameters = {
  model: string;
  maxTokens: number;
  temperature: number;
};

export type JsonObject = Record<string, unknown>;

export type TaskPlan = {
  title: string;
  steps: string[];
  priority: string;
  estimated_total_time: string;
  description: string;
};

export type MeetingPlan = {
  title: string;
  agenda: string[];
  duration: string;
  preparation: string[];
  details: string;
};

export type StructuredResult<TFallback extends JsonObject> =
  | { kind: 'parsed'; value: JsonObject }
  | { kind: 'fallback'; value: TFallback };

export type ChatReply = {
  response: string;
  status: 'success';
  timestamp: string;
};

export type IntentOutcome =
  | { intent: 'chat'; reply: ChatReply }
  | { intent: 'task'; result: StructuredResult<TaskPlan> }
  | { intent: 'meeting'; result: StructuredResult<MeetingPlan> };
