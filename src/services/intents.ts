import type { CompletionParameters, Intent } from '../types/chat.js';

type CompletionPolicy = Omit<CompletionParameters, 'model'>;

// Fixed per intent; clients cannot override these.
export const COMPLETION_POLICY = {
  chat: { maxTokens: 500, temperature: 0.7 },
  task: { maxTokens: 800, temperature: 0.3 },
  meeting: { maxTokens: 600, temperature: 0.3 },
} as const satisfies Record<Intent, CompletionPolicy>;

export function completionParameters(intent: Intent, model: string): CompletionParameters {
  const policy = COMPLETION_POLICY[intent];
  return { model, maxTokens: policy.maxTokens, temperature: policy.temperature };
}
