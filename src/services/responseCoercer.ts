import type { JsonObject, MeetingPlan, StructuredResult, TaskPlan } from '../types/chat.js';

export type JsonObjectParse = { ok: true; value: JsonObject } | { ok: false };

const TASK_FALLBACK_STEPS = [
  'Step 1: Break down the task into smaller components',
  'Step 2: Prioritize each component',
  'Step 3: Create timeline and deadlines',
  'Step 4: Execute and monitor progress',
] as const;

const MEETING_FALLBACK_AGENDA = [
  'Welcome and introductions',
  'Review objectives and goals',
  'Discussion of key topics',
  'Action items and next steps',
] as const;

const MEETING_FALLBACK_PREPARATION = ['Review relevant documents', 'Prepare questions and talking points'] as const;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Strict parse: the whole text must be JSON and the value a plain object. */
export function parseJsonObject(text: string): JsonObjectParse {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return { ok: false };
  }
  return isJsonObject(value) ? { ok: true, value } : { ok: false };
}

export function taskFallback(rawText: string): TaskPlan {
  return {
    title: 'Task Organization',
    steps: [...TASK_FALLBACK_STEPS],
    priority: 'Medium',
    estimated_total_time: '2-4 hours',
    description: rawText,
  };
}

export function meetingFallback(rawText: string): MeetingPlan {
  return {
    title: 'Meeting Planning',
    agenda: [...MEETING_FALLBACK_AGENDA],
    duration: '60 minutes',
    preparation: [...MEETING_FALLBACK_PREPARATION],
    details: rawText,
  };
}

/**
 * Returns the model's object untouched when the text is a JSON object, otherwise the
 * intent's fallback built around the raw text. The parsed object's fields are not checked.
 */
export function coerceStructured<TFallback extends JsonObject>(
  rawText: string,
  fallback: (rawText: string) => TFallback,
): StructuredResult<TFallback> {
  const parsed = parseJsonObject(rawText);
  if (parsed.ok) {
    return { kind: 'parsed', value: parsed.value };
  }
  return { kind: 'fallback', value: fallback(rawText) };
}

export function coerceTaskPlan(rawText: string): StructuredResult<TaskPlan> {
  return coerceStructured(rawText, taskFallback);
}

export function coerceMeetingPlan(rawText: string): StructuredResult<MeetingPlan> {
  return coerceStructured(rawText, meetingFallback);
}
