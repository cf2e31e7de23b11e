import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  coerceMeetingPlan,
  coerceTaskPlan,
  parseJsonObject,
} from '../src/services/responseCoercer.js';

const TASK_STEPS = [
  'Step 1: Break down the task into smaller components',
  'Step 2: Prioritize each component',
  'Step 3: Create timeline and deadlines',
  'Step 4: Execute and monitor progress',
];

const MEETING_AGENDA = [
  'Welcome and introductions',
  'Review objectives and goals',
  'Discussion of key topics',
  'Action items and next steps',
];

test('parseJsonObject accepts only a JSON object', () => {
  assert.deepEqual(parseJsonObject('{"a":1}'), { ok: true, value: { a: 1 } });
  assert.deepEqual(parseJsonObject('[1,2]'), { ok: false });
  assert.deepEqual(parseJsonObject('"text"'), { ok: false });
  assert.deepEqual(parseJsonObject('42'), { ok: false });
  assert.deepEqual(parseJsonObject('null'), { ok: false });
  assert.deepEqual(parseJsonObject(''), { ok: false });
  assert.deepEqual(parseJsonObject('{"title": "unterminated"'), { ok: false });
});

test('task text that is not JSON falls back with the raw text as description', () => {
  const raw = 'Here is your plan:\n1. Call the seller  \n2. Book photos ✓';
  const result = coerceTaskPlan(raw);

  assert.equal(result.kind, 'fallback');
  assert.deepEqual(result.value, {
    title: 'Task Organization',
    steps: TASK_STEPS,
    priority: 'Medium',
    estimated_total_time: '2-4 hours',
    description: raw,
  });
});

test('meeting text that is not JSON falls back with the raw text as details', () => {
  const raw = '```json\n{"title": "Kickoff"}\n```';
  const result = coerceMeetingPlan(raw);

  assert.equal(result.kind, 'fallback');
  assert.deepEqual(result.value, {
    title: 'Meeting Planning',
    agenda: MEETING_AGENDA,
    duration: '60 minutes',
    preparation: ['Review relevant documents', 'Prepare questions and talking points'],
    details: raw,
  });
});

test('a JSON array is not accepted as a structured result', () => {
  const result = coerceTaskPlan('["Step 1", "Step 2"]');
  assert.equal(result.kind, 'fallback');
  assert.equal(result.value.description, '["Step 1", "Step 2"]');
});

test('a JSON object is returned unchanged, including unexpected fields and key order', () => {
  const raw = JSON.stringify({
    title: 'Sell the condo',
    steps: [{ step: 'Stage the unit', time_estimate: '2h' }],
    priority: 'High',
    suggested_deadline: '2024-04-01',
    estimated_total_time: '10 hours',
  });
  const result = coerceTaskPlan(raw);

  assert.equal(result.kind, 'parsed');
  assert.deepEqual(result.value, JSON.parse(raw));
  assert.deepEqual(Object.keys(result.value), [
    'title',
    'steps',
    'priority',
    'suggested_deadline',
    'estimated_total_time',
  ]);
});

test('fallback lists are fresh copies on every call', () => {
  const first = coerceTaskPlan('plain text');
  const second = coerceTaskPlan('plain text');
  assert.equal(first.kind, 'fallback');
  assert.equal(second.kind, 'fallback');
  if (first.kind === 'fallback' && second.kind === 'fallback') {
    first.value.steps.push('Step 5: extra');
    assert.equal(second.value.steps.length, 4);
  }
});
