import type { ChatTurn, IntentRequest } from '../types/chat.js';

/** Only the most recent turns of a client-supplied history reach the model. */
export const HISTORY_LIMIT = 10;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// Local wall-clock time, YYYY-MM-DD
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

// Local wall-clock time, YYYY-MM-DD HH:MM:SS
export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function chatInstruction(now: Date): string {
  return [
    'You are an intelligent AI assistant specialized in real estate and work organization. Your capabilities include:',
    '',
    '1. REAL ESTATE EXPERTISE:',
    '- Help clients find properties based on their preferences',
    '- Provide market insights and property recommendations',
    '- Schedule property viewings and meetings with agents',
    '- Answer questions about buying, selling, and renting',
    '',
    '2. WORK ORGANIZATION:',
    '- Create and manage task lists',
    '- Schedule meetings and appointments',
    '- Set reminders and deadlines',
    '- Organize projects and workflows',
    '- Provide productivity tips and strategies',
    '',
    '3. GENERAL ASSISTANCE:',
    '- Answer questions intelligently',
    '- Provide helpful information and advice',
    '- Maintain context throughout conversations',
    '- Be professional, friendly, and efficient',
    '',
    'Always be helpful, accurate, and maintain a professional tone. When organizing work, be specific about dates, times, and actionable steps. For real estate inquiries, ask relevant questions to better understand client needs.',
    '',
    `Current date and time: ${formatDateTime(now)}`,
  ].join('\n');
}

function taskInstruction(now: Date): string {
  return [
    'You are a work organization expert focused on real estate and business tasks.',
    'Break the task you are given into clear, specific, actionable steps in the order they should be done.',
    '',
    'Respond with a single JSON object and nothing else (no markdown, no code fences), using exactly these fields:',
    '{',
    '  "title": "Task Title",',
    '  "steps": ["Step 1: Description", "Step 2: Description", "Step 3: Description"],',
    '  "priority": "High/Medium/Low",',
    '  "estimated_total_time": "X hours",',
    '  "description": "Brief overview of the task"',
    '}',
    '',
    `Current date: ${formatDate(now)}`,
  ].join('\n');
}

function meetingInstruction(now: Date): string {
  return [
    'You are a meeting planning expert focused on real estate and business meetings. Be professional and thorough.',
    '',
    'Respond with a single JSON object and nothing else (no markdown, no code fences), using exactly these fields:',
    '{',
    '  "title": "Meeting Title",',
    '  "agenda": ["Agenda item 1", "Agenda item 2", "Agenda item 3"],',
    '  "duration": "X minutes/hours",',
    '  "preparation": ["Preparation item 1", "Preparation item 2"],',
    '  "details": "Additional meeting details and recommendations"',
    '}',
    '',
    `Current date and time: ${formatDateTime(now)}`,
  ].join('\n');
}

export function recentHistory(history: readonly ChatTurn[]): ChatTurn[] {
  return history.slice(-HISTORY_LIMIT).map((turn) => ({ role: turn.role, content: turn.content }));
}

/**
 * Builds the message list sent to the completion service: one system turn with the
 * intent's instruction, the recent chat history (chat only), then the caller's content
 * as the final user turn.
 */
export function assembleMessages(request: IntentRequest, now: Date = new Date()): ChatTurn[] {
  switch (request.intent) {
    case 'chat':
      return [
        { role: 'system', content: chatInstruction(now) },
        ...recentHistory(request.history),
        { role: 'user', content: request.message },
      ];
    case 'task':
      return [
        { role: 'system', content: taskInstruction(now) },
        { role: 'user', content: `Please organize this task into actionable steps: "${request.description}"` },
      ];
    case 'meeting':
      return [
        { role: 'system', content: meetingInstruction(now) },
        { role: 'user', content: `Please help plan this meeting: "${request.description}"` },
      ];
  }
}
