/**
 * Response fragments collected while streaming from the agent.
 *
 * A fragment lives for one request only: the gateway collects them in arrival
 * order, renders each one to Slack mrkdwn lines and joins the lines.
 */

import type { SDKMessage } from '@anthropic-ai/claude-agent-sdk';

export type Fragment =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; name: string; input: unknown };

/** Tool whose input is shown as a shell command line */
export const SHELL_TOOL_NAME = 'Bash';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the fragments out of one streamed SDK message.
 *
 * Only assistant messages carry fragments. Tool-use blocks are kept only when
 * `includeToolUse` is set. Thinking and other block kinds are dropped.
 */
export function extractFragments(message: SDKMessage, includeToolUse: boolean): Fragment[] {
  if (message.type !== 'assistant') return [];

  const fragments: Fragment[] = [];
  for (const block of message.message.content) {
    if (block.type === 'text') {
      fragments.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use' && includeToolUse) {
      fragments.push({ type: 'tool_use', name: block.name, input: block.input });
    }
  }
  return fragments;
}

/**
 * Render a tool invocation as a bold header line plus a fenced block.
 *
 * @example
 * renderToolUse('Bash', { command: 'ls', description: 'List files' })
 * // ['*Bash*', '```\n$ ls # List files\n```']
 */
export function renderToolUse(name: string, input: unknown): [string, string] {
  const header = `*${name}*`;

  if (name === SHELL_TOOL_NAME && isRecord(input) && typeof input.command === 'string') {
    const description =
      typeof input.description === 'string' && input.description
        ? ` # ${input.description}`
        : '';
    return [header, `\`\`\`\n$ ${input.command}${description}\n\`\`\``];
  }

  return [header, `\`\`\`\n${JSON.stringify(input ?? {}, null, 2)}\n\`\`\``];
}

export function renderFragment(fragment: Fragment): string[] {
  switch (fragment.type) {
    case 'text':
      return [fragment.text];
    case 'tool_use':
      return renderToolUse(fragment.name, fragment.input);
  }
}
