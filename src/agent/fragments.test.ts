import { describe, it, expect } from 'vitest';
import type { SDKMessage } from '@anthropic-ai/claude-agent-sdk';
import { extractFragments, renderFragment, renderToolUse } from './fragments.js';

function assistantMessage(content: unknown[]): SDKMessage {
  return {
    type: 'assistant',
    message: { role: 'assistant', content },
    parent_tool_use_id: null,
    session_id: 'session-1',
    uuid: 'uuid-1',
  } as unknown as SDKMessage;
}

describe('extractFragments', () => {
  it('keeps text blocks in order', () => {
    const message = assistantMessage([
      { type: 'text', text: 'first' },
      { type: 'text', text: 'second' },
    ]);

    expect(extractFragments(message, false)).toEqual([
      { type: 'text', text: 'first' },
      { type: 'text', text: 'second' },
    ]);
  });

  it('drops tool use blocks when echo is disabled', () => {
    const message = assistantMessage([
      { type: 'text', text: 'before' },
      { type: 'tool_use', id: 'tu_1', name: 'Bash', input: { command: 'ls' } },
      { type: 'text', text: 'after' },
    ]);

    expect(extractFragments(message, false)).toEqual([
      { type: 'text', text: 'before' },
      { type: 'text', text: 'after' },
    ]);
  });

  it('keeps tool use blocks in place when echo is enabled', () => {
    const message = assistantMessage([
      { type: 'text', text: 'before' },
      { type: 'tool_use', id: 'tu_1', name: 'Read', input: { file_path: '/tmp/a' } },
    ]);

    expect(extractFragments(message, true)).toEqual([
      { type: 'text', text: 'before' },
      { type: 'tool_use', name: 'Read', input: { file_path: '/tmp/a' } },
    ]);
  });

  it('ignores thinking blocks', () => {
    const message = assistantMessage([
      { type: 'thinking', thinking: 'hmm', signature: 'sig' },
      { type: 'text', text: 'answer' },
    ]);

    expect(extractFragments(message, true)).toEqual([{ type: 'text', text: 'answer' }]);
  });

  it('returns nothing for non-assistant messages', () => {
    const result = {
      type: 'result',
      subtype: 'success',
      result: 'done',
    } as unknown as SDKMessage;

    expect(extractFragments(result, true)).toEqual([]);
  });
});

describe('renderToolUse', () => {
  it('renders shell commands with their description', () => {
    expect(renderToolUse('Bash', { command: 'git status', description: 'Show status' })).toEqual([
      '*Bash*',
      '```\n$ git status # Show status\n```',
    ]);
  });

  it('renders shell commands without a description', () => {
    expect(renderToolUse('Bash', { command: 'pwd' })).toEqual(['*Bash*', '```\n$ pwd\n```']);
  });

  it('renders other tools as indented JSON', () => {
    expect(renderToolUse('Read', { file_path: '/tmp/a.txt', limit: 10 })).toEqual([
      '*Read*',
      '```\n{\n  "file_path": "/tmp/a.txt",\n  "limit": 10\n}\n```',
    ]);
  });

  it('keeps non-ASCII characters unescaped', () => {
    expect(renderToolUse('Write', { content: 'こんにちは' })).toEqual([
      '*Write*',
      '```\n{\n  "content": "こんにちは"\n}\n```',
    ]);
  });

  it('falls back to JSON for a shell tool without a command string', () => {
    expect(renderToolUse('Bash', { script: 'ls' })).toEqual([
      '*Bash*',
      '```\n{\n  "script": "ls"\n}\n```',
    ]);
  });
});

describe('renderFragment', () => {
  it('renders text verbatim', () => {
    expect(renderFragment({ type: 'text', text: '  spaced  ' })).toEqual(['  spaced  ']);
  });

  it('renders tool use as header plus block', () => {
    expect(renderFragment({ type: 'tool_use', name: 'Glob', input: { pattern: '*.ts' } })).toEqual([
      '*Glob*',
      '```\n{\n  "pattern": "*.ts"\n}\n```',
    ]);
  });
});
