/**
 * Slash-command parser
 *
 *   /new, /reset, /clear [payload]  -> new_conversation
 *   /chat, /talk [payload]          -> force_conversation
 *
 * Commands are matched case-insensitively and must be followed by
 * whitespace or the end of input ("/newest" is not a command).
 */

import type { QueryCommand, QueryCommandType } from '../common/types.js';

const COMMANDS: Record<string, QueryCommandType> = {
  new: 'new_conversation',
  reset: 'new_conversation',
  clear: 'new_conversation',
  chat: 'force_conversation',
  talk: 'force_conversation',
};

export function parseQueryCommand(input: string): QueryCommand | null {
  const trimmed = input.trim();
  const match = /^\/([a-z]+)(?:\s+([\s\S]*))?$/i.exec(trimmed);
  if (!match) return null;

  const name = match[1].toLowerCase();
  const command = Object.prototype.hasOwnProperty.call(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!command) return null;

  return { command, payload: (match[2] ?? '').trim() };
}
