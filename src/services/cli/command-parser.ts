import { logger } from '../../config/logger';

export type Command =
  | 'add'
  | 'remove'
  | 'find by name'
  | 'find by phone'
  | 'show all'
  | 'next'
  | 'add phone'
  | 'edit phone'
  | 'remove phone'
  | 'birthday'
  | 'help'
  | 'exit'
  | 'unknown';

/**
 * Accepted spellings, after lowercasing and collapsing whitespace
 */
const COMMAND_KEYWORDS: Record<string, Exclude<Command, 'unknown'>> = {
  add: 'add',
  remove: 'remove',
  'find by name': 'find by name',
  'find by phone': 'find by phone',
  'show all': 'show all',
  next: 'next',
  'add phone': 'add phone',
  'edit phone': 'edit phone',
  'remove phone': 'remove phone',
  birthday: 'birthday',
  help: 'help',
  exit: 'exit',
  quit: 'exit',
};

/**
 * Command Parser
 * Maps a line typed at the prompt to the command it names
 */
export class CommandParser {
  parse(input: string): Command {
    const normalized = input.toLowerCase().trim().replace(/\s+/g, ' ');

    const command = Object.prototype.hasOwnProperty.call(COMMAND_KEYWORDS, normalized)
      ? COMMAND_KEYWORDS[normalized]
      : 'unknown';

    logger.debug({ input: normalized, command }, 'Parsed command');
    return command;
  }

  /**
   * Commands listed by `help`, without aliases
   */
  commands(): Exclude<Command, 'unknown'>[] {
    return [...new Set(Object.values(COMMAND_KEYWORDS))];
  }
}

// Export singleton instance
export const commandParser = new CommandParser();
