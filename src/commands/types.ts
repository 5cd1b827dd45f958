import { CommandAction } from '../types';

export interface CommandContext {
  /** Numbers the user has queued on the page, if any. */
  availableNumbers: string[];
}

export type CommandResolution =
  | { kind: 'resolved'; action: CommandAction }
  | { kind: 'not_handled'; reason: string };

export interface CommandResolver {
  readonly name: string;
  attempt(text: string, context: CommandContext): Promise<CommandResolution>;
}
