import { CommandAction } from '../types';
import { InputError } from '../utils/errors';
import { logger } from '../utils/logger';
import { CommandContext, CommandResolver } from './types';

const log = logger.child('interpreter');

export type Interpretation =
  | { kind: 'action'; action: CommandAction; resolvedBy: string }
  | { kind: 'not_understood'; reasons: string[] };

/** Try each resolver in order; the first one that handles the text decides. */
export async function interpretCommand(
  text: string,
  context: CommandContext,
  resolvers: readonly CommandResolver[],
): Promise<Interpretation> {
  const command = text.trim();
  if (!command) throw new InputError('Command is empty');

  const reasons: string[] = [];
  for (const resolver of resolvers) {
    const resolution = await resolver.attempt(command, context);
    if (resolution.kind === 'resolved') {
      log.info('Command resolved', { resolver: resolver.name, action: resolution.action.type });
      return { kind: 'action', action: resolution.action, resolvedBy: resolver.name };
    }
    reasons.push(`${resolver.name}: ${resolution.reason}`);
  }

  log.info('Command not understood', { command, reasons });
  return { kind: 'not_understood', reasons };
}
