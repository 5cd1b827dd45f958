import { AppConfig } from '../config';
import { createCompletionModel } from '../services/ai';
import { AiCommandResolver } from './ai-resolver';
import { KeywordCommandResolver } from './keyword-resolver';
import { CommandResolver } from './types';

/** AI first when a provider is configured, keyword rules always last. */
export function buildCommandResolvers(aiConfig: AppConfig['ai']): CommandResolver[] {
  const resolvers: CommandResolver[] = [];
  if (aiConfig) resolvers.push(new AiCommandResolver(createCompletionModel(aiConfig)));
  resolvers.push(new KeywordCommandResolver());
  return resolvers;
}

export { interpretCommand } from './interpreter';
export type { Interpretation } from './interpreter';
export { AiCommandResolver } from './ai-resolver';
export { KeywordCommandResolver } from './keyword-resolver';
export type { CommandContext, CommandResolution, CommandResolver } from './types';
