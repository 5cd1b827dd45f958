import { z } from 'zod';
import { CompletionModel } from '../services/ai';
import { AIServiceError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';
import { COMMAND_SYSTEM_PROMPT, buildUserPrompt } from './prompt';
import { CommandContext, CommandResolution, CommandResolver } from './types';

const log = logger.child('ai-resolver');

const aiCommandSchema = z.object({
  action: z.enum(['call_single', 'call_all', 'unknown']),
  number: z.union([z.string(), z.number()]).optional(),
});

/** First flat `{...}` object in a model reply, which may wrap it in prose or fences. */
function extractJsonObject(reply: string): unknown {
  const match = reply.match(/\{[^{}]*\}/);
  if (!match) throw new AIServiceError('No JSON object in model reply');
  try {
    return JSON.parse(match[0]);
  } catch {
    throw new AIServiceError(`Model reply is not valid JSON: ${match[0]}`);
  }
}

export class AiCommandResolver implements CommandResolver {
  readonly name: string;

  constructor(private readonly model: CompletionModel) {
    this.name = `ai(${model.name})`;
  }

  async attempt(text: string, context: CommandContext): Promise<CommandResolution> {
    let parsed: z.infer<typeof aiCommandSchema>;
    try {
      const reply = await this.model.complete(COMMAND_SYSTEM_PROMPT, buildUserPrompt(text, context.availableNumbers));
      const result = aiCommandSchema.safeParse(extractJsonObject(reply));
      if (!result.success) throw new AIServiceError(`Unexpected command shape: ${result.error.message}`);
      parsed = result.data;
    } catch (err) {
      const reason = `AI interpretation failed: ${errorMessage(err)}`;
      log.warn(reason, { model: this.model.name });
      return { kind: 'not_handled', reason };
    }

    if (parsed.action === 'call_all') {
      return { kind: 'resolved', action: { type: 'call_all' } };
    }
    if (parsed.action === 'call_single') {
      const number = String(parsed.number ?? '').replace(/[^\d+]/g, '');
      if (number) return { kind: 'resolved', action: { type: 'call_one', number } };
      return { kind: 'not_handled', reason: 'AI returned call_single without a number' };
    }
    return { kind: 'not_handled', reason: 'AI could not classify the command' };
  }
}
