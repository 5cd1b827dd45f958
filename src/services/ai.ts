import OpenAI from 'openai';
import { AppConfig } from '../config';
import { AIServiceError } from '../utils/errors';

const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

/** A single-turn text completion: system instructions plus one user message. */
export interface CompletionModel {
  readonly name: string;
  complete(system: string, user: string): Promise<string>;
}

export function createCompletionModel(aiConfig: NonNullable<AppConfig['ai']>): CompletionModel {
  const openai = new OpenAI({
    apiKey: aiConfig.apiKey,
    baseURL: aiConfig.provider === 'gemini' ? GEMINI_OPENAI_BASE_URL : undefined,
  });

  return {
    name: `${aiConfig.provider}:${aiConfig.model}`,
    async complete(system, user) {
      const response = await openai.chat.completions.create({
        model: aiConfig.model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
        temperature: 0.3,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) throw new AIServiceError(`Empty response from ${aiConfig.model}`);
      return content.trim();
    },
  };
}
