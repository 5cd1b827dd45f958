import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { SayLanguage, SayVoice } from '../types';

dotenv.config();

// Passed straight through to <Say>; Twilio rejects unknown names when the call is placed.
const sayToken = (v: unknown) => typeof v === 'string' && /^\S+$/.test(v);
const callVoiceSchema = z.custom<SayVoice>(sayToken, { message: 'CALL_VOICE must be a single voice name' });
const callLanguageSchema = z.custom<SayLanguage>(sayToken, { message: 'CALL_LANGUAGE must be a single language code' });
const positiveIntSchema = z.coerce.number().int().positive();
const portSchema = positiveIntSchema.max(65535);
const aiProviderSchema = z.enum(['gemini', 'openai']);

export type AiProviderName = z.infer<typeof aiProviderSchema>;

export interface AppConfig {
  port: number;
  twilio: {
    accountSid: string;
    authToken: string;
    phoneNumber: string;
  };
  call: {
    message: string;
    voice: SayVoice;
    language: SayLanguage;
  };
  ai: {
    provider: AiProviderName;
    apiKey: string;
    model: string;
  } | null;
  callLog: {
    path: string;
  };
  upload: {
    maxFileBytes: number;
  };
}

const defaultModels: Record<AiProviderName, string> = {
  gemini: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
};

function required(env: NodeJS.ProcessEnv, key: string): string {
  const val = env[key];
  if (!val) throw new Error(`Missing required env var: ${key}`);
  return val;
}

function resolveAi(env: NodeJS.ProcessEnv): AppConfig['ai'] {
  const keys: Record<AiProviderName, string> = {
    gemini: env.GEMINI_API_KEY || '',
    openai: env.OPENAI_API_KEY || '',
  };

  let provider: AiProviderName | null = null;
  if (env.AI_PROVIDER) {
    provider = aiProviderSchema.parse(env.AI_PROVIDER);
    if (!keys[provider]) throw new Error(`AI_PROVIDER=${provider} but no API key is set for it`);
  } else if (keys.gemini) {
    provider = 'gemini';
  } else if (keys.openai) {
    provider = 'openai';
  }

  if (!provider) return null;
  return {
    provider,
    apiKey: keys[provider],
    model: env.AI_MODEL || defaultModels[provider],
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: portSchema.parse(env.PORT || 3000),
    twilio: {
      accountSid: required(env, 'TWILIO_ACCOUNT_SID'),
      authToken: required(env, 'TWILIO_AUTH_TOKEN'),
      phoneNumber: required(env, 'TWILIO_PHONE_NUMBER'),
    },
    call: {
      message: env.CALL_MESSAGE || 'Hello, this is a test call from Dialdesk.',
      voice: callVoiceSchema.parse(env.CALL_VOICE || 'alice'),
      language: callLanguageSchema.parse(env.CALL_LANGUAGE || 'en-US'),
    },
    ai: resolveAi(env),
    callLog: {
      path: path.resolve(env.CALL_LOG_PATH || path.join('data', 'calls.json')),
    },
    upload: {
      maxFileBytes: positiveIntSchema.parse(env.UPLOAD_MAX_BYTES || 1024 * 1024),
    },
  };
}
