import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './index';

const twilioEnv = {
  TWILIO_ACCOUNT_SID: 'AC-test',
  TWILIO_AUTH_TOKEN: 'test-secret',
  TWILIO_PHONE_NUMBER: '+15005550006',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ ...twilioEnv });
    expect(config.port).toBe(3000);
    expect(config.call).toEqual({
      message: 'Hello, this is a test call from Dialdesk.',
      voice: 'alice',
      language: 'en-US',
    });
    expect(config.ai).toBeNull();
    expect(config.callLog.path).toBe(path.resolve('data', 'calls.json'));
    expect(config.upload.maxFileBytes).toBe(1048576);
  });

  it('requires Twilio credentials', () => {
    expect(() => loadConfig({ TWILIO_ACCOUNT_SID: 'AC-test' })).toThrow('Missing required env var: TWILIO_AUTH_TOKEN');
  });

  it('prefers Gemini when both AI keys are set', () => {
    const config = loadConfig({ ...twilioEnv, GEMINI_API_KEY: 'test-gemini', OPENAI_API_KEY: 'test-openai' });
    expect(config.ai).toEqual({ provider: 'gemini', apiKey: 'test-gemini', model: 'gemini-2.0-flash' });
  });

  it('honours an explicit provider and model', () => {
    const config = loadConfig({
      ...twilioEnv,
      GEMINI_API_KEY: 'test-gemini',
      OPENAI_API_KEY: 'test-openai',
      AI_PROVIDER: 'openai',
      AI_MODEL: 'gpt-4o',
    });
    expect(config.ai).toEqual({ provider: 'openai', apiKey: 'test-openai', model: 'gpt-4o' });
  });

  it('rejects a provider without a key', () => {
    expect(() => loadConfig({ ...twilioEnv, AI_PROVIDER: 'openai' })).toThrow(
      'AI_PROVIDER=openai but no API key is set for it',
    );
  });

  it('accepts Polly voices and any Say language', () => {
    const config = loadConfig({ ...twilioEnv, CALL_VOICE: 'Polly.Aditi', CALL_LANGUAGE: 'hi-IN' });
    expect(config.call).toMatchObject({ voice: 'Polly.Aditi', language: 'hi-IN' });
  });

  it('rejects a voice that is not a single name', () => {
    expect(() => loadConfig({ ...twilioEnv, CALL_VOICE: 'Polly Aditi' })).toThrow('CALL_VOICE must be a single voice name');
  });

  it('reads numeric settings', () => {
    const config = loadConfig({ ...twilioEnv, PORT: '8080', UPLOAD_MAX_BYTES: '2048' });
    expect(config.port).toBe(8080);
    expect(config.upload.maxFileBytes).toBe(2048);
  });

  it('rejects numeric settings that are not positive integers', () => {
    expect(() => loadConfig({ ...twilioEnv, PORT: 'abc' })).toThrow();
    expect(() => loadConfig({ ...twilioEnv, UPLOAD_MAX_BYTES: '1mb' })).toThrow();
    expect(() => loadConfig({ ...twilioEnv, UPLOAD_MAX_BYTES: '-5' })).toThrow();
  });
});
