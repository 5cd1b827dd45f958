import Twilio from 'twilio';
import VoiceResponse from 'twilio/lib/twiml/VoiceResponse';
import { AppConfig } from '../config';
import { CallMessage } from '../types';
import { ProviderError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';

const log = logger.child('twilio');

export interface PlaceCallParams {
  from: string;
  to: string;
  message: CallMessage;
}

/** The slice of the telephony provider the dispatcher and matcher rely on. */
export interface TelephonyProvider {
  placeCall(params: PlaceCallParams): Promise<{ sid: string }>;
  listVerifiedNumbers(): Promise<string[]>;
}

interface TwilioRestError extends Error {
  code: number;
  status?: number;
}

function isTwilioRestError(err: unknown): err is TwilioRestError {
  return err instanceof Error && 'code' in err && typeof err.code === 'number';
}

function toProviderError(err: unknown): ProviderError {
  if (isTwilioRestError(err)) {
    return new ProviderError(String(err.code), err.message);
  }
  return new ProviderError('unknown', errorMessage(err));
}

export function buildSayTwiml(message: CallMessage): string {
  const response = new VoiceResponse();
  response.say({ voice: message.voice, language: message.language }, message.text);
  return response.toString();
}

export function createTwilioProvider(twilioConfig: AppConfig['twilio']): TelephonyProvider {
  const client = Twilio(twilioConfig.accountSid, twilioConfig.authToken);

  return {
    async placeCall({ from, to, message }) {
      try {
        const call = await client.calls.create({ to, from, twiml: buildSayTwiml(message) });
        log.info('Outbound call created', { callSid: call.sid, to, providerStatus: call.status });
        return { sid: call.sid };
      } catch (err) {
        const providerError = toProviderError(err);
        log.warn('Outbound call rejected', { to, code: providerError.code, error: providerError.message });
        throw providerError;
      }
    },

    async listVerifiedNumbers() {
      try {
        const callerIds = await client.outgoingCallerIds.list();
        return callerIds.map((c) => c.phoneNumber);
      } catch (err) {
        throw toProviderError(err);
      }
    },
  };
}
