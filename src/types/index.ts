import type VoiceResponse from 'twilio/lib/twiml/VoiceResponse';

export type CallStatus = 'completed-initiated' | 'failed';

export interface CallLogEntry {
  number: string;
  status: CallStatus;
  timestamp: string;
  sid?: string;
  error?: string;
}

export type NumberResolution = 'qualified' | 'verified_match' | 'default_country';

export interface NormalizedNumber {
  input: string;
  number: string;
  resolution: NumberResolution;
  matchedVerified?: string;
}

export type RejectionReason = 'too_short' | 'duplicate';

export interface RejectedCandidate {
  input: string;
  reason: RejectionReason;
  detail: string;
}

/** Any voice or language Twilio's `<Say>` takes, Polly and Google voices included. */
export type SayVoice = NonNullable<VoiceResponse.SayAttributes['voice']>;
export type SayLanguage = NonNullable<VoiceResponse.SayAttributes['language']>;

export interface CallMessage {
  text: string;
  voice: SayVoice;
  language: SayLanguage;
}

export interface DispatchResult extends CallLogEntry {
  persisted: boolean;
}

export type CommandAction =
  | { type: 'call_one'; number: string }
  | { type: 'call_all' };
