import { describe, expect, it } from 'vitest';
import { InMemoryCallLogStore } from '../store/memory-store';
import { CallLogEntry, NormalizedNumber } from '../types';
import { PersistenceError, ProviderError } from '../utils/errors';
import { FakeTelephony, fixedClock, testMessage } from '../testing/fakes';
import { describeProviderError, dispatchCalls } from './call-dispatcher';

function target(number: string): NormalizedNumber {
  return { input: number, number, resolution: 'qualified' };
}

class FailingAppendStore extends InMemoryCallLogStore {
  async append(entry: CallLogEntry): Promise<void> {
    if (entry.number === '+15550000002') throw new PersistenceError('disk full');
    return super.append(entry);
  }
}

describe('dispatchCalls', () => {
  it('places calls in order and records one entry each', async () => {
    const telephony = new FakeTelephony();
    const store = new InMemoryCallLogStore();
    const results = await dispatchCalls([target('+15550000001'), target('+15550000002')], {
      telephony,
      store,
      from: '+15005550006',
      message: testMessage,
      now: fixedClock(),
    });

    expect(telephony.placed.map((p) => p.to)).toEqual(['+15550000001', '+15550000002']);
    expect(telephony.placed[0]).toEqual({ from: '+15005550006', to: '+15550000001', message: testMessage });
    expect(await store.list()).toEqual([
      { number: '+15550000001', status: 'completed-initiated', timestamp: '2024-05-01T12:00:00.000Z', sid: 'CA0001' },
      { number: '+15550000002', status: 'completed-initiated', timestamp: '2024-05-01T12:00:00.000Z', sid: 'CA0002' },
    ]);
    expect(results.every((r) => r.persisted)).toBe(true);
  });

  it('keeps dialing after a provider failure', async () => {
    const telephony = new FakeTelephony({
      failures: { '+15550000002': new ProviderError('20003', 'Authenticate') },
    });
    const store = new InMemoryCallLogStore();
    const targets = ['+15550000001', '+15550000002', '+15550000003'].map(target);

    const results = await dispatchCalls(targets, { telephony, store, from: '+15005550006', message: testMessage });

    expect(telephony.placed).toHaveLength(3);
    expect(results.map((r) => r.status)).toEqual(['completed-initiated', 'failed', 'completed-initiated']);
    expect(results[1]).toMatchObject({ number: '+15550000002', error: 'Authenticate', persisted: true });
    expect(results[1].sid).toBeUndefined();
    expect(results[2].sid).toBe('CA0002');
    expect(await store.list()).toHaveLength(3);
  });

  it('records unexpected errors as failures too', async () => {
    const telephony = new FakeTelephony();
    telephony.placeCall = async () => {
      throw new Error('socket hang up');
    };
    const store = new InMemoryCallLogStore();

    const [result] = await dispatchCalls([target('+15550000001')], { telephony, store, from: '+1', message: testMessage });

    expect(result).toMatchObject({ status: 'failed', error: 'socket hang up' });
  });

  it('reports a failed log write on that item only', async () => {
    const store = new FailingAppendStore();
    const targets = ['+15550000001', '+15550000002', '+15550000003'].map(target);

    const results = await dispatchCalls(targets, {
      telephony: new FakeTelephony(),
      store,
      from: '+15005550006',
      message: testMessage,
    });

    expect(results.map((r) => r.persisted)).toEqual([true, false, true]);
    expect((await store.list()).map((e) => e.number)).toEqual(['+15550000001', '+15550000003']);
  });
});

describe('describeProviderError', () => {
  it('points at the destination number for unverified-number errors', () => {
    const err = new ProviderError('21219', 'The number +919895431875 is unverified. Trial accounts cannot place calls to unverified numbers.');
    expect(describeProviderError(err)).toBe(
      'The number +919895431875 is unverified. Trial accounts cannot place calls to unverified numbers.' +
        ' | Action required: verify the destination number +919895431875 under Verified Caller IDs in the Twilio Console' +
        ' (trial accounts can only call verified numbers)',
    );
  });

  it('points at the caller ID when the source number is the problem', () => {
    const err = new ProviderError('21210', 'Source phone number +15005550006 is not yet verified for your account');
    expect(describeProviderError(err)).toBe(
      'Source phone number +15005550006 is not yet verified for your account' +
        ' | Fix: set TWILIO_PHONE_NUMBER to a number purchased in Twilio (purchased numbers are verified automatically)',
    );
  });

  it('leaves other errors as cleaned text', () => {
    expect(describeProviderError(new ProviderError('20429', 'Too Many\nRequests'))).toBe('Too Many Requests');
  });
});
