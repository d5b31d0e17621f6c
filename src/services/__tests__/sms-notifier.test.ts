import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { SmsNotifier, createSmsTransport, detectSmsCapability, loadTwilio } from '../sms-notifier';
import type { SmsClientFactory, SmsTransport, TwilioClient, TwilioSdk } from '../sms-notifier';
import { loadConfig } from '../../config';
import type { ListingMatch } from '../../types/listing';
import { logger } from '../../utils/logger';

const smsEnv = {
  TWILIO_ACCOUNT_SID: 'ACtest',
  TWILIO_AUTH_TOKEN: 'test-token',
  TWILIO_PHONE_NUMBER: '+15550000001',
  NOTIFICATION_PHONE: '+15550000002',
};

const matches: ListingMatch[] = [
  { category: 'ARO One-Bedroom', isAvailable: true, excerpt: 'ARO 1 bed available', observedAt: new Date() },
  { category: 'ARO One-Bedroom', isAvailable: true, excerpt: 'ARO one bed now', observedAt: new Date() },
];

function fakeTransport(): { send: Mock<SmsTransport['send']> } {
  return { send: vi.fn<SmsTransport['send']>().mockResolvedValue('SMtest') };
}

describe('SmsNotifier', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('skips sending without a transport', async () => {
    const warnSpy = vi.spyOn(logger, 'warn');
    const notifier = new SmsNotifier(loadConfig(smsEnv), null);

    await expect(notifier.send(matches)).resolves.toBe(false);
    expect(warnSpy).toHaveBeenCalledWith('SMS configuration incomplete. Skipping SMS notification.');
  });

  it.each(['TWILIO_PHONE_NUMBER', 'NOTIFICATION_PHONE'] as const)(
    'skips sending when %s is missing',
    async (missing) => {
      const transport = fakeTransport();
      const notifier = new SmsNotifier(loadConfig({ ...smsEnv, [missing]: undefined }), transport);

      await expect(notifier.send(matches)).resolves.toBe(false);
      expect(transport.send).not.toHaveBeenCalled();
    }
  );

  it('sends the match count and page link', async () => {
    const infoSpy = vi.spyOn(logger, 'info');
    const transport = fakeTransport();
    const notifier = new SmsNotifier(loadConfig(smsEnv), transport);

    await expect(notifier.send(matches)).resolves.toBe(true);
    expect(transport.send).toHaveBeenCalledWith({
      from: '+15550000001',
      to: '+15550000002',
      body: '🏠 ARO units available at Lincoln Commons! 2 unit(s) found. Check: https://www.lincolncommonapartments.com/floorplans',
    });
    expect(infoSpy).toHaveBeenCalledWith('SMS notification sent to +15550000002. SID: SMtest');
  });

  it('reports false and logs when the provider rejects the message', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    const failure = new Error('The number is unverified');
    const transport = fakeTransport();
    transport.send.mockRejectedValue(failure);
    const notifier = new SmsNotifier(loadConfig(smsEnv), transport);

    await expect(notifier.send(matches)).resolves.toBe(false);
    expect(errorSpy).toHaveBeenCalledWith('Error sending SMS notification', failure, { to: '+15550000002' });
  });
});

describe('detectSmsCapability', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('disables sms when the library cannot be loaded', async () => {
    const warnSpy = vi.spyOn(logger, 'warn');

    const capability = await detectSmsCapability(async () => {
      throw new Error("Cannot find module 'twilio'");
    });

    expect(capability).toEqual({ available: false, reason: "Cannot find module 'twilio'" });
    expect(warnSpy).toHaveBeenCalledWith('Twilio not installed. SMS notifications disabled.', {
      reason: "Cannot find module 'twilio'",
    });
  });

  it('exposes the client factory when the library loads', async () => {
    const createClient: SmsClientFactory = () => fakeTransport();

    const capability = await detectSmsCapability(async () => createClient);

    expect(capability).toEqual({ available: true, createClient });
  });
});

describe('createSmsTransport', () => {
  it('returns null when sms is unavailable', () => {
    expect(createSmsTransport(loadConfig(smsEnv), { available: false, reason: 'missing' })).toBeNull();
  });

  it('returns null without account credentials', () => {
    const createClient = vi.fn<SmsClientFactory>();

    const transport = createSmsTransport(loadConfig({ ...smsEnv, TWILIO_AUTH_TOKEN: undefined }), {
      available: true,
      createClient,
    });

    expect(transport).toBeNull();
    expect(createClient).not.toHaveBeenCalled();
  });

  it('creates a client from the account credentials', () => {
    const client = fakeTransport();
    const createClient = vi.fn<SmsClientFactory>().mockReturnValue(client);

    const transport = createSmsTransport(loadConfig(smsEnv), { available: true, createClient });

    expect(transport).toBe(client);
    expect(createClient).toHaveBeenCalledWith('ACtest', 'test-token');
  });
});

describe('loadTwilio', () => {
  function fakeSdk() {
    const create = vi.fn<TwilioClient['messages']['create']>().mockResolvedValue({ sid: 'SM123' });
    const sdk = vi.fn<TwilioSdk>().mockReturnValue({ messages: { create } });
    return { sdk, create };
  }

  it('sends through messages.create and resolves with the message sid', async () => {
    const { sdk, create } = fakeSdk();

    const capability = await detectSmsCapability(() => loadTwilio(async () => ({ default: sdk })));
    if (!capability.available) throw new Error(capability.reason);

    const transport = capability.createClient('ACtest', 'test-token');
    const sid = await transport.send({ from: '+15550000001', to: '+15550000002', body: 'ARO units available' });

    expect(sdk).toHaveBeenCalledWith('ACtest', 'test-token');
    expect(create).toHaveBeenCalledWith({ body: 'ARO units available', from: '+15550000001', to: '+15550000002' });
    expect(sid).toBe('SM123');
  });

  it('accepts a module that is itself the client factory', async () => {
    const { sdk } = fakeSdk();

    const createClient = await loadTwilio(async () => sdk);
    await createClient('ACtest', 'test-token').send({ from: '+15550000001', to: '+15550000002', body: 'hi' });

    expect(sdk).toHaveBeenCalledTimes(1);
  });

  it('leaves sms disabled when the module has no client factory', async () => {
    const capability = await detectSmsCapability(() => loadTwilio(async () => ({ version: '5' })));

    expect(capability).toEqual({ available: false, reason: 'twilio does not export a client factory' });
  });
});
