import type { ListingMatch } from '../types/listing';
import type { Config } from '../config';
import { logger } from '../utils/logger';

export interface SmsMessage {
  from: string;
  to: string;
  body: string;
}

/**
 * Sends a text message and resolves with the provider's message id
 */
export interface SmsTransport {
  send(message: SmsMessage): Promise<string>;
}

export type SmsClientFactory = (accountSid: string, authToken: string) => SmsTransport;

/**
 * Whether the optional SMS library could be loaded in this process
 */
export type SmsCapability =
  | { available: true; createClient: SmsClientFactory }
  | { available: false; reason: string };

/**
 * The slice of the twilio SDK the notifier calls. Declared locally so the
 * build does not need the optional package's types.
 */
export interface TwilioClient {
  messages: {
    create(options: { body: string; from: string; to: string }): Promise<{ sid: string }>;
  };
}

export type TwilioSdk = (accountSid: string, authToken: string) => TwilioClient;

// Non-literal specifier keeps the compiler from resolving the package
const TWILIO_MODULE = 'twilio';

function isTwilioSdk(value: unknown): value is TwilioSdk {
  return typeof value === 'function';
}

/**
 * Finds the client factory on a loaded module, whether it arrives as the
 * module itself or as its default export
 */
export function resolveTwilioSdk(loaded: unknown): TwilioSdk {
  if (isTwilioSdk(loaded)) return loaded;
  if (typeof loaded === 'object' && loaded !== null && 'default' in loaded && isTwilioSdk(loaded.default)) {
    return loaded.default;
  }
  throw new Error(`${TWILIO_MODULE} does not export a client factory`);
}

export function createTwilioClientFactory(twilio: TwilioSdk): SmsClientFactory {
  return (accountSid, authToken) => {
    const client = twilio(accountSid, authToken);
    return {
      async send(message) {
        const result = await client.messages.create({
          body: message.body,
          from: message.from,
          to: message.to,
        });
        return result.sid;
      },
    };
  };
}

export async function loadTwilio(
  importModule: () => Promise<unknown> = () => import(TWILIO_MODULE)
): Promise<SmsClientFactory> {
  const loaded = await importModule();
  return createTwilioClientFactory(resolveTwilioSdk(loaded));
}

/**
 * Checks once at startup whether twilio is installed.
 * It is an optional dependency; without it only the SMS channel is lost.
 */
export async function detectSmsCapability(
  load: () => Promise<SmsClientFactory> = loadTwilio
): Promise<SmsCapability> {
  try {
    const createClient = await load();
    return { available: true, createClient };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn('Twilio not installed. SMS notifications disabled.', { reason });
    return { available: false, reason };
  }
}

/**
 * Builds a transport when the library is present and the account is configured
 */
export function createSmsTransport(config: Config, capability: SmsCapability): SmsTransport | null {
  if (!capability.available) return null;

  const { accountSid, authToken } = config.sms;
  if (!accountSid || !authToken) {
    logger.debug('Twilio credentials not configured');
    return null;
  }

  return capability.createClient(accountSid, authToken);
}

/**
 * Sends a short availability alert by SMS
 */
export class SmsNotifier {
  constructor(
    private config: Config,
    private transport: SmsTransport | null
  ) {}

  async send(matches: ListingMatch[]): Promise<boolean> {
    const { fromNumber, toNumber } = this.config.sms;

    if (!this.transport || !fromNumber || !toNumber) {
      logger.warn('SMS configuration incomplete. Skipping SMS notification.');
      return false;
    }

    try {
      const sid = await this.transport.send({
        from: fromNumber,
        to: toNumber,
        body: this.composeBody(matches),
      });

      logger.info(`SMS notification sent to ${toNumber}. SID: ${sid}`);
      return true;
    } catch (error) {
      logger.error('Error sending SMS notification', error, { to: toNumber });
      return false;
    }
  }

  composeBody(matches: ListingMatch[]): string {
    const { propertyName, targetUrl } = this.config.monitor;
    return `🏠 ARO units available at ${propertyName}! ${matches.length} unit(s) found. Check: ${targetUrl}`;
  }
}
