import { isLogLevel } from '../utils/logger';
import type { LogLevel } from '../utils/logger';

/**
 * Configuration management
 * All behavior is driven by environment variables; nothing is required.
 * A channel whose settings are missing is simply skipped at send time.
 */

export interface Config {
  // Target page
  monitor: {
    targetUrl: string;
    propertyName: string;
    fetchTimeoutMs: number;
    userAgent: string;
  };

  // Email channel
  email: {
    address?: string;
    password?: string;
    recipient?: string;
    smtpHost: string;
    smtpPort: number;
  };

  // SMS channel
  sms: {
    accountSid?: string;
    authToken?: string;
    fromNumber?: string;
    toNumber?: string;
  };

  // Logging
  logLevel: LogLevel;
  logFile?: string;
}

export const DEFAULT_TARGET_URL = 'https://www.lincolncommonapartments.com/floorplans';
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

function parseString(value: string | undefined): string | undefined;
function parseString(value: string | undefined, defaultValue: string): string;
function parseString(value: string | undefined, defaultValue?: string): string | undefined {
  if (!value || value.trim().length === 0) return defaultValue;
  return value.trim();
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

function parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : defaultValue;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    monitor: {
      targetUrl: parseString(env.MONITOR_URL, DEFAULT_TARGET_URL),
      propertyName: parseString(env.PROPERTY_NAME, 'Lincoln Commons'),
      fetchTimeoutMs: parseNumber(env.FETCH_TIMEOUT_MS, 30000),
      userAgent: parseString(env.USER_AGENT, DEFAULT_USER_AGENT),
    },
    email: {
      address: parseString(env.EMAIL_ADDRESS),
      password: parseString(env.EMAIL_PASSWORD),
      recipient: parseString(env.NOTIFICATION_EMAIL),
      smtpHost: parseString(env.SMTP_HOST, 'smtp.gmail.com'),
      smtpPort: parseNumber(env.SMTP_PORT, 587),
    },
    sms: {
      accountSid: parseString(env.TWILIO_ACCOUNT_SID),
      authToken: parseString(env.TWILIO_AUTH_TOKEN),
      fromNumber: parseString(env.TWILIO_PHONE_NUMBER),
      toNumber: parseString(env.NOTIFICATION_PHONE),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL, 'info'),
    // An explicitly empty LOG_FILE turns file logging off
    logFile: env.LOG_FILE === undefined ? 'aro_monitor.log' : parseString(env.LOG_FILE),
  };
}
