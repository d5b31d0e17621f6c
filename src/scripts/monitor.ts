import 'dotenv/config';
import { loadConfig } from '../config';
import { HttpPageFetcher } from '../sources/page-fetcher';
import { ListingScanner } from '../filters/listing-scanner';
import { EmailNotifier } from '../services/email-notifier';
import { SmsNotifier, createSmsTransport, detectSmsCapability } from '../services/sms-notifier';
import { AvailabilityMonitor } from '../services/availability-monitor';
import { configureLogger, logger } from '../utils/logger';

/**
 * One-shot availability check
 * Meant to be invoked by cron; exits 0 unless something unexpected throws
 */
async function main(): Promise<void> {
  const config = loadConfig();
  configureLogger({ level: config.logLevel, file: config.logFile });

  logger.info(`=== ${config.monitor.propertyName} ARO Monitor Started ===`);

  const interrupt = (signal: string) => {
    logger.info('Monitoring interrupted by user', { signal });
    process.exit(0);
  };
  process.on('SIGINT', () => interrupt('SIGINT'));
  process.on('SIGTERM', () => interrupt('SIGTERM'));

  const smsCapability = await detectSmsCapability();

  const monitor = new AvailabilityMonitor(config, {
    source: new HttpPageFetcher(config.monitor),
    scanner: new ListingScanner(),
    emailNotifier: new EmailNotifier(config),
    smsNotifier: new SmsNotifier(config, createSmsTransport(config, smsCapability)),
  });

  try {
    const success = await monitor.runCycle();
    logger.info(`Monitoring completed. Success: ${success}`);
  } catch (error) {
    logger.fatal('Unexpected error during monitoring', error);
    process.exit(1);
  }

  logger.info(`=== ${config.monitor.propertyName} ARO Monitor Finished ===`);
  process.exit(0);
}

main().catch((error) => {
  logger.fatal('Fatal startup error', error);
  process.exit(1);
});
