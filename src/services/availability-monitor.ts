import type { PageSource } from '../sources/base';
import type { ListingMatch, Result } from '../types/listing';
import type { Config } from '../config';
import type { ListingScanner } from '../filters/listing-scanner';
import type { EmailNotifier } from './email-notifier';
import type { SmsNotifier } from './sms-notifier';
import { logger } from '../utils/logger';

export interface MonitorDependencies {
  source: PageSource;
  scanner: ListingScanner;
  emailNotifier: EmailNotifier;
  smsNotifier: SmsNotifier;
}

/**
 * Runs one fetch → scan → notify cycle against the configured page
 */
export class AvailabilityMonitor {
  private source: PageSource;
  private scanner: ListingScanner;
  private emailNotifier: EmailNotifier;
  private smsNotifier: SmsNotifier;

  constructor(
    private config: Config,
    deps: MonitorDependencies
  ) {
    this.source = deps.source;
    this.scanner = deps.scanner;
    this.emailNotifier = deps.emailNotifier;
    this.smsNotifier = deps.smsNotifier;
  }

  fetchPage(): Promise<Result<string>> {
    return this.source.fetchPage(this.config.monitor.targetUrl);
  }

  scanForMatches(html: string): ListingMatch[] {
    return this.scanner.scan(html);
  }

  notifyEmail(matches: ListingMatch[]): Promise<boolean> {
    return this.emailNotifier.send(matches);
  }

  notifySms(matches: ListingMatch[]): Promise<boolean> {
    return this.smsNotifier.send(matches);
  }

  /**
   * Returns true when availability was detected, whether or not any
   * notification was actually delivered
   */
  async runCycle(): Promise<boolean> {
    logger.info(`Starting ${this.config.monitor.propertyName} ARO monitoring check`);

    const page = await this.fetchPage();
    if (!page.ok) {
      logger.info('No page content this cycle', { reason: page.reason });
      return false;
    }

    const matches = this.scanForMatches(page.value);
    const available = matches.filter(match => match.isAvailable);

    if (available.length === 0) {
      logger.info('No available ARO one-bedroom units found', { matches: matches.length });
      return false;
    }

    logger.info(`🎉 Found ${available.length} available ARO one-bedroom units!`);

    // Both channels are always attempted
    const emailSent = await this.notifyEmail(available);
    const smsSent = await this.notifySms(available);

    if (emailSent || smsSent) {
      logger.info('Notifications sent successfully', { email: emailSent, sms: smsSent });
    } else {
      logger.warn('Failed to send notifications');
    }

    return true;
  }
}
