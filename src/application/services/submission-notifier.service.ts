import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { StatusReportVO } from '../../domain/value-objects/status-report.vo';
import { SubmissionOutcomeVO } from '../../domain/value-objects/submission-outcome.vo';
import { EMAIL_SENDER_PORT } from '../ports/output';
import type { EmailSenderPort } from '../ports/output';

/**
 * Submission Notifier
 * Emails the user the status report for an outcome. Delivery failures are
 * logged and never reach the caller.
 */
@Injectable()
export class SubmissionNotifierService {
  private readonly logger: PinoLoggerService;
  private readonly signature: string;

  constructor(
    @Inject(EMAIL_SENDER_PORT) private readonly emailSender: EmailSenderPort,
    configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    this.signature = configService.get('mailgun.signature', { infer: true });
    this.logger = logger.forContext(SubmissionNotifierService.name);
  }

  /**
   * @returns whether the provider accepted the message
   */
  async notify(outcome: SubmissionOutcomeVO, userEmail: string): Promise<boolean> {
    const report = StatusReportVO.fromOutcome(outcome, this.signature);

    try {
      const result = await this.emailSender.send({
        from: this.emailSender.defaultSender(),
        to: userEmail,
        subject: report.subject,
        text: report.text,
      });

      this.logger.info(
        { status: outcome.status, providerMessageId: result.id },
        'Status email sent',
      );
      return true;
    } catch (error) {
      this.logger.error(
        {
          status: outcome.status,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to send status email',
      );
      return false;
    }
  }
}
