import { Inject, Injectable } from '@nestjs/common';
import { SqsMessageHandler } from '@ssut/nestjs-sqs';
import type { Message } from '@aws-sdk/client-sqs';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { PROCESS_SUBMISSION_PORT } from '../../application/ports/input';
import type { ProcessSubmissionPort } from '../../application/ports/input';
import {
  parseSubmissionEventBody,
  SubmissionEventMessageDto,
} from '../dto/submission-event.dto';

export const SUBMISSIONS_QUEUE = 'submissions-queue';

/**
 * Submission Consumer
 * Listens to the submissions queue, one message per handler call
 */
@Injectable()
export class SubmissionConsumer {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(PROCESS_SUBMISSION_PORT)
    private readonly processSubmission: ProcessSubmissionPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(SubmissionConsumer.name);
  }

  @SqsMessageHandler(SUBMISSIONS_QUEUE, false)
  async handleMessage(message: Message): Promise<void> {
    const messageId = message.MessageId || 'unknown';

    let payload: SubmissionEventMessageDto;
    try {
      payload = parseSubmissionEventBody(message.Body || '');
    } catch (error) {
      this.logger.error(
        { messageId, error: error instanceof Error ? error.message : String(error) },
        'Invalid submission message',
      );
      // Return without throwing to delete invalid message
      return;
    }

    try {
      await this.processSubmission.execute({
        submissionUrl: payload.submission_url,
        userEmail: payload.email,
      });
    } catch (error) {
      this.logger.error(
        { messageId, error: error instanceof Error ? error.message : String(error) },
        'Error processing submission',
      );
      // Re-throw to trigger SQS retry (message will not be deleted)
      throw error;
    }
  }
}
