import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../../config/configuration';
import {
  EmailDeliveryResult,
  EmailMessage,
  EmailSenderPort,
} from '../../../application/ports/output/email-sender.port';
import { HttpClientService } from '../../../shared/http/http-client.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Mailgun Email Adapter
 * Implements EmailSenderPort with the Mailgun messages API:
 * `POST {apiUrl}/{domain}/messages`, basic auth `api:{apiKey}`, form-encoded.
 */
@Injectable()
export class MailgunEmailAdapter implements EmailSenderPort {
  private readonly logger: PinoLoggerService;
  private readonly mailgunConfig: AppConfig['mailgun'];

  constructor(
    private readonly httpClient: HttpClientService,
    configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    this.mailgunConfig = configService.get('mailgun', { infer: true });
    this.logger = logger.forContext(MailgunEmailAdapter.name);
  }

  defaultSender(): string {
    return `noreply@${this.mailgunConfig.domain}`;
  }

  async send(message: EmailMessage): Promise<EmailDeliveryResult> {
    const url = `${this.mailgunConfig.apiUrl.replace(/\/+$/, '')}/${this.mailgunConfig.domain}/messages`;
    const credentials = Buffer.from(`api:${this.mailgunConfig.apiKey}`).toString('base64');

    const response = await this.httpClient.postForm(
      url,
      {
        from: message.from,
        to: message.to,
        subject: message.subject,
        text: message.text,
      },
      {
        headers: { Authorization: `Basic ${credentials}` },
      },
    );

    const result = toDeliveryResult(response.body);

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new Error(
        `Mailgun rejected message: HTTP ${response.statusCode}${result.message ? ` ${result.message}` : ''}`,
      );
    }

    this.logger.debug({ providerMessageId: result.id }, 'Mailgun accepted message');
    return result;
  }
}

/**
 * Mailgun answers with `{id, message}` JSON, plain text or, on some errors,
 * an empty or `null` body.
 */
function toDeliveryResult(body: unknown): EmailDeliveryResult {
  if (typeof body === 'string') {
    return body.length > 0 ? { message: body } : {};
  }

  if (typeof body !== 'object' || body === null) {
    return {};
  }

  return {
    id: 'id' in body && typeof body.id === 'string' ? body.id : undefined,
    message: 'message' in body && typeof body.message === 'string' ? body.message : undefined,
  };
}
