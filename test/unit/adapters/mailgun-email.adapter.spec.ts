import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MailgunEmailAdapter } from '../../../src/infrastructure/adapters/email/mailgun-email.adapter';
import { HttpClientService } from '../../../src/shared/http/http-client.service';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import {
  createConfigService,
  createTestConfig,
  createTestLogger,
} from '../helpers/mock-factories';

describe('MailgunEmailAdapter', () => {
  let httpClient: HttpClientService;
  let logger: PinoLoggerService;
  let adapter: MailgunEmailAdapter;

  const message = {
    from: 'noreply@mg.example.com',
    to: 'user@example.com',
    subject: 'Submission Status',
    text: 'Hey there',
  };

  beforeEach(() => {
    logger = createTestLogger();
    httpClient = new HttpClientService(logger);
    adapter = new MailgunEmailAdapter(httpClient, createConfigService(), logger);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should derive the sender from the domain', () => {
    expect(adapter.defaultSender()).toBe('noreply@mg.example.com');
  });

  describe('send', () => {
    it('should post the form once with basic auth', async () => {
      // Arrange
      const requestSpy = vi.spyOn(httpClient, 'request').mockResolvedValue({
        statusCode: 200,
        headers: {},
        body: { id: '<msg-1@mg.example.com>', message: 'Queued. Thank you.' },
      });

      // Act
      const result = await adapter.send(message);

      // Assert
      expect(result).toEqual({ id: '<msg-1@mg.example.com>', message: 'Queued. Thank you.' });
      expect(requestSpy).toHaveBeenCalledWith('https://api.mailgun.net/v3/mg.example.com/messages', {
        method: 'POST',
        body: 'from=noreply%40mg.example.com&to=user%40example.com&subject=Submission+Status&text=Hey+there',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: 'Basic YXBpOnRlc3Qta2V5',
        },
      });
    });

    it('should not double the slash of an API URL ending in one', async () => {
      const requestSpy = vi.spyOn(httpClient, 'request').mockResolvedValue({
        statusCode: 200,
        headers: {},
        body: { id: '<msg-2@mg.example.com>' },
      });
      const euAdapter = new MailgunEmailAdapter(
        httpClient,
        createConfigService(createTestConfig({ mailgun: { apiUrl: 'https://api.eu.mailgun.net/v3/' } })),
        logger,
      );

      await euAdapter.send(message);

      expect(requestSpy.mock.calls[0][0]).toBe('https://api.eu.mailgun.net/v3/mg.example.com/messages');
    });

    it('should wrap a plain-text reply', async () => {
      vi.spyOn(httpClient, 'request').mockResolvedValue({
        statusCode: 200,
        headers: {},
        body: 'Queued',
      });

      await expect(adapter.send(message)).resolves.toEqual({ message: 'Queued' });
    });

    it('should reject a non-2xx reply with its text', async () => {
      vi.spyOn(httpClient, 'request').mockResolvedValue({
        statusCode: 401,
        headers: {},
        body: 'Forbidden',
      });

      await expect(adapter.send(message)).rejects.toThrow(
        'Mailgun rejected message: HTTP 401 Forbidden',
      );
    });

    it('should reject a non-2xx reply with its JSON message', async () => {
      vi.spyOn(httpClient, 'request').mockResolvedValue({
        statusCode: 400,
        headers: {},
        body: { message: "'to' parameter is not a valid address" },
      });

      await expect(adapter.send(message)).rejects.toThrow(
        "Mailgun rejected message: HTTP 400 'to' parameter is not a valid address",
      );
    });

    it('should reject a non-2xx reply with a null body', async () => {
      vi.spyOn(httpClient, 'request').mockResolvedValue({
        statusCode: 502,
        headers: {},
        body: null,
      });

      await expect(adapter.send(message)).rejects.toThrow('Mailgun rejected message: HTTP 502');
    });

    it('should ignore non-string fields of a JSON reply', async () => {
      vi.spyOn(httpClient, 'request').mockResolvedValue({
        statusCode: 200,
        headers: {},
        body: { id: 17, message: 'Queued' },
      });

      await expect(adapter.send(message)).resolves.toEqual({ id: undefined, message: 'Queued' });
    });

    it('should propagate transport errors', async () => {
      vi.spyOn(httpClient, 'request').mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(adapter.send(message)).rejects.toThrow('connect ECONNREFUSED');
    });
  });
});
