/**
 * Outbound plain-text email
 */
export interface EmailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/**
 * Provider acknowledgement of an accepted message
 */
export interface EmailDeliveryResult {
  id?: string;
  message?: string;
}

/**
 * Email Sender Port (Driven Port)
 * Rejects when the provider cannot be reached or refuses the message
 */
export interface EmailSenderPort {
  send(message: EmailMessage): Promise<EmailDeliveryResult>;

  /**
   * Sender address used for status reports
   */
  defaultSender(): string;
}
