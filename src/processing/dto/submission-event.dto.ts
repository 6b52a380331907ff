import { z } from 'zod';

export const SubmissionEventMessageSchema = z.object({
  submission_url: z.string(),
  email: z.string(),
});

/**
 * SNS notification as delivered to a subscribed queue without raw message delivery
 */
export const SnsEnvelopeSchema = z.object({
  Type: z.literal('Notification'),
  Message: z.string(),
});

export type SubmissionEventMessageDto = z.infer<typeof SubmissionEventMessageSchema>;

export function validateSubmissionEventMessage(data: unknown): SubmissionEventMessageDto {
  return SubmissionEventMessageSchema.parse(data);
}

/**
 * Decode a queue message body into a submission event, unwrapping an SNS
 * envelope when present. Throws on malformed JSON or an invalid payload.
 */
export function parseSubmissionEventBody(body: string): SubmissionEventMessageDto {
  const parsed: unknown = JSON.parse(body);
  const envelope = SnsEnvelopeSchema.safeParse(parsed);

  if (envelope.success) {
    return validateSubmissionEventMessage(JSON.parse(envelope.data.Message));
  }

  return validateSubmissionEventMessage(parsed);
}
