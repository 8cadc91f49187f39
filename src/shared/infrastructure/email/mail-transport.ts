export interface MailMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

/**
 * Outbound mail port. Implementations throw on any delivery failure.
 */
export interface MailTransport {
  isConfigured(): boolean;
  send(message: MailMessage): Promise<{ messageId: string }>;
}

export const MAIL_TRANSPORT = Symbol('MAIL_TRANSPORT');
