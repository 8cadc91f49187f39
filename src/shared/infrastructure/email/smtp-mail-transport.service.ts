import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as nodemailer from 'nodemailer';
import type { MailMessage, MailTransport } from './mail-transport';

@Injectable()
export class SmtpMailTransport implements MailTransport, OnModuleDestroy {
  private readonly logger = new Logger(SmtpMailTransport.name);
  private readonly transporter: nodemailer.Transporter | null = null;
  private readonly from: string;

  constructor(configService: ConfigService) {
    const emailHost = configService.get<string>('EMAIL_HOST');
    const emailPort = configService.get<number>('EMAIL_PORT', 465);
    const emailUser = configService.get<string>('EMAIL_USER');
    const emailPassword = configService.get<string>('EMAIL_PASSWORD');
    const timeoutMs = configService.get<number>('EMAIL_TIMEOUT_MS', 10_000);
    this.from = configService.get<string>(
      'EMAIL_FROM',
      'noreply@notifications.local',
    );

    if (emailHost) {
      this.transporter = nodemailer.createTransport({
        host: emailHost,
        port: emailPort,
        secure: emailPort === 465, // implicit TLS; other ports upgrade with STARTTLS
        auth:
          emailUser && emailPassword
            ? { user: emailUser, pass: emailPassword }
            : undefined,
        connectionTimeout: timeoutMs,
        greetingTimeout: timeoutMs,
        socketTimeout: timeoutMs,
      });
      this.logger.log(`SMTP transport configured for ${emailHost}:${emailPort}`);
    } else {
      this.logger.warn('EMAIL_HOST is not set; email delivery will fail');
    }
  }

  isConfigured(): boolean {
    return this.transporter !== null;
  }

  async send(message: MailMessage): Promise<{ messageId: string }> {
    if (!this.transporter) {
      throw new Error('SMTP transport is not configured');
    }

    const info = await this.transporter.sendMail({
      from: this.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
      html: message.html,
    });

    this.logger.debug(`Email sent to ${message.to}: ${info.messageId}`);
    return { messageId: info.messageId };
  }

  onModuleDestroy(): void {
    this.transporter?.close();
  }
}
