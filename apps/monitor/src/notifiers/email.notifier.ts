import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createTransport, Transporter } from 'nodemailer';
import { Notifier } from '../interfaces/notifier.interface';
import { AlertContent } from '../interfaces/alert.interface';
import { ConfigurationException, NotifierException } from '../exceptions';
import { MONITOR_DEFAULTS, parseList } from '../config/monitor.defaults';
import { errorMessage } from '../utils/guards';
import { buildAlertMessage } from './alert-message.builder';

/**
 * Sends discrepancy alerts by email over SMTP (STARTTLS on 587 by default)
 */
@Injectable()
export class EmailNotifier implements Notifier {
  readonly name = 'email';

  private readonly logger = new Logger(EmailNotifier.name);
  private readonly transporter: Transporter;
  private readonly sender: string;
  private readonly recipients: string[];

  constructor(configService: ConfigService) {
    const sender = configService.get<string>('EMAIL_SENDER');
    const password = configService.get<string>('EMAIL_PASSWORD');
    const recipients = parseList(configService.get<string>('EMAIL_RECIPIENTS', ''));

    if (!sender || !password || recipients.length === 0) {
      throw new ConfigurationException('Email configuration not found in environment variables', [
        'EMAIL_SENDER',
        'EMAIL_PASSWORD',
        'EMAIL_RECIPIENTS',
      ]);
    }

    const port = configService.get<number>('SMTP_PORT', MONITOR_DEFAULTS.SMTP_PORT);
    this.sender = sender;
    this.recipients = recipients;
    this.transporter = createTransport({
      host: configService.get<string>('SMTP_HOST', MONITOR_DEFAULTS.SMTP_HOST),
      port,
      secure: port === 465,
      requireTLS: port !== 465,
      auth: { user: sender, pass: password },
    });
  }

  async notify(content: AlertContent): Promise<void> {
    const message = buildAlertMessage(content);

    try {
      await this.transporter.sendMail({
        from: this.sender,
        to: this.recipients.join(', '),
        subject: message.subject,
        text: message.text,
      });
    } catch (err) {
      throw new NotifierException(
        `Failed to email alert for ${content.symbol}: ${errorMessage(err)}`,
        err instanceof Error ? err : undefined,
      );
    }

    this.logger.log(
      `Alert email for ${content.symbol} sent to ${this.recipients.length} recipient(s)`,
    );
  }
}
