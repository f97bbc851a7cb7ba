/**
 * Email Executor - send mail over SMTP (STARTTLS) with nodemailer
 */

import nodemailer from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type Mail from 'nodemailer/lib/mailer';
import { IToolExecutor, ExecutionResult, ToolContext, buildResult } from './interface';
import { SendEmailParams, SendEmailParamsType } from '../core/schemas';
import { logger, auditLog, describeError } from '../services/logger';
import { DEFAULT_HTTP_TIMEOUT_MS } from '../services/http';

export interface MailTransport {
  sendMail(message: Mail.Options): Promise<unknown>;
}

export type TransportFactory = (options: SMTPTransport.Options) => MailTransport;

const defaultTransportFactory: TransportFactory = (options) => nodemailer.createTransport(options);

// nodemailer error codes that come from the SMTP conversation or its socket
const SMTP_ERROR_CODES = new Set([
  'ECONNECTION',
  'ETIMEDOUT',
  'ESOCKET',
  'EDNS',
  'ETLS',
  'EENVELOPE',
  'EMESSAGE',
  'EPROTOCOL',
  'EREQUIRETLS',
]);

type EmailFailure = 'auth' | 'smtp' | 'other';

export function classifyEmailError(error: unknown): EmailFailure {
  if (typeof error !== 'object' || error === null) return 'other';
  const code = 'code' in error ? error.code : undefined;
  const responseCode = 'responseCode' in error ? error.responseCode : undefined;

  if (code === 'EAUTH' || responseCode === 535) return 'auth';
  if ((typeof code === 'string' && SMTP_ERROR_CODES.has(code)) || typeof responseCode === 'number') {
    return 'smtp';
  }
  return 'other';
}

export interface EmailExecutorOptions {
  host: string;
  port: number;
  user?: string;
  password?: string;
  timeoutMs?: number;
  transportFactory?: TransportFactory;
}

export class EmailExecutor implements IToolExecutor<SendEmailParamsType> {
  readonly id = 'send_email';
  readonly name = 'Email';
  readonly category = 'communication';
  readonly description = 'Send an email through the configured SMTP account';
  readonly schema = SendEmailParams;

  private transportFactory: TransportFactory;

  constructor(private options: EmailExecutorOptions) {
    this.transportFactory = options.transportFactory ?? defaultTransportFactory;
  }

  isConfigured(): boolean {
    return Boolean(this.options.user && this.options.password);
  }

  async execute(params: SendEmailParamsType, context: ToolContext): Promise<ExecutionResult> {
    const startedAt = new Date();
    const { user, password } = this.options;

    if (!user || !password) {
      logger.error('Gmail credentials not found', { turnId: context.turnId });
      return buildResult(this.id, startedAt, 'Email sending failed: Gmail credentials not configured.', {
        code: 'NOT_CONFIGURED',
        recoverable: false,
      });
    }

    const timeoutMs = this.options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

    try {
      const transport = this.transportFactory({
        host: this.options.host,
        port: this.options.port,
        secure: false,
        requireTLS: true,
        auth: { user, pass: password },
        connectionTimeout: timeoutMs,
        greetingTimeout: timeoutMs,
        socketTimeout: timeoutMs,
      });

      await transport.sendMail({
        from: user,
        to: params.to,
        ...(params.cc ? { cc: params.cc } : {}),
        subject: params.subject,
        text: params.body,
      });

      logger.info(`Email sent successfully to ${params.to}`, { turnId: context.turnId });
      auditLog('EMAIL_SENT', { turnId: context.turnId, to: params.to, cc: params.cc, subject: params.subject });
      return buildResult(this.id, startedAt, `Email sent successfully to ${params.to}`);
    } catch (error) {
      const category = classifyEmailError(error);
      const reason = describeError(error);

      switch (category) {
        case 'auth':
          logger.error('Gmail authentication failed', { turnId: context.turnId, to: params.to });
          return buildResult(
            this.id,
            startedAt,
            'Email sending failed: Authentication error. Check Gmail credentials.',
            { code: 'AUTH_FAILED', recoverable: false }
          );
        case 'smtp':
          logger.error('SMTP error', { turnId: context.turnId, to: params.to, error: reason });
          return buildResult(this.id, startedAt, `Email sending failed: SMTP error - ${reason}`, {
            code: 'SMTP_ERROR',
          });
        default:
          logger.error('Error sending email', { turnId: context.turnId, to: params.to, error: reason });
          return buildResult(this.id, startedAt, `An error occurred while sending email: ${reason}`, {
            code: 'EMAIL_ERROR',
          });
      }
    }
  }
}
