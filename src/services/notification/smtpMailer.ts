import nodemailer from 'nodemailer';
import type { NotificationConfig } from '../../config/reportConfig';
import type { RenderedReport } from './reportRenderer';

export interface ReportMessage {
    from: string;
    to: string[];
    report: RenderedReport;
}

export interface ReportMailer {
    send(message: ReportMessage): Promise<void>;
}

export interface SmtpCredentials {
    user: string;
    pass: string;
}

/**
 * SMTP over STARTTLS. Port 465 switches to implicit TLS.
 */
export function createSmtpMailer(config: NotificationConfig, credentials: SmtpCredentials): ReportMailer {
    const transporter = nodemailer.createTransport({
        host: config.smtpHost,
        port: config.smtpPort,
        secure: config.smtpPort === 465,
        requireTLS: config.smtpPort !== 465,
        auth: { user: credentials.user, pass: credentials.pass },
        connectionTimeout: config.smtpTimeoutMs,
        greetingTimeout: config.smtpTimeoutMs,
        socketTimeout: config.smtpTimeoutMs
    });

    return {
        async send(message: ReportMessage): Promise<void> {
            await transporter.sendMail({
                from: message.from,
                to: message.to.join(', '),
                subject: message.report.subject,
                text: message.report.text,
                html: message.report.html
            });
        }
    };
}
