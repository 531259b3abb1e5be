import type { NotificationConfig } from '../config/reportConfig';
import type { PredictionRecord } from '../types';
import { describeError } from './pipelineErrors';
import { renderReport } from './notification/reportRenderer';
import { SessionNotificationState } from './notification/sessionNotificationState';
import { createSmtpMailer, type ReportMailer, type SmtpCredentials } from './notification/smtpMailer';

export type NotificationOutcome =
    | { status: 'ALREADY_SENT'; ok: true; sentAt: number | null }
    | { status: 'SENT'; ok: true; recipients: string[] }
    | { status: 'SKIPPED'; ok: false; reason: string }
    | { status: 'FAILED'; ok: false; error: string };

export type MailerFactory = (config: NotificationConfig, credentials: SmtpCredentials) => ReportMailer;

export interface DispatchRequest {
    records: PredictionRecord[];
    config: NotificationConfig;
    state: SessionNotificationState;
    mailerFactory?: MailerFactory;
}

/**
 * "a@x.com, b@y.com,,bad" -> ["a@x.com", "b@y.com"]. Order kept, duplicates dropped.
 */
export function parseRecipients(list: string | undefined): string[] {
    if (!list) return [];
    const out: string[] = [];
    for (const part of list.split(',')) {
        const addr = part.trim();
        if (addr.length === 0 || !addr.includes('@')) continue;
        if (!out.includes(addr)) out.push(addr);
    }
    return out;
}

export const NotificationDispatcher = {

    /**
     * At most one successful send per session, also across overlapping runs.
     * Failures leave the state unsent so the next run tries again; there is no
     * retry loop in here.
     */
    async dispatch(req: DispatchRequest): Promise<NotificationOutcome> {
        const { records, config, state } = req;

        // Overlapping runs of one session queue behind the send in flight.
        while (state.pendingSend) {
            await state.pendingSend;
        }
        if (state.hasSent) {
            return { status: 'ALREADY_SENT', ok: true, sentAt: state.sentAt };
        }

        const recipients = parseRecipients(config.recipients);
        const missing = [
            !config.senderAddress && 'sender address',
            !config.senderCredential && 'sender credential',
            recipients.length === 0 && 'recipients'
        ].filter((m): m is string => typeof m === 'string');

        if (missing.length > 0 || !config.senderAddress || !config.senderCredential) {
            const reason = `Email not configured (missing ${missing.join(', ')})`;
            console.warn(`[Notify] ${reason}; skipping`);
            return { status: 'SKIPPED', ok: false, reason };
        }
        if (records.length === 0) {
            return { status: 'SKIPPED', ok: false, reason: 'No records to report' };
        }

        const factory = req.mailerFactory ?? createSmtpMailer;
        const release = state.beginSend();
        try {
            const mailer = factory(config, { user: config.senderAddress, pass: config.senderCredential });
            await mailer.send({ from: config.senderAddress, to: recipients, report: renderReport(records) });
            state.markSent();
        } catch (e) {
            const error = describeError(e);
            console.error(`[Notify] send to ${recipients.length} recipient(s) failed: ${error}`);
            return { status: 'FAILED', ok: false, error };
        } finally {
            release();
        }

        console.log(`[Notify] report sent to ${recipients.join(', ')}`);
        return { status: 'SENT', ok: true, recipients };
    }
};
