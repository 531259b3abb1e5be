import { randomUUID } from 'crypto';
import { SessionNotificationState } from './notification/sessionNotificationState';

export interface ReportSession {
    id: string;
    createdAt: number;
    lastUsedAt: number;
    notification: SessionNotificationState;
}

export interface ReportSessionStoreOptions {
    idleTtlMs?: number;
    now?: () => number;
}

const DEFAULT_IDLE_TTL_MS = 30 * 60 * 1000;

/**
 * In-memory only; sessions vanish with the process. A session idle for longer
 * than `idleTtlMs` is evicted on the next lookup.
 */
export class ReportSessionStore {
    private sessions = new Map<string, ReportSession>();
    private readonly idleTtlMs: number;
    private readonly now: () => number;

    constructor(opts: ReportSessionStoreOptions = {}) {
        this.idleTtlMs = opts.idleTtlMs ?? DEFAULT_IDLE_TTL_MS;
        this.now = opts.now ?? Date.now;
    }

    resolve(id?: string): ReportSession {
        const now = this.now();
        this.evictIdle(now);

        const key = id && id.trim().length > 0 ? id.trim() : randomUUID();
        let session = this.sessions.get(key);
        if (!session) {
            session = { id: key, createdAt: now, lastUsedAt: now, notification: new SessionNotificationState() };
            this.sessions.set(key, session);
            console.log(`[Session] opened ${key}`);
        }
        session.lastUsedAt = now;
        return session;
    }

    get size(): number {
        return this.sessions.size;
    }

    private evictIdle(now: number): void {
        for (const [key, session] of this.sessions) {
            // A send in flight keeps its session alive.
            if (session.notification.pendingSend) continue;
            if (now - session.lastUsedAt > this.idleTtlMs) {
                this.sessions.delete(key);
                console.log(`[Session] evicted idle ${key}`);
            }
        }
    }
}
