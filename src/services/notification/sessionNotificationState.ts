/**
 * Per-session "report already emailed" flag. Starts false, flips to true once
 * after a successful send and has no way back within the session.
 *
 * While a send is in flight, `pendingSend` resolves when it settles, so an
 * overlapping dispatch can wait for the outcome instead of sending again.
 */
export class SessionNotificationState {
    private sent = false;
    private sentAtMs: number | null = null;
    private pending: Promise<void> | null = null;

    get hasSent(): boolean {
        return this.sent;
    }

    get sentAt(): number | null {
        return this.sentAtMs;
    }

    get pendingSend(): Promise<void> | null {
        return this.pending;
    }

    /**
     * Claims the session for one send attempt. The returned callback releases
     * the claim and wakes every waiter; call it exactly once.
     */
    beginSend(): () => void {
        if (this.pending) throw new Error('a send is already in flight for this session');
        let release = () => {};
        this.pending = new Promise<void>(resolve => {
            release = () => resolve();
        });
        return () => {
            this.pending = null;
            release();
        };
    }

    markSent(now: number = Date.now()): void {
        if (this.sent) return;
        this.sent = true;
        this.sentAtMs = now;
    }
}
