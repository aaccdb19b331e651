/**
 * 🚦 Sliding-window limiter for end-user requests (batch mode).
 */
export class SlidingWindowRateLimiter {
    private calls: number[] = [];

    constructor(
        private callsPerMinute: number = 30,
        private windowMs: number = 60_000,
        private now: () => number = Date.now
    ) { }

    canMakeRequest(): boolean {
        this.prune();
        return this.calls.length < this.callsPerMinute;
    }

    addCall(): void {
        this.calls.push(this.now());
    }

    /**
     * Milliseconds until a slot frees up (0 when one is free now).
     */
    msUntilSlot(): number {
        this.prune();
        if (this.calls.length < this.callsPerMinute) return 0;
        return Math.max(0, this.calls[0] + this.windowMs - this.now());
    }

    async waitForSlot(): Promise<void> {
        let wait = this.msUntilSlot();
        while (wait > 0) {
            await new Promise((r) => setTimeout(r, wait));
            wait = this.msUntilSlot();
        }
        this.addCall();
    }

    private prune(): void {
        const cutoff = this.now() - this.windowMs;
        this.calls = this.calls.filter((t) => t > cutoff);
    }
}
