/**
 * Latest-wins request tokens.
 *
 * Each call to `next()` supersedes every earlier token. A response is
 * applied only while its token is still current; anything else is stale and
 * dropped by the caller.
 */
export class RequestSequencer {
    private latest = 0;

    next(): number {
        this.latest += 1;
        return this.latest;
    }

    isCurrent(token: number): boolean {
        return token === this.latest;
    }

    /** Invalidate all outstanding tokens. */
    cancel(): void {
        this.latest += 1;
    }
}
