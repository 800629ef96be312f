/**
 * At most one analysis in flight per requester, so repeating a command
 * doesn't queue up several LLM calls.
 */

export class AnalysisLimiter {
  private readonly inFlight = new Set<number>();

  /** Run `fn` for `userId`; `ran: false` means an earlier run hasn't finished. */
  async run<T>(userId: number, fn: () => Promise<T>): Promise<{ ran: true; value: T } | { ran: false }> {
    if (this.inFlight.has(userId)) return { ran: false };
    this.inFlight.add(userId);
    try {
      return { ran: true, value: await fn() };
    } finally {
      this.inFlight.delete(userId);
    }
  }
}
