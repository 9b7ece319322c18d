/**
 * Sub-samples a loop: due when nothing has been polled yet or a full interval
 * has elapsed since the last successful poll.
 */
export class CadenceGate {
  private lastPollMs: number | null = null;

  constructor(private readonly intervalSeconds: number) {}

  shouldPoll(now: Date): boolean {
    if (this.lastPollMs === null) return true;
    return now.getTime() - this.lastPollMs >= this.intervalSeconds * 1000;
  }

  markPolled(now: Date): void {
    this.lastPollMs = now.getTime();
  }

  get lastPoll(): Date | null {
    return this.lastPollMs === null ? null : new Date(this.lastPollMs);
  }
}
