import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { Clock } from "./clock";
import { systemClock } from "./clock";

export interface RateGateOptions {
  callsPerPeriod: number;
  periodSeconds: number;
  clock?: Clock;
  logger?: Logger;
}

export interface RateGateStats {
  calls: number;
  waitedMs: number;
}

/**
 * Sliding-window gate shared by every outbound call. Calls are serialised:
 * an invocation waits for the previous one to settle, then for budget in the
 * trailing window, before it starts.
 */
export class RateGate {
  private readonly callsPerPeriod: number;
  private readonly periodMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly startedAt: number[] = [];
  private tail: Promise<void> = Promise.resolve();
  private calls = 0;
  private waitedMs = 0;

  constructor(options: RateGateOptions) {
    if (!Number.isInteger(options.callsPerPeriod) || options.callsPerPeriod < 1) {
      throw new Error(`callsPerPeriod must be a positive integer, got ${options.callsPerPeriod}`);
    }
    if (!(options.periodSeconds > 0)) {
      throw new Error(`periodSeconds must be positive, got ${options.periodSeconds}`);
    }
    this.callsPerPeriod = options.callsPerPeriod;
    this.periodMs = options.periodSeconds * 1000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  invoke<T>(label: string, args: object, operation: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      await this.acquire();
      this.logger.info(`API call: ${label} with params: ${JSON.stringify(args)}`);
      return operation();
    });
    // The caller sees the rejection; the chain only needs to know it settled.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  stats(): RateGateStats {
    return { calls: this.calls, waitedMs: this.waitedMs };
  }

  private async acquire(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.evict(now);
      if (this.startedAt.length < this.callsPerPeriod) {
        this.startedAt.push(now);
        this.calls += 1;
        return;
      }
      const oldest = this.startedAt[0] ?? now;
      const waitMs = Math.max(1, oldest + this.periodMs - now);
      this.logger.debug(`Rate budget exhausted, waiting ${waitMs}ms`);
      this.waitedMs += waitMs;
      await this.clock.sleep(waitMs);
    }
  }

  private evict(now: number): void {
    const cutoff = now - this.periodMs;
    while (this.startedAt.length > 0 && (this.startedAt[0] ?? now) <= cutoff) {
      this.startedAt.shift();
    }
  }
}

export const createRateGate = (options: RateGateOptions): RateGate => new RateGate(options);
