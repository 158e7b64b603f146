import type { SleeperPort } from '@anomaly-lab/domain';

/**
 * Virtual clock for scenario runs.
 * `now()` advances by `tickMs` per call starting from `epochMs`; `sleep()` moves
 * time forward without waiting, so SLEEP steps mark ordering only.
 */
export class DeterministicClock implements SleeperPort {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 1,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.advance(ms);
  }
}

/** Real elapsed time, for runs where the delay itself is part of the demonstration. */
export class WallClock implements SleeperPort {
  now(): Date {
    return new Date();
  }

  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
