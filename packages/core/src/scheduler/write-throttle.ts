/**
 * Accumulator that decides when the host's tick and event callbacks should
 * produce a snapshot.
 *
 * Tick deltas are summed as fractional seconds; a write fires once the sum
 * has moved `writeIntervalSeconds` past the previous write. External events
 * nudge the same accumulator by a fixed unit and fire at most once per unit
 * of accumulated time.
 */

export type WriteReason = 'tick' | 'event';

export interface WriteThrottleOptions {
  readonly writeIntervalSeconds: number;
  readonly eventUnit: number;
}

export interface WriteThrottleState {
  readonly accumulated: number;
  readonly lastWriteAt: number;
  readonly lastEventAt: number;
  readonly writes: number;
}

export class WriteThrottle {
  private accumulated = 0;
  private lastWriteAt = 0;
  private lastEventAt = Number.NEGATIVE_INFINITY;
  private writes = 0;

  constructor(
    private readonly trigger: (reason: WriteReason) => void,
    private readonly options: WriteThrottleOptions,
  ) {}

  /**
   * Adds a tick delta. A missing delta counts as one second; non-finite or
   * non-positive deltas are ignored.
   *
   * @returns whether a write was triggered
   */
  advance(deltaSeconds?: number): boolean {
    const delta = deltaSeconds === undefined ? 1 : deltaSeconds;
    if (!Number.isFinite(delta) || delta <= 0) {
      return false;
    }
    this.accumulated += delta;
    if (this.accumulated - this.lastWriteAt < this.options.writeIntervalSeconds) {
      return false;
    }
    return this.fire('tick');
  }

  /**
   * Registers an external event.
   *
   * @returns whether a write was triggered
   */
  nudge(): boolean {
    this.accumulated += this.options.eventUnit;
    if (this.accumulated - this.lastEventAt < this.options.eventUnit) {
      return false;
    }
    this.lastEventAt = this.accumulated;
    return this.fire('event');
  }

  getState(): WriteThrottleState {
    return {
      accumulated: this.accumulated,
      lastWriteAt: this.lastWriteAt,
      lastEventAt: this.lastEventAt,
      writes: this.writes,
    };
  }

  private fire(reason: WriteReason): boolean {
    this.lastWriteAt = this.accumulated;
    this.writes += 1;
    this.trigger(reason);
    return true;
  }
}
