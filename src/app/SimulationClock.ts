import { ShiftWindow } from "../domain/models/ShiftWindow";
import { AvailabilityService } from "../domain/services/AvailabilityService";
import { formatDateTime } from "../utils/clock";

/**
 * Simulated time cursor. Each tick jumps straight to the next event:
 * min(next machine availability, next break start, shift end).
 * No wall-clock pacing.
 */
export class SimulationClock {
  private _now: number;
  private _ticks: number = 0;

  constructor(startTime: number) {
    this._now = startTime;
  }

  get now(): number {
    return this._now;
  }

  get ticks(): number {
    return this._ticks;
  }

  public reset(instant: number): void {
    this._now = instant;
  }

  /** Downtime that belongs to no machine (lot changeover). */
  public advanceBy(ms: number): void {
    this._now += ms;
  }

  /**
   * Linear scan over the active machines; break starts strictly after now
   * cut the step short so machines are caught at the start of a break.
   */
  public selectNextEvent(shift: ShiftWindow, availability: AvailabilityService, activeIds: readonly string[]): number {
    const earliest = availability.earliestAvailable(activeIds, shift.endTime);
    return shift.nextBreakStart(this._now, earliest) ?? earliest;
  }

  /** Moves forward only; returns the new instant. */
  public advanceTo(instant: number): number {
    this._ticks++;
    if (instant > this._now) {
      this._now = instant;
    }
    return this._now;
  }

  public isPast(instant: number): boolean {
    return this._now >= instant;
  }

  public toString(): string {
    return formatDateTime(this._now);
  }
}
