// src/domain/services/AvailabilityService.ts

import { AvailabilityPhase, Range } from "../../utils/shared";
import { IBreakWindow } from "../models/ShiftWindow";
import { RandomSource, uniform } from "../../utils/random";
import { convertTime } from "../../utils/clock";

export interface AvailabilityServiceOptions {
    startupDelaySeconds: Range;
    resumeDelaySeconds: number;
}

interface MachineAvailability {
    nextAvailable: number;
    phase: AvailabilityPhase;
    restartPending: boolean;
}

const RESUME_DELAY_SPREAD = 0.2;

/**
 * Per-machine availability for the current shift: when each machine may
 * start its next cycle, and in which phase it is.
 */
export class AvailabilityService {
    private readonly states: Map<string, MachineAvailability> = new Map();

    constructor(
        private readonly random: RandomSource,
        private readonly options: AvailabilityServiceOptions
    ) {}

    /**
     * Active machines start after a random startup delay from `startTime`;
     * the others are parked until the shift ends.
     */
    public resetForShift(machineIds: readonly string[], activeIds: readonly string[], startTime: number, shiftEnd: number): void {
        this.states.clear();
        const active = new Set(activeIds);
        const [min, max] = this.options.startupDelaySeconds;

        for (const id of machineIds) {
            if (active.has(id)) {
                const delayMs = Math.round(convertTime(uniform(this.random, min, max), "s", "ms"));
                this.states.set(id, { nextAvailable: startTime + delayMs, phase: "pending-startup", restartPending: false });
            } else {
                this.states.set(id, { nextAvailable: shiftEnd, phase: "shift-ended", restartPending: false });
            }
        }
    }

    private getState(id: string): MachineAvailability {
        const state = this.states.get(id);
        if (!state) throw new Error(`Machine ${id} has no availability state for this shift`);
        return state;
    }

    public getNextAvailable(id: string): number {
        return this.getState(id).nextAvailable;
    }

    public getPhase(id: string): AvailabilityPhase {
        return this.getState(id).phase;
    }

    public isReady(id: string, instant: number): boolean {
        return this.getState(id).nextAvailable <= instant;
    }

    /** Smallest next-available instant among `ids`, capped at `limit`. */
    public earliestAvailable(ids: readonly string[], limit: number): number {
        let earliest = limit;
        for (const id of ids) {
            const next = this.getState(id).nextAvailable;
            if (next < earliest) earliest = next;
        }
        return earliest;
    }

    /** Holds the machine until the break ends; the restart delay follows on exit. */
    public enterBreak(id: string, window: IBreakWindow): void {
        const state = this.getState(id);
        state.nextAvailable = window.endTime;
        state.phase = "on-break";
        state.restartPending = true;
    }

    public isRestartPending(id: string): boolean {
        return this.getState(id).restartPending;
    }

    /**
     * Adds the post-break restart delay, U(0.8r, 1.2r) seconds, once per
     * break exit. Returns the delay in ms.
     */
    public applyRestartDelay(id: string, instant: number): number {
        const state = this.getState(id);
        const mean = this.options.resumeDelaySeconds;
        const seconds = uniform(this.random, mean * (1 - RESUME_DELAY_SPREAD), mean * (1 + RESUME_DELAY_SPREAD));
        const delayMs = Math.round(convertTime(seconds, "s", "ms"));

        state.nextAvailable = instant + delayMs;
        state.phase = "restarting";
        state.restartPending = false;
        return delayMs;
    }

    public completeCycle(id: string, cycleEnd: number): void {
        const state = this.getState(id);
        state.nextAvailable = cycleEnd;
        state.phase = "running";
    }

    public endShift(shiftEnd: number): void {
        for (const state of this.states.values()) {
            state.phase = "shift-ended";
            state.restartPending = false;
            if (state.nextAvailable < shiftEnd) state.nextAvailable = shiftEnd;
        }
    }
}
