// src/domain/factories/ShiftFactory.ts

import { BreakScheduleConfig, ShiftDefinition } from "../../utils/shared";
import { IBreakWindow, ShiftWindow } from "../models/ShiftWindow";
import { ConfigurationError } from "../../utils/errors";
import { convertTime, DAY_MS, parseTimeOfDay, startOfUtcDay } from "../../utils/clock";

interface ParsedShift {
    definition: ShiftDefinition;
    startOffsetMs: number;
    endOffsetMs: number;
}

/**
 * Shift calendar. Turns the configured schedule into concrete shift windows
 * (absolute start/end plus break and lunch windows) for a given day.
 * No randomness: same inputs, same windows.
 */
export class ShiftFactory {
    private readonly shifts: ParsedShift[];
    private readonly breakSchedule: BreakScheduleConfig;

    constructor(schedule: readonly ShiftDefinition[], breakSchedule: BreakScheduleConfig) {
        if (schedule.length === 0) {
            throw new ConfigurationError("shift_schedule must define at least one shift");
        }

        this.shifts = schedule.map((definition, index) => {
            if (!definition.name) {
                throw new ConfigurationError(`shift_schedule[${index}] has no name`);
            }
            if (!Number.isInteger(definition.activeMachines) || definition.activeMachines < 0) {
                throw new ConfigurationError(
                    `shift_schedule[${index}] (${definition.name}): active_machines must be a non-negative integer`
                );
            }
            return {
                definition,
                startOffsetMs: parseTimeOfDay(definition.startTime),
                endOffsetMs: parseTimeOfDay(definition.endTime)
            };
        });

        if (!this.shifts.some(s => s.definition.activeMachines > 0)) {
            throw new ConfigurationError("shift_schedule has no shift with active machines; the order can never be completed");
        }

        this.breakSchedule = breakSchedule;
    }

    public getDefinitions(): ShiftDefinition[] {
        return this.shifts.map(s => s.definition);
    }

    /**
     * Instantiates shift `index` on the day starting at `referenceDay`
     * (UTC midnight). End <= start means the shift ends the next day.
     */
    public createShift(index: number, referenceDay: number): ShiftWindow {
        const parsed = this.shifts[index];
        if (!parsed) throw new Error(`Shift index ${index} out of range`);

        const day = startOfUtcDay(referenceDay);
        const startTime = day + parsed.startOffsetMs;
        let endTime = day + parsed.endOffsetMs;
        if (endTime <= startTime) {
            endTime += DAY_MS;
        }

        return new ShiftWindow({
            name: parsed.definition.name,
            startTime,
            endTime,
            activeMachines: parsed.definition.activeMachines,
            breaks: this.createBreaks(startTime)
        });
    }

    /**
     * Instantiates shift `index` on the date of `cursor`, or on the next day
     * when that would start before `cursor`.
     */
    public createShiftAfter(index: number, cursor: number): ShiftWindow {
        const sameDay = this.createShift(index, cursor);
        if (sameDay.startTime >= cursor) return sameDay;
        return this.createShift(index, startOfUtcDay(cursor) + DAY_MS);
    }

    public createBreaks(shiftStart: number): IBreakWindow[] {
        const { breakAndLunchHours, lunchHour, breakDurationMinutes, lunchDurationMinutes } = this.breakSchedule;

        return breakAndLunchHours.map((hour): IBreakWindow => {
            const isLunch = hour === lunchHour;
            const startTime = shiftStart + Math.round(convertTime(hour, "h", "ms"));
            const minutes = isLunch ? lunchDurationMinutes : breakDurationMinutes;
            return {
                kind: isLunch ? "LUNCH" : "BREAK",
                startTime,
                endTime: startTime + Math.round(convertTime(minutes, "m", "ms"))
            };
        });
    }
}
