import { OutputFormat, Range, ShiftDefinition } from "../../utils/shared";

/**
 * ============================================================================
 * DEFAULT GENERATOR SETTINGS
 * ============================================================================
 *
 * Values used when the settings document omits a key. Efficiencies and the
 * operator variation are percentages here, as in the settings document; the
 * parameter resolver converts them to fractions.
 *
 * Default day: three shifts, six machines on the 1st shift, four on the 2nd
 * and three overnight. Breaks at +2h and +6h (10 min), lunch at +4h (30 min).
 * ============================================================================
 */

export const DEFAULT_SHIFT_SCHEDULE: ShiftDefinition[] = [
    { name: "1st", startTime: "08:00", endTime: "16:00", activeMachines: 6 },
    { name: "2nd", startTime: "16:00", endTime: "00:00", activeMachines: 4 },
    { name: "3rd", startTime: "00:00", endTime: "08:00", activeMachines: 3 }
];

export interface DefaultSettingsShape {
    workCell: { firstMachineId: string; machineCount: number; defaultMachineEfficiencyPct: number };
    shifts: {
        breakDurationMinutes: number;
        lunchDurationMinutes: number;
        breakAndLunchTimes: number[];
        lunchHour: number;
        shiftStartupDelaySeconds: Range;
    };
    order: { totalParts: number; baseCycleTimeSeconds: number };
    operators: {
        defaultOperatorEfficiencyPct: number;
        baseHandlingTimeSeconds: number;
        resumeDelaySeconds: number;
        operatorEfficiencyVariationPct: number;
    };
    simulation: {
        errorProbability: number;
        errorCycleTimeSeconds: Range;
        lotChangeMinutes: Range;
        lotPrefix: string;
        productId: string;
        maxSimulatedDays: number;
    };
    output: { filename: string; format: OutputFormat };
}

export const DefaultSettings: DefaultSettingsShape = {
    workCell: {
        firstMachineId: "M001",
        machineCount: 6,
        defaultMachineEfficiencyPct: 95.0
    },
    shifts: {
        breakDurationMinutes: 10,
        lunchDurationMinutes: 30,
        breakAndLunchTimes: [2, 4, 6],
        lunchHour: 4,
        shiftStartupDelaySeconds: [30, 180]
    },
    order: {
        totalParts: 2000,
        baseCycleTimeSeconds: 74.0
    },
    operators: {
        defaultOperatorEfficiencyPct: 90.0,
        baseHandlingTimeSeconds: 5.0,
        resumeDelaySeconds: 120,
        operatorEfficiencyVariationPct: 5.0
    },
    simulation: {
        errorProbability: 0.05,
        errorCycleTimeSeconds: [30, 90],
        lotChangeMinutes: [10, 15],
        lotPrefix: "MI",
        productId: "111111111",
        maxSimulatedDays: 3650
    },
    output: {
        filename: "production_data.csv",
        format: "csv"
    }
};
