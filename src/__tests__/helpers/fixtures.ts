// src/__tests__/helpers/fixtures.ts

import { RandomSource } from '../../utils/random';
import { SimulationParameters } from '../../utils/shared';

/**
 * Returns the scripted values in order, then `fallback` forever.
 */
export class ScriptedRandom implements RandomSource {
    private index = 0;

    constructor(private readonly values: number[], private readonly fallback: number = 0.5) {}

    public next(): number {
        if (this.index < this.values.length) {
            return this.values[this.index++];
        }
        return this.fallback;
    }

    public get consumed(): number {
        return this.index;
    }
}

export const START_DATE = Date.UTC(2025, 7, 1); // 2025-08-01

export function buildParameters(overrides: Partial<SimulationParameters> = {}): SimulationParameters {
    return {
        firstMachineId: 'M001',
        machineCount: 6,
        defaultMachineEfficiency: 0.95,
        machineEfficiencies: {},
        baseCycleTimeSeconds: 74,
        shiftSchedule: [
            { name: '1st', startTime: '08:00', endTime: '16:00', activeMachines: 6 },
            { name: '2nd', startTime: '16:00', endTime: '00:00', activeMachines: 4 },
            { name: '3rd', startTime: '00:00', endTime: '08:00', activeMachines: 3 }
        ],
        breakDurationMinutes: 10,
        lunchDurationMinutes: 30,
        breakAndLunchHours: [2, 4, 6],
        lunchHour: 4,
        shiftStartupDelaySeconds: [30, 180],
        totalParts: 200,
        defaultOperatorEfficiency: 0.9,
        baseHandlingTimeSeconds: 5,
        resumeDelaySeconds: 120,
        operatorEfficiencyVariation: 0.05,
        startDate: START_DATE,
        seed: 1234,
        errorProbability: 0.05,
        errorCycleTimeSeconds: [30, 90],
        lotChangeMinutes: [10, 15],
        lotPrefix: 'MI',
        productId: '111111111',
        maxSimulatedDays: 3650,
        output: { filename: 'production_data.csv', format: 'csv' },
        ...overrides
    };
}
