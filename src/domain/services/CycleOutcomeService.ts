// src/domain/services/CycleOutcomeService.ts

import { ERROR_CODES, ErrorCode, NO_ERROR_CODE, ProductionStatus } from "../models/ProductionRecord";
import { Range } from "../../utils/shared";
import { choice, RandomSource, uniform } from "../../utils/random";

export interface CycleOutcomeOptions {
    errorProbability: number;
    errorCycleTimeSeconds: Range;
    baseHandlingTimeSeconds: number;
    operatorEfficiency: number;
    operatorEfficiencyVariation: number;
}

export interface CycleOutcome {
    status: ProductionStatus;
    errorCode: ErrorCode | typeof NO_ERROR_CODE;
    /** Rounded to 2 decimals; this is also how long the machine stays busy. */
    durationSeconds: number;
}

export function roundSeconds(value: number): number {
    return Math.round(value * 100) / 100;
}

export class CycleOutcomeService {
    constructor(
        private readonly random: RandomSource,
        private readonly options: CycleOutcomeOptions
    ) {}

    /**
     * Draws the outcome of one cycle on a machine with the given effective
     * cycle time. Error cycles take U(30, 90) s regardless of machine/operator.
     */
    public drawOutcome(machineCycleTimeSeconds: number): CycleOutcome {
        if (this.random.next() < this.options.errorProbability) {
            const [min, max] = this.options.errorCycleTimeSeconds;
            const durationSeconds = roundSeconds(uniform(this.random, min, max));
            return {
                status: "Error",
                errorCode: choice(this.random, ERROR_CODES),
                durationSeconds
            };
        }

        return {
            status: "Complete",
            errorCode: NO_ERROR_CODE,
            durationSeconds: roundSeconds(machineCycleTimeSeconds + this.drawHandlingTime())
        };
    }

    // (base / eficiência do operador) × U(1 - v, 1 + v)
    public drawHandlingTime(): number {
        const { baseHandlingTimeSeconds, operatorEfficiency, operatorEfficiencyVariation } = this.options;
        const variation = uniform(this.random, 1 - operatorEfficiencyVariation, 1 + operatorEfficiencyVariation);
        return (baseHandlingTimeSeconds / operatorEfficiency) * variation;
    }
}
