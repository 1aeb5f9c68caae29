// src/domain/services/LotService.ts

import { ILot } from "../models/Lot";
import { Range } from "../../utils/shared";
import { RandomSource, uniform } from "../../utils/random";
import { convertTime, formatCompactDate, formatUtcDayKey, getUtcHour } from "../../utils/clock";
import { logger } from "../../utils/logger";

export interface LotServiceOptions {
    prefix: string;
    changeoverMinutes: Range;
}

/**
 * Lot manager. A new lot is minted on the first shift of the run and when a
 * shift ends in hour 0 (midnight rollover), at most once per calendar day.
 */
export class LotService {
    private currentLot: ILot | null = null;
    private sequence: number = 0;
    private lastRolloverDay: string | null = null;
    private readonly minted: ILot[] = [];

    constructor(
        private readonly random: RandomSource,
        private readonly options: LotServiceOptions
    ) {}

    /**
     * Mints a new lot when required and returns the changeover downtime in ms
     * (0 when the current lot is kept).
     */
    public maybeRollLot(isFirstShiftOfRun: boolean, shiftEnd: number): number {
        const dayKey = formatUtcDayKey(shiftEnd);
        const midnightRollover = getUtcHour(shiftEnd) === 0 && dayKey !== this.lastRolloverDay;

        if (!isFirstShiftOfRun && this.currentLot !== null && !midnightRollover) {
            return 0;
        }

        this.sequence++;
        const lot: ILot = {
            id: `${this.options.prefix}${formatCompactDate(shiftEnd)}A${this.sequence.toString().padStart(2, "0")}`,
            sequence: this.sequence,
            mintedAt: shiftEnd
        };
        this.currentLot = lot;
        this.lastRolloverDay = dayKey;
        this.minted.push(lot);

        const [min, max] = this.options.changeoverMinutes;
        const changeoverMs = Math.round(convertTime(uniform(this.random, min, max), "m", "ms"));

        logger().info(`[LotService] Lot ${lot.id} started (changeover ${(changeoverMs / 60000).toFixed(1)} min)`);
        return changeoverMs;
    }

    public getCurrentLot(): ILot {
        if (!this.currentLot) {
            throw new Error("No lot has been minted yet");
        }
        return this.currentLot;
    }

    public getMintedLots(): readonly ILot[] {
        return this.minted;
    }
}
