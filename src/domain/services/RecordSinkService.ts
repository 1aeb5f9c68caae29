// src/domain/services/RecordSinkService.ts

import { IProductionRecord, ProductionStatus } from "../models/ProductionRecord";
import { MachineStatusSummary, RunSummary } from "../../utils/shared";

export class RecordSinkService {
    private readonly records: Readonly<IProductionRecord>[] = [];

    public append(record: IProductionRecord): Readonly<IProductionRecord> {
        const frozen = Object.freeze({ ...record });
        this.records.push(frozen);
        return frozen;
    }

    public get size(): number {
        return this.records.length;
    }

    /** Records in emission order (interleaved across machines). */
    public getEmittedRecords(): readonly Readonly<IProductionRecord>[] {
        return this.records;
    }

    /** Records by timestamp ascending; ties keep emission order. */
    public getOrderedRecords(): IProductionRecord[] {
        return [...this.records].sort((a, b) => a.timestamp - b.timestamp);
    }

    public countByStatus(status: ProductionStatus): number {
        let count = 0;
        for (const record of this.records) {
            if (record.status === status) count++;
        }
        return count;
    }

    public summarize(): RunSummary {
        const byMachine: Record<string, MachineStatusSummary> = {};
        const lots: string[] = [];
        let first: number | null = null;
        let last: number | null = null;
        let completeCount = 0;

        for (const record of this.records) {
            const machine = byMachine[record.machineId] ?? { complete: 0, error: 0 };
            if (record.status === "Complete") {
                machine.complete++;
                completeCount++;
            } else {
                machine.error++;
            }
            byMachine[record.machineId] = machine;

            if (!lots.includes(record.lotNumber)) lots.push(record.lotNumber);
            if (first === null || record.timestamp < first) first = record.timestamp;
            if (last === null || record.timestamp > last) last = record.timestamp;
        }

        return {
            totalRecords: this.records.length,
            completeCount,
            errorCount: this.records.length - completeCount,
            firstTimestamp: first,
            lastTimestamp: last,
            lots,
            byMachine
        };
    }
}
