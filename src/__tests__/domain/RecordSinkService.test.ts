// src/__tests__/domain/RecordSinkService.test.ts

import { describe, it, expect } from 'vitest';
import { RecordSinkService } from '../../domain/services/RecordSinkService';
import { IProductionRecord } from '../../domain/models/ProductionRecord';

function record(overrides: Partial<IProductionRecord>): IProductionRecord {
    return {
        timestamp: Date.UTC(2025, 7, 1, 8, 1),
        machineId: 'M001',
        productId: '111111111',
        lotNumber: 'MI250801A01',
        cycleTimeSeconds: 83.45,
        status: 'Complete',
        errorCode: 'N/A',
        operatorId: 'OP1234',
        ...overrides
    };
}

describe('RecordSinkService', () => {
    it('should store frozen copies', () => {
        const sink = new RecordSinkService();
        const input = record({});
        const stored = sink.append(input);

        expect(stored).not.toBe(input);
        expect(stored).toEqual(input);
        expect(Object.isFrozen(stored)).toBe(true);
        expect(sink.size).toBe(1);
    });

    it('should order by timestamp and keep emission order on ties', () => {
        const sink = new RecordSinkService();
        sink.append(record({ timestamp: 200, machineId: 'M001' }));
        sink.append(record({ timestamp: 100, machineId: 'M002' }));
        sink.append(record({ timestamp: 100, machineId: 'M003' }));

        expect(sink.getOrderedRecords().map(r => r.machineId)).toEqual(['M002', 'M003', 'M001']);
        expect(sink.getEmittedRecords().map(r => r.machineId)).toEqual(['M001', 'M002', 'M003']);
    });

    it('should count records by status', () => {
        const sink = new RecordSinkService();
        sink.append(record({}));
        sink.append(record({ status: 'Error', errorCode: 'E004', cycleTimeSeconds: 45.1 }));
        sink.append(record({}));

        expect(sink.countByStatus('Complete')).toBe(2);
        expect(sink.countByStatus('Error')).toBe(1);
    });

    it('should summarize per machine and per lot', () => {
        const sink = new RecordSinkService();
        sink.append(record({ timestamp: 300 }));
        sink.append(record({ timestamp: 100, machineId: 'M002', status: 'Error', errorCode: 'E001' }));
        sink.append(record({ timestamp: 500, machineId: 'M002', lotNumber: 'MI250802A02' }));

        expect(sink.summarize()).toEqual({
            totalRecords: 3,
            completeCount: 2,
            errorCount: 1,
            firstTimestamp: 100,
            lastTimestamp: 500,
            lots: ['MI250801A01', 'MI250802A02'],
            byMachine: {
                M001: { complete: 1, error: 0 },
                M002: { complete: 1, error: 1 }
            }
        });
    });

    it('should summarize an empty sink', () => {
        const summary = new RecordSinkService().summarize();
        expect(summary.totalRecords).toBe(0);
        expect(summary.firstTimestamp).toBeNull();
        expect(summary.lots).toEqual([]);
    });
});
