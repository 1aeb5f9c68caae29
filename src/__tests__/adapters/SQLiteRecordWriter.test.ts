// src/__tests__/adapters/SQLiteRecordWriter.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SQLiteDatabase } from '../../adapters/database/SQLiteDatabase';
import { ProductionEventRepository } from '../../adapters/database/repositories/ProductionEventRepository';
import { SQLiteRecordWriter } from '../../adapters/output/SQLiteRecordWriter';
import { IProductionRecord } from '../../domain/models/ProductionRecord';

function record(minute: number, overrides: Partial<IProductionRecord> = {}): IProductionRecord {
    return {
        timestamp: Date.UTC(2025, 7, 1, 9, minute),
        machineId: 'M001',
        productId: '111111111',
        lotNumber: 'MI250801A01',
        cycleTimeSeconds: 83.45,
        status: 'Complete',
        errorCode: 'N/A',
        operatorId: 'OP4321',
        ...overrides
    };
}

describe('ProductionEventRepository', () => {
    let db: SQLiteDatabase;
    let repository: ProductionEventRepository;

    beforeEach(async () => {
        db = new SQLiteDatabase();
        await db.connect();
        repository = new ProductionEventRepository(db);
    });

    afterEach(async () => {
        await db.disconnect();
    });

    it('should store and read back records in timestamp order', async () => {
        const later = record(5, { machineId: 'M002', status: 'Error', errorCode: 'E002', cycleTimeSeconds: 41.5 });
        const earlier = record(1);

        expect(await repository.createBatch([later, earlier])).toBe(2);
        expect(await repository.findAll()).toEqual([earlier, later]);
        expect(await repository.count()).toBe(2);
    });

    it('should count by status', async () => {
        await repository.createBatch([record(1), record(2, { status: 'Error', errorCode: 'E009' }), record(3)]);

        expect(await repository.countByStatus('Complete')).toBe(2);
        expect(await repository.countByStatus('Error')).toBe(1);
    });

    it('should roll back a failed transaction', async () => {
        await expect(db.transaction(async () => {
            await repository.create(record(1));
            throw new Error('abort');
        })).rejects.toThrow('abort');

        expect(await repository.count()).toBe(0);
    });

    it('should insert nothing for an empty batch', async () => {
        expect(await repository.createBatch([])).toBe(0);
    });

    it('should refuse queries before connecting', async () => {
        const closed = new SQLiteDatabase();
        await expect(closed.query('SELECT 1')).rejects.toThrow('Database not connected');
    });
});

describe('SQLiteRecordWriter', () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sqlite-writer-'));
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should write every record to a database file', async () => {
        const target = path.join(tempDir, 'production_data.db');
        const records = [record(1), record(2, { machineId: 'M003' })];

        await new SQLiteRecordWriter().write(records, target);

        const db = new SQLiteDatabase(target);
        await db.connect();
        try {
            const stored = await new ProductionEventRepository(db).findAll();
            expect(stored).toEqual(records);
            const text = await db.query<{ timestamp_text: string }>('SELECT timestamp_text FROM production_events ORDER BY id');
            expect(text.rows.map(r => r.timestamp_text)).toEqual(['2025-08-01 09:01:00', '2025-08-01 09:02:00']);
        } finally {
            await db.disconnect();
        }
        expect(fs.readdirSync(tempDir)).toEqual(['production_data.db']);
    });
});
