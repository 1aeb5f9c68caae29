// src/adapters/output/SQLiteRecordWriter.ts

import { IRecordWriter } from './IRecordWriter';
import { writeAtomically } from './atomicFile';
import { IProductionRecord } from '../../domain/models/ProductionRecord';
import { SQLiteDatabase } from '../database/SQLiteDatabase';
import { ProductionEventRepository } from '../database/repositories/ProductionEventRepository';

export class SQLiteRecordWriter implements IRecordWriter {
    public async write(records: readonly IProductionRecord[], target: string): Promise<void> {
        await writeAtomically(target, async (tempPath) => {
            const db = new SQLiteDatabase(tempPath);
            await db.connect();
            try {
                const repository = new ProductionEventRepository(db);
                await repository.createBatch(records);
            } finally {
                await db.disconnect();
            }
        });
    }
}
