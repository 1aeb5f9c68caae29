// src/adapters/database/repositories/ProductionEventRepository.ts

import { BaseRepository } from './BaseRepository';
import {
    IProductionRecord,
    isErrorCode,
    isProductionStatus,
    NO_ERROR_CODE,
    ProductionStatus
} from '../../../domain/models/ProductionRecord';
import { formatDateTime } from '../../../utils/clock';

export interface IProductionEventRow {
    id: number;
    timestamp: number;
    timestamp_text: string;
    machine_id: string;
    product_id: string;
    lot_number: string;
    cycle_time_seconds: number;
    status: string;
    error_code: string;
    operator_id: string;
}

export class ProductionEventRepository extends BaseRepository<IProductionRecord, IProductionEventRow> {
    protected tableName = 'production_events';
    protected timestampColumn = 'timestamp';

    protected normalize(row: IProductionEventRow): IProductionRecord {
        if (!isProductionStatus(row.status)) {
            throw new Error(`Unknown status "${row.status}" in production_events row ${row.id}`);
        }
        return {
            timestamp: row.timestamp,
            machineId: row.machine_id,
            productId: row.product_id,
            lotNumber: row.lot_number,
            cycleTimeSeconds: row.cycle_time_seconds,
            status: row.status,
            errorCode: isErrorCode(row.error_code) ? row.error_code : NO_ERROR_CODE,
            operatorId: row.operator_id
        };
    }

    public async create(record: IProductionRecord): Promise<number> {
        const sql = `
            INSERT INTO ${this.tableName}
            (timestamp, timestamp_text, machine_id, product_id, lot_number, cycle_time_seconds, status, error_code, operator_id)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        `;

        return this.db.execute(sql, [
            record.timestamp,
            formatDateTime(record.timestamp),
            record.machineId,
            record.productId,
            record.lotNumber,
            record.cycleTimeSeconds,
            record.status,
            record.errorCode,
            record.operatorId
        ]);
    }

    public async countByStatus(status: ProductionStatus): Promise<number> {
        const result = await this.db.query<{ count: number }>(
            `SELECT COUNT(*) as count FROM ${this.tableName} WHERE status = ?`,
            [status]
        );
        return Number(result.rows[0]?.count ?? 0);
    }
}
