// src/adapters/output/CsvRecordWriter.ts

import * as fs from 'fs';
import * as XLSX from 'xlsx';
import { IRecordWriter } from './IRecordWriter';
import { writeAtomically } from './atomicFile';
import { IProductionRecord } from '../../domain/models/ProductionRecord';
import { formatDateTime } from '../../utils/clock';

export const CSV_COLUMNS = [
    'Timestamp',
    'Machine_ID',
    'Product_ID',
    'Lot_Number',
    'Cycle_Time_Seconds',
    'Status',
    'Error_Code',
    'Operator_ID'
] as const;

// Células como texto: o CSV reproduz exatamente o valor formatado
export function toRow(record: IProductionRecord): string[] {
    return [
        formatDateTime(record.timestamp),
        record.machineId,
        record.productId,
        record.lotNumber,
        String(record.cycleTimeSeconds),
        record.status,
        record.errorCode,
        record.operatorId
    ];
}

export function toCsv(records: readonly IProductionRecord[]): string {
    const rows: string[][] = [[...CSV_COLUMNS], ...records.map(toRow)];
    const worksheet = XLSX.utils.aoa_to_sheet(rows);
    return XLSX.utils.sheet_to_csv(worksheet) + '\n';
}

export class CsvRecordWriter implements IRecordWriter {
    public async write(records: readonly IProductionRecord[], target: string): Promise<void> {
        const csv = toCsv(records);
        await writeAtomically(target, async (tempPath) => {
            await fs.promises.writeFile(tempPath, csv, 'utf-8');
        });
    }
}
