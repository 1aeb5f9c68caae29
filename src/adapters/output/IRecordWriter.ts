import { IProductionRecord } from '../../domain/models/ProductionRecord';

export interface IRecordWriter {
    /** Writes all records to `target`; nothing is left at `target` if writing fails. */
    write(records: readonly IProductionRecord[], target: string): Promise<void>;
}
