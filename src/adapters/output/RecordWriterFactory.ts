import { IRecordWriter } from './IRecordWriter';
import { CsvRecordWriter } from './CsvRecordWriter';
import { SQLiteRecordWriter } from './SQLiteRecordWriter';
import { OutputFormat } from '../../utils/shared';

export class RecordWriterFactory {
    public static create(format: OutputFormat): IRecordWriter {
        switch (format) {
            case 'csv':
                return new CsvRecordWriter();
            case 'sqlite':
                return new SQLiteRecordWriter();
            default: {
                const unsupported: never = format;
                throw new Error(`Unsupported output format: ${String(unsupported)}`);
            }
        }
    }
}
