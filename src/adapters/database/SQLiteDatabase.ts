// src/adapters/database/SQLiteDatabase.ts

import Database from 'better-sqlite3';
import { IDatabase, QueryResult, SqlParam } from './IDatabase';
import * as fs from 'fs';
import * as path from 'path';

export const IN_MEMORY = ':memory:';

export class SQLiteDatabase implements IDatabase {
    private db: Database.Database | null = null;
    private readonly filename: string;

    constructor(filename: string = IN_MEMORY) {
        this.filename = filename;
    }

    public async connect(): Promise<void> {
        if (this.db) return;

        if (this.filename !== IN_MEMORY) {
            const dir = path.dirname(this.filename);
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }
        }

        this.db = new Database(this.filename);

        await this.initializeTables();
    }

    public async disconnect(): Promise<void> {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    public async query<T>(sql: string, params: SqlParam[] = []): Promise<QueryResult<T>> {
        if (!this.db) throw new Error('Database not connected');

        const stmt = this.db.prepare<SqlParam[], T>(sql);

        // better-sqlite3: stmt.reader indica se há resultado (SELECT/PRAGMA/CTE)
        if (stmt.reader) {
            const rows = stmt.all(...params);
            return { rows, rowCount: rows.length };
        }

        // INSERT/UPDATE/DELETE: executa e retorna apenas contagem
        const result = stmt.run(...params);
        return { rows: [], rowCount: result.changes };
    }

    public async execute(sql: string, params: SqlParam[] = []): Promise<number> {
        if (!this.db) throw new Error('Database not connected');

        const stmt = this.db.prepare<SqlParam[]>(sql);
        const result = stmt.run(...params);

        return result.changes;
    }

    public async transaction<T>(callback: (db: IDatabase) => Promise<T>): Promise<T> {
        if (!this.db) throw new Error('Database not connected');

        // Implementação async-safe: BEGIN/COMMIT/ROLLBACK explícitos
        this.db.exec('BEGIN');
        try {
            const result = await callback(this);
            this.db.exec('COMMIT');
            return result;
        } catch (error) {
            if (this.db.inTransaction) {
                this.db.exec('ROLLBACK');
            }
            throw error;
        }
    }

    private async initializeTables(): Promise<void> {
        if (!this.db) return;

        // Um registro por ciclo (Complete ou Error)
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS production_events (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                timestamp INTEGER NOT NULL,
                timestamp_text TEXT NOT NULL,
                machine_id TEXT NOT NULL,
                product_id TEXT NOT NULL,
                lot_number TEXT NOT NULL,
                cycle_time_seconds REAL NOT NULL,
                status TEXT NOT NULL,
                error_code TEXT NOT NULL,
                operator_id TEXT NOT NULL
            )
        `);

        this.db.exec(`
            CREATE INDEX IF NOT EXISTS idx_production_events_timestamp ON production_events(timestamp);
            CREATE INDEX IF NOT EXISTS idx_production_events_machine ON production_events(machine_id);
            CREATE INDEX IF NOT EXISTS idx_production_events_lot ON production_events(lot_number);
        `);
    }
}
