// src/adapters/database/repositories/BaseRepository.ts

import { IDatabase, IRepository } from '../IDatabase';

export abstract class BaseRepository<T, TRow> implements IRepository<T> {
    protected abstract tableName: string;
    protected abstract timestampColumn: string;

    constructor(protected readonly db: IDatabase) {}

    /** Maps a stored row back into the domain shape. */
    protected abstract normalize(row: TRow): T;

    public abstract create(entity: T): Promise<number>;

    public async findAll(): Promise<T[]> {
        const sql = `SELECT * FROM ${this.tableName} ORDER BY ${this.timestampColumn} ASC, id ASC`;
        const result = await this.db.query<TRow>(sql);
        return result.rows.map(r => this.normalize(r));
    }

    public async count(): Promise<number> {
        const result = await this.db.query<{ count: number }>(`SELECT COUNT(*) as count FROM ${this.tableName}`);
        return Number(result.rows[0]?.count ?? 0);
    }

    /**
     * Batch insert multiple entities in a single transaction
     * Returns the number of inserted rows
     */
    public async createBatch(entities: readonly T[]): Promise<number> {
        if (entities.length === 0) return 0;

        return this.db.transaction(async () => {
            let inserted = 0;
            for (const entity of entities) {
                inserted += await this.create(entity);
            }
            return inserted;
        });
    }
}
