// src/adapters/database/IDatabase.ts

export type SqlParam = string | number | bigint | Buffer | null;

export interface QueryResult<T> {
    rows: T[];
    rowCount: number;
}

export interface IDatabase {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    query<T>(sql: string, params?: SqlParam[]): Promise<QueryResult<T>>;
    execute(sql: string, params?: SqlParam[]): Promise<number>;
    transaction<T>(callback: (db: IDatabase) => Promise<T>): Promise<T>;
}

export interface IRepository<T> {
    findAll(): Promise<T[]>;
    create(entity: T): Promise<number>;
    createBatch(entities: readonly T[]): Promise<number>;
}
