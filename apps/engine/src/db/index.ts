/**
 * Connection factories for Postgres and Redis.
 * Components receive these handles through their constructors; nothing here
 * is created at import time.
 */
import fs from 'fs';
import path from 'path';
import Redis from 'ioredis';
import { Pool, QueryResult, QueryResultRow } from 'pg';

/** The query surface repositories need; satisfied by pg's Pool and PoolClient. */
export interface SqlQueryable {
    query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface SqlClient extends SqlQueryable {
    release(): void;
}

export interface SqlPool extends SqlQueryable {
    connect(): Promise<SqlClient>;
}

export const SCHEMA_PATH = path.join(__dirname, 'schema.sql');

/**
 * Postgres connection pool:
 * - max: 20 connections (suitable for moderate load)
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string): Pool {
    return new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

/** Redis client for locks and the dispatcher's result backend. */
export function createRedis(url: string): Redis {
    return new Redis(url, { maxRetriesPerRequest: 3 });
}

/** Idempotent: every statement in schema.sql is IF NOT EXISTS. */
export async function applySchema(pool: SqlQueryable, schemaPath: string = SCHEMA_PATH): Promise<void> {
    const sql = fs.readFileSync(schemaPath, 'utf-8');
    await pool.query(sql);
}
