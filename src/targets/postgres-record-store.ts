import { Pool, type PoolConfig } from 'pg';
import { RecordStore, ScanOptions, StoredRecord } from './record-store';

interface RecordRow {
    record_id: string;
    fields: unknown;
    deleted_at: string | null;
}

export interface PostgresRecordStoreOptions {
    pool?: Pool;
    poolConfig?: Omit<PoolConfig, 'connectionString'>;
    schemaName?: string;
    tableName?: string;
    entityTypes?: string[];
}

const DEFAULT_SCHEMA_NAME = 'bulk_engine';
const DEFAULT_TABLE_NAME = 'bulk_records';

function validateSqlIdentifier(
    value: string,
    fieldName: string,
): string {
    const trimmed = String(value || '').trim();

    if (trimmed.length === 0) {
        throw new Error(`${fieldName} is required`);
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(trimmed)) {
        throw new Error(
            `${fieldName} must match [A-Za-z_][A-Za-z0-9_]*`,
        );
    }

    return trimmed;
}

function validateLimit(limit: number): number {
    if (!Number.isInteger(limit) || limit <= 0) {
        throw new Error('scan limit must be a positive integer');
    }

    return limit;
}

function parseFields(raw: unknown): Record<string, unknown> {
    const value: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;

    if (!value || typeof value !== 'object' || Array.isArray(value)) {
        throw new Error('invalid persisted record fields payload');
    }

    return Object.fromEntries(Object.entries(value));
}

function toStoredRecord(row: RecordRow): StoredRecord {
    return {
        id: row.record_id,
        fields: parseFields(row.fields),
        deleted_at: row.deleted_at,
    };
}

function placeholders(count: number, offset: number): string {
    return Array.from(
        { length: count },
        (_, index) => `$${index + offset}`,
    ).join(', ');
}

export class PostgresRecordStore implements RecordStore {
    private readonly configuredEntityTypes: string[] | null;

    private readonly ownsPool: boolean;

    private readonly pool: Pool;

    private readonly ready: Promise<void>;

    private readonly schemaName: string;

    private readonly tableQualified: string;

    constructor(
        pgUrl: string,
        options: PostgresRecordStoreOptions = {},
    ) {
        const connectionString = String(pgUrl || '').trim();
        const tableName = validateSqlIdentifier(
            options.tableName || DEFAULT_TABLE_NAME,
            'record table name',
        );

        this.schemaName = validateSqlIdentifier(
            options.schemaName || DEFAULT_SCHEMA_NAME,
            'record schema name',
        );
        this.tableQualified = `"${this.schemaName}"."${tableName}"`;
        this.configuredEntityTypes = options.entityTypes &&
            options.entityTypes.length > 0
            ? [...options.entityTypes].sort()
            : null;

        if (options.pool) {
            this.pool = options.pool;
            this.ownsPool = false;
        } else {
            if (connectionString.length === 0) {
                throw new Error('BAE_PG_URL is required');
            }

            this.pool = new Pool({
                allowExitOnIdle: true,
                connectionString,
                idleTimeoutMillis:
                    options.poolConfig?.idleTimeoutMillis || 30000,
                max: options.poolConfig?.max || 10,
                ...options.poolConfig,
            });
            this.ownsPool = true;
        }

        this.ready = this.initialize();
    }

    async close(): Promise<void> {
        await this.ready;

        if (!this.ownsPool) {
            return;
        }

        await this.pool.end();
    }

    async listEntityTypes(): Promise<string[]> {
        await this.ready;

        if (this.configuredEntityTypes) {
            return [...this.configuredEntityTypes];
        }

        const result = await this.pool.query<{ entity_type: string }>(
            `SELECT DISTINCT entity_type
            FROM ${this.tableQualified}
            ORDER BY entity_type`,
        );

        return result.rows.map((row) => row.entity_type);
    }

    async hasEntityType(entityType: string): Promise<boolean> {
        const entityTypes = await this.listEntityTypes();

        return entityTypes.includes(entityType);
    }

    async scan(
        entityType: string,
        options: ScanOptions,
    ): Promise<StoredRecord[]> {
        await this.ready;

        const scopeClause = options.scope === 'active'
            ? 'AND deleted_at IS NULL'
            : options.scope === 'deleted'
                ? 'AND deleted_at IS NOT NULL'
                : '';
        const result = await this.pool.query<RecordRow>(
            `SELECT record_id, fields, deleted_at
            FROM ${this.tableQualified}
            WHERE entity_type = $1
                AND record_id > $2
                ${scopeClause}
            ORDER BY record_id ASC
            LIMIT ${validateLimit(options.limit)}`,
            [
                entityType,
                options.afterId || '',
            ],
        );

        return result.rows.map(toStoredRecord);
    }

    async getMany(
        entityType: string,
        ids: string[],
    ): Promise<StoredRecord[]> {
        await this.ready;

        const unique = Array.from(new Set(ids));

        if (unique.length === 0) {
            return [];
        }

        const result = await this.pool.query<RecordRow>(
            `SELECT record_id, fields, deleted_at
            FROM ${this.tableQualified}
            WHERE entity_type = $1
                AND record_id IN (${placeholders(unique.length, 2)})
            ORDER BY record_id ASC`,
            [
                entityType,
                ...unique,
            ],
        );

        return result.rows.map(toStoredRecord);
    }

    async get(entityType: string, id: string): Promise<StoredRecord | null> {
        const [record] = await this.getMany(entityType, [id]);

        return record || null;
    }

    async update(
        entityType: string,
        id: string,
        fields: Record<string, unknown>,
        unset: string[] = [],
    ): Promise<StoredRecord | null> {
        await this.ready;

        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');

            const existing = await client.query<RecordRow>(
                `SELECT record_id, fields, deleted_at
                FROM ${this.tableQualified}
                WHERE entity_type = $1 AND record_id = $2
                FOR UPDATE`,
                [
                    entityType,
                    id,
                ],
            );

            if (existing.rowCount !== 1) {
                await client.query('COMMIT');

                return null;
            }

            const current = toStoredRecord(existing.rows[0]);
            const merged: Record<string, unknown> = {
                ...current.fields,
                ...fields,
            };

            for (const field of unset) {
                delete merged[field];
            }

            await client.query(
                `UPDATE ${this.tableQualified}
                SET fields = $3::jsonb
                WHERE entity_type = $1 AND record_id = $2`,
                [
                    entityType,
                    id,
                    JSON.stringify(merged),
                ],
            );
            await client.query('COMMIT');

            return {
                ...current,
                fields: parseFields(JSON.stringify(merged)),
            };
        } catch (error) {
            await client.query('ROLLBACK');
            throw error;
        } finally {
            client.release();
        }
    }

    async softDelete(
        entityType: string,
        id: string,
        deletedAt: string,
    ): Promise<boolean> {
        await this.ready;

        const result = await this.pool.query(
            `UPDATE ${this.tableQualified}
            SET deleted_at = $3
            WHERE entity_type = $1
                AND record_id = $2
                AND deleted_at IS NULL`,
            [
                entityType,
                id,
                deletedAt,
            ],
        );

        return result.rowCount === 1;
    }

    async restore(entityType: string, id: string): Promise<boolean> {
        await this.ready;

        const result = await this.pool.query(
            `UPDATE ${this.tableQualified}
            SET deleted_at = NULL
            WHERE entity_type = $1
                AND record_id = $2
                AND deleted_at IS NOT NULL`,
            [
                entityType,
                id,
            ],
        );

        return result.rowCount === 1;
    }

    async destroy(entityType: string, id: string): Promise<boolean> {
        await this.ready;

        const result = await this.pool.query(
            `DELETE FROM ${this.tableQualified}
            WHERE entity_type = $1 AND record_id = $2`,
            [
                entityType,
                id,
            ],
        );

        return result.rowCount === 1;
    }

    async insert(entityType: string, record: StoredRecord): Promise<void> {
        await this.ready;

        await this.pool.query(
            `INSERT INTO ${this.tableQualified} (
                entity_type,
                record_id,
                fields,
                deleted_at
            ) VALUES (
                $1,
                $2,
                $3::jsonb,
                $4
            )`,
            [
                entityType,
                record.id,
                JSON.stringify(record.fields),
                record.deleted_at,
            ],
        );
    }

    private async initialize(): Promise<void> {
        await this.pool.query(
            `CREATE SCHEMA IF NOT EXISTS "${this.schemaName}"`,
        );
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.tableQualified} (
    entity_type TEXT NOT NULL,
    record_id TEXT NOT NULL,
    fields JSONB NOT NULL,
    deleted_at TEXT,
    PRIMARY KEY (entity_type, record_id)
)
`);
    }
}
