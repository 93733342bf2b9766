import { matchesScope, RecordScope } from './filter';

export interface StoredRecord {
    id: string;
    fields: Record<string, unknown>;
    deleted_at: string | null;
}

export interface ScanOptions {
    afterId: string | null;
    limit: number;
    scope: RecordScope;
}

export interface RecordStore {
    listEntityTypes(): Promise<string[]>;
    hasEntityType(entityType: string): Promise<boolean>;
    scan(entityType: string, options: ScanOptions): Promise<StoredRecord[]>;
    getMany(entityType: string, ids: string[]): Promise<StoredRecord[]>;
    get(entityType: string, id: string): Promise<StoredRecord | null>;
    /** Merges `fields` into the record, then drops the `unset` keys. */
    update(
        entityType: string,
        id: string,
        fields: Record<string, unknown>,
        unset?: string[],
    ): Promise<StoredRecord | null>;
    softDelete(
        entityType: string,
        id: string,
        deletedAt: string,
    ): Promise<boolean>;
    restore(entityType: string, id: string): Promise<boolean>;
    destroy(entityType: string, id: string): Promise<boolean>;
    insert(entityType: string, record: StoredRecord): Promise<void>;
}

function cloneRecord(record: StoredRecord): StoredRecord {
    return JSON.parse(JSON.stringify(record)) as StoredRecord;
}

function cloneFields(
    fields: Record<string, unknown>,
): Record<string, unknown> {
    return JSON.parse(JSON.stringify(fields)) as Record<string, unknown>;
}

export class InMemoryRecordStore implements RecordStore {
    private readonly tables = new Map<string, Map<string, StoredRecord>>();

    constructor(entityTypes: string[] = []) {
        for (const entityType of entityTypes) {
            this.tables.set(entityType, new Map());
        }
    }

    seed(entityType: string, records: StoredRecord[]): void {
        const table = this.tableFor(entityType, true);

        for (const record of records) {
            table.set(record.id, cloneRecord(record));
        }
    }

    async listEntityTypes(): Promise<string[]> {
        return Array.from(this.tables.keys()).sort();
    }

    async hasEntityType(entityType: string): Promise<boolean> {
        return this.tables.has(entityType);
    }

    async scan(
        entityType: string,
        options: ScanOptions,
    ): Promise<StoredRecord[]> {
        const table = this.tableFor(entityType);
        const ids = Array.from(table.keys()).sort();
        const page: StoredRecord[] = [];

        for (const id of ids) {
            if (options.afterId !== null && id <= options.afterId) {
                continue;
            }

            const record = table.get(id);

            if (!record || !matchesScope(record, options.scope)) {
                continue;
            }

            page.push(cloneRecord(record));

            if (page.length >= options.limit) {
                break;
            }
        }

        return page;
    }

    async getMany(
        entityType: string,
        ids: string[],
    ): Promise<StoredRecord[]> {
        const table = this.tableFor(entityType);
        const found: StoredRecord[] = [];

        for (const id of Array.from(new Set(ids)).sort()) {
            const record = table.get(id);

            if (record) {
                found.push(cloneRecord(record));
            }
        }

        return found;
    }

    async get(entityType: string, id: string): Promise<StoredRecord | null> {
        const record = this.tableFor(entityType).get(id);

        return record ? cloneRecord(record) : null;
    }

    async update(
        entityType: string,
        id: string,
        fields: Record<string, unknown>,
        unset: string[] = [],
    ): Promise<StoredRecord | null> {
        const record = this.tableFor(entityType).get(id);

        if (!record) {
            return null;
        }

        record.fields = {
            ...record.fields,
            ...cloneFields(fields),
        };

        for (const field of unset) {
            delete record.fields[field];
        }

        return cloneRecord(record);
    }

    async softDelete(
        entityType: string,
        id: string,
        deletedAt: string,
    ): Promise<boolean> {
        const record = this.tableFor(entityType).get(id);

        if (!record || record.deleted_at !== null) {
            return false;
        }

        record.deleted_at = deletedAt;

        return true;
    }

    async restore(entityType: string, id: string): Promise<boolean> {
        const record = this.tableFor(entityType).get(id);

        if (!record || record.deleted_at === null) {
            return false;
        }

        record.deleted_at = null;

        return true;
    }

    async destroy(entityType: string, id: string): Promise<boolean> {
        return this.tableFor(entityType).delete(id);
    }

    async insert(entityType: string, record: StoredRecord): Promise<void> {
        const table = this.tableFor(entityType);

        if (table.has(record.id)) {
            throw new Error(
                `record ${entityType}/${record.id} already exists`,
            );
        }

        table.set(record.id, cloneRecord(record));
    }

    private tableFor(
        entityType: string,
        create = false,
    ): Map<string, StoredRecord> {
        let table = this.tables.get(entityType);

        if (!table) {
            if (!create) {
                throw new Error(`unknown entity type: ${entityType}`);
            }

            table = new Map();
            this.tables.set(entityType, table);
        }

        return table;
    }
}
