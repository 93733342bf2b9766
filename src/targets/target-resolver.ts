import {
    FilterSpec,
    FilterSpecSchema,
    matchesFilter,
    matchesScope,
    normalizeIds,
} from './filter';
import { RecordStore, StoredRecord } from './record-store';

export interface TargetResolverOptions {
    pageSize?: number;
}

export type ParseTargetResult =
    | {
        success: true;
        entityType: string;
        filter: FilterSpec;
    }
    | {
        success: false;
        message: string;
    };

const DEFAULT_PAGE_SIZE = 500;

export class TargetResolver {
    private readonly pageSize: number;

    constructor(
        private readonly store: RecordStore,
        options: TargetResolverOptions = {},
    ) {
        this.pageSize = options.pageSize || DEFAULT_PAGE_SIZE;
    }

    async parseTarget(
        entityType: string,
        rawFilter: unknown,
    ): Promise<ParseTargetResult> {
        const parsed = FilterSpecSchema.safeParse(rawFilter);

        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const path = issue.path.length > 0
                ? `filter.${issue.path.join('.')}`
                : 'filter';

            return {
                success: false,
                message: `${path}: ${issue.message}`,
            };
        }

        if (!await this.store.hasEntityType(entityType)) {
            return {
                success: false,
                message: `unknown entity type: ${entityType}`,
            };
        }

        const filter = parsed.data.kind === 'ids'
            ? {
                ...parsed.data,
                ids: normalizeIds(parsed.data.ids),
            }
            : parsed.data;

        return {
            success: true,
            entityType,
            filter,
        };
    }

    async count(entityType: string, filter: FilterSpec): Promise<number> {
        let total = 0;

        for await (const page of this.pages(entityType, filter)) {
            total += page.length;
        }

        return total;
    }

    /**
     * Matching ids in ascending order. `afterId` resumes a stream that was
     * cut off, skipping every id up to and including it.
     */
    async *streamIds(
        entityType: string,
        filter: FilterSpec,
        afterId: string | null = null,
    ): AsyncGenerator<string> {
        for await (const page of this.pages(entityType, filter, afterId)) {
            for (const record of page) {
                yield record.id;
            }
        }
    }

    async sample(
        entityType: string,
        filter: FilterSpec,
        limit: number,
    ): Promise<StoredRecord[]> {
        const sampled: StoredRecord[] = [];

        if (limit <= 0) {
            return sampled;
        }

        for await (const page of this.pages(entityType, filter)) {
            for (const record of page) {
                sampled.push(record);

                if (sampled.length >= limit) {
                    return sampled;
                }
            }
        }

        return sampled;
    }

    private async *pages(
        entityType: string,
        filter: FilterSpec,
        startAfterId: string | null = null,
    ): AsyncGenerator<StoredRecord[]> {
        if (filter.kind === 'ids') {
            const ids = normalizeIds(filter.ids).filter((id) =>
                startAfterId === null || id > startAfterId,
            );

            for (let offset = 0; offset < ids.length; offset += this.pageSize) {
                const records = await this.store.getMany(
                    entityType,
                    ids.slice(offset, offset + this.pageSize),
                );
                // getMany already limits the page to the requested ids.
                const matched = records.filter((record) =>
                    matchesScope(record, filter.scope),
                );

                if (matched.length > 0) {
                    yield matched;
                }
            }

            return;
        }

        let afterId: string | null = startAfterId;

        while (true) {
            const records: StoredRecord[] = await this.store.scan(entityType, {
                afterId,
                limit: this.pageSize,
                scope: filter.scope,
            });

            if (records.length === 0) {
                return;
            }

            const matched = records.filter((record) =>
                matchesFilter(record, filter),
            );

            if (matched.length > 0) {
                yield matched;
            }

            if (records.length < this.pageSize) {
                return;
            }

            afterId = records[records.length - 1].id;
        }
    }
}
