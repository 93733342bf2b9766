import { z } from 'zod';

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const RECORD_SCOPES = [
    'active',
    'deleted',
    'any',
] as const;

export const RecordScopeSchema = z.enum(RECORD_SCOPES);

export type RecordScope = z.infer<typeof RecordScopeSchema>;

const ScalarSchema = z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
]);

export type FilterScalar = z.infer<typeof ScalarSchema>;

const FieldSchema = z.string().regex(FIELD_NAME);

const ComparisonPredicateSchema = z
    .object({
        field: FieldSchema,
        op: z.enum(['eq', 'lt', 'gt']),
        value: ScalarSchema,
    })
    .strict();

const MembershipPredicateSchema = z
    .object({
        field: FieldSchema,
        op: z.enum(['in', 'notIn']),
        values: z.array(ScalarSchema).min(1),
    })
    .strict();

const RangePredicateSchema = z
    .object({
        field: FieldSchema,
        op: z.literal('between'),
        from: z.union([z.string(), z.number().finite()]),
        to: z.union([z.string(), z.number().finite()]),
    })
    .strict()
    .superRefine((value, ctx) => {
        if (typeof value.from !== typeof value.to) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'between bounds must share a type',
                path: ['to'],
            });
        }
    });

const NullPredicateSchema = z
    .object({
        field: FieldSchema,
        op: z.enum(['isNull', 'isNotNull']),
    })
    .strict();

export const PredicateSchema = z.union([
    ComparisonPredicateSchema,
    MembershipPredicateSchema,
    RangePredicateSchema,
    NullPredicateSchema,
]);

export type Predicate = z.infer<typeof PredicateSchema>;

export const FilterSpecSchema = z.discriminatedUnion('kind', [
    z
        .object({
            kind: z.literal('ids'),
            ids: z.array(z.string().min(1)).min(1),
            scope: RecordScopeSchema.default('active'),
        })
        .strict(),
    z
        .object({
            kind: z.literal('predicates'),
            predicates: z.array(PredicateSchema).min(1),
            scope: RecordScopeSchema.default('active'),
        })
        .strict(),
    z
        .object({
            kind: z.literal('all'),
            scope: RecordScopeSchema.default('active'),
        })
        .strict(),
]);

export type FilterSpec = z.infer<typeof FilterSpecSchema>;

export type FilterSpecInput = z.input<typeof FilterSpecSchema>;

export interface FilterableRecord {
    id: string;
    fields: Record<string, unknown>;
    deleted_at: string | null;
}

export function normalizeIds(ids: string[]): string[] {
    return Array.from(new Set(ids.map((id) => id.trim())))
        .filter((id) => id !== '')
        .sort();
}

export function matchesScope(
    record: FilterableRecord,
    scope: RecordScope,
): boolean {
    if (scope === 'any') {
        return true;
    }

    return scope === 'deleted'
        ? record.deleted_at !== null
        : record.deleted_at === null;
}

function readField(record: FilterableRecord, field: string): unknown {
    if (field === 'id') {
        return record.id;
    }

    return record.fields[field];
}

function compare(left: unknown, right: FilterScalar): number | null {
    if (typeof left === 'number' && typeof right === 'number') {
        return left - right;
    }

    if (typeof left === 'string' && typeof right === 'string') {
        return left < right ? -1 : left > right ? 1 : 0;
    }

    return null;
}

function sameScalar(left: unknown, right: FilterScalar): boolean {
    return left === right;
}

export function matchesPredicate(
    record: FilterableRecord,
    predicate: Predicate,
): boolean {
    const value = readField(record, predicate.field);

    switch (predicate.op) {
        case 'eq':
            return sameScalar(value, predicate.value);
        case 'lt': {
            const order = compare(value, predicate.value);

            return order !== null && order < 0;
        }
        case 'gt': {
            const order = compare(value, predicate.value);

            return order !== null && order > 0;
        }
        case 'in':
            return predicate.values.some((entry) => sameScalar(value, entry));
        case 'notIn':
            return value !== undefined && value !== null &&
                !predicate.values.some((entry) => sameScalar(value, entry));
        case 'between': {
            const lower = compare(value, predicate.from);
            const upper = compare(value, predicate.to);

            return lower !== null && upper !== null &&
                lower >= 0 && upper <= 0;
        }
        case 'isNull':
            return value === undefined || value === null;
        case 'isNotNull':
            return value !== undefined && value !== null;
    }
}

export function matchesFilter(
    record: FilterableRecord,
    filter: FilterSpec,
): boolean {
    if (!matchesScope(record, filter.scope)) {
        return false;
    }

    switch (filter.kind) {
        case 'ids':
            return filter.ids.includes(record.id);
        case 'predicates':
            return filter.predicates.every((predicate) =>
                matchesPredicate(record, predicate),
            );
        case 'all':
            return true;
    }
}
