import { z } from 'zod';
import { normalizeIsoWithMillis } from '../executions/models';
import { undoOperationForEffect } from '../undo/undo-manager';
import { ActionHandler, ActionRegistry } from './action-registry';

const NoParametersSchema = z.object({}).strict();

const UpdateParametersSchema = z
    .object({
        fields: z
            .record(z.unknown())
            .refine((fields) => Object.keys(fields).length > 0, {
                message: 'at least one field is required',
            })
            .refine((fields) => !Object.prototype.hasOwnProperty.call(fields, 'id'), {
                message: 'the id field cannot be updated',
            }),
    })
    .strict();

const ArchiveParametersSchema = z
    .object({
        reason: z.string().min(1).max(500).optional(),
    })
    .strict();

type NoParameters = z.infer<typeof NoParametersSchema>;
type UpdateParameters = z.infer<typeof UpdateParametersSchema>;
type ArchiveParameters = z.infer<typeof ArchiveParametersSchema>;

export const deleteAction: ActionHandler<NoParameters> = {
    name: 'delete',
    description: 'Soft delete the selected records',
    parameters: NoParametersSchema,
    async execute(record, _params, context) {
        const deleted = await context.store.softDelete(
            context.entityType,
            record.id,
            normalizeIsoWithMillis(context.now()),
        );

        if (!deleted) {
            throw new Error(`record ${record.id} is already deleted`);
        }
    },
    declareUndoFields: () => [],
    undoOperationType: () => undoOperationForEffect('deleted'),
};

export const forceDeleteAction: ActionHandler<NoParameters> = {
    name: 'force_delete',
    description: 'Permanently delete the selected records',
    parameters: NoParametersSchema,
    async execute(record, _params, context) {
        const destroyed = await context.store.destroy(
            context.entityType,
            record.id,
        );

        if (!destroyed) {
            throw new Error(`record ${record.id} no longer exists`);
        }
    },
    declareUndoFields: () => '*',
    undoOperationType: () => undoOperationForEffect('destroyed'),
};

export const restoreAction: ActionHandler<NoParameters> = {
    name: 'restore',
    description: 'Restore soft-deleted records',
    parameters: NoParametersSchema,
    async execute(record, _params, context) {
        const restored = await context.store.restore(
            context.entityType,
            record.id,
        );

        if (!restored) {
            throw new Error(`record ${record.id} is not deleted`);
        }
    },
    declareUndoFields: () => [],
    undoOperationType: () => undoOperationForEffect('reinstated'),
};

export const updateAction: ActionHandler<UpdateParameters> = {
    name: 'update',
    description: 'Set the given field values on the selected records',
    parameters: UpdateParametersSchema,
    async execute(record, params, context) {
        const updated = await context.store.update(
            context.entityType,
            record.id,
            params.fields,
        );

        if (!updated) {
            throw new Error(`record ${record.id} no longer exists`);
        }
    },
    declareUndoFields: (params) => Object.keys(params.fields).sort(),
    undoOperationType: () => undoOperationForEffect('fields_updated'),
};

export const archiveAction: ActionHandler<ArchiveParameters> = {
    name: 'archive',
    description: 'Mark the selected records as archived',
    parameters: ArchiveParametersSchema,
    async execute(record, params, context) {
        const updated = await context.store.update(
            context.entityType,
            record.id,
            {
                archived_at: normalizeIsoWithMillis(context.now()),
                archive_reason: params.reason || null,
            },
        );

        if (!updated) {
            throw new Error(`record ${record.id} no longer exists`);
        }
    },
    declareUndoFields: () => ['archive_reason', 'archived_at'],
    undoOperationType: () => undoOperationForEffect('fields_updated'),
};

export function registerBuiltinActions(
    registry: ActionRegistry = new ActionRegistry(),
): ActionRegistry {
    return registry
        .register(deleteAction)
        .register(forceDeleteAction)
        .register(restoreAction)
        .register(updateAction)
        .register(archiveAction);
}
