import { z } from 'zod';
import { UndoOperationType } from '../executions/models';
import { RecordStore, StoredRecord } from '../targets/record-store';

export interface ActionContext {
    executionId: string;
    entityType: string;
    actor: string;
    store: RecordStore;
    now: () => Date;
}

/**
 * A named mutation applied to one record at a time. Handlers are
 * strategies: the registry holds them by name and the worker never needs
 * to know which one it runs.
 */
export interface ActionHandler<P> {
    name: string;
    description: string;
    parameters: z.ZodType<P, z.ZodTypeDef, unknown>;
    execute(
        record: StoredRecord,
        params: P,
        context: ActionContext,
    ): Promise<void>;
    /** Fields to capture before mutating, or '*' for the whole record. */
    declareUndoFields(params: P): string[] | '*';
    /** Null when the action cannot be reversed. */
    undoOperationType(): UndoOperationType | null;
}

export type ParseParametersResult =
    | {
        success: true;
        parameters: Record<string, unknown>;
    }
    | {
        success: false;
        message: string;
    };

export interface RegisteredAction {
    name: string;
    description: string;
    undoOperation: UndoOperationType | null;
    parseParameters(raw: unknown): ParseParametersResult;
    execute(
        record: StoredRecord,
        parameters: Record<string, unknown>,
        context: ActionContext,
    ): Promise<void>;
    declareUndoFields(parameters: Record<string, unknown>): string[] | '*';
}

export interface ActionSummary {
    name: string;
    description: string;
    undoable: boolean;
}

const ACTION_NAME = /^[a-z][a-z0-9_]*$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bindHandler<P>(handler: ActionHandler<P>): RegisteredAction {
    return {
        name: handler.name,
        description: handler.description,
        undoOperation: handler.undoOperationType(),
        parseParameters(raw: unknown): ParseParametersResult {
            const parsed = handler.parameters.safeParse(raw);

            if (!parsed.success) {
                const issue = parsed.error.issues[0];
                const path = issue.path.length > 0
                    ? `parameters.${issue.path.join('.')}`
                    : 'parameters';

                return {
                    success: false,
                    message: `${path}: ${issue.message}`,
                };
            }

            if (!isPlainObject(parsed.data)) {
                return {
                    success: false,
                    message: 'parameters must be an object',
                };
            }

            return {
                success: true,
                parameters: parsed.data,
            };
        },
        async execute(record, parameters, context): Promise<void> {
            await handler.execute(
                record,
                handler.parameters.parse(parameters),
                context,
            );
        },
        declareUndoFields(parameters): string[] | '*' {
            return handler.declareUndoFields(
                handler.parameters.parse(parameters),
            );
        },
    };
}

export class ActionRegistry {
    private readonly actions = new Map<string, RegisteredAction>();

    register<P>(handler: ActionHandler<P>): this {
        if (!ACTION_NAME.test(handler.name)) {
            throw new Error(
                `action name ${handler.name} must match ${ACTION_NAME.source}`,
            );
        }

        if (this.actions.has(handler.name)) {
            throw new Error(`action ${handler.name} is already registered`);
        }

        this.actions.set(handler.name, bindHandler(handler));

        return this;
    }

    has(name: string): boolean {
        return this.actions.has(name);
    }

    get(name: string): RegisteredAction | null {
        return this.actions.get(name) || null;
    }

    list(): ActionSummary[] {
        return Array.from(this.actions.values())
            .map((action) => ({
                name: action.name,
                description: action.description,
                undoable: action.undoOperation !== null,
            }))
            .sort((left, right) => left.name.localeCompare(right.name));
    }
}
