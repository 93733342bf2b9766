import { ExecutionStatusReason } from '../executions/models';

interface LifecycleEventBase {
    execution_id: string;
    at: string;
}

export type LifecycleEvent =
    | LifecycleEventBase & {
        type: 'execution.started';
    }
    | LifecycleEventBase & {
        type: 'execution.progress';
        processed_records: number;
        failed_records: number;
        total_records: number;
        percentage: number;
        eta_seconds: number | null;
    }
    | LifecycleEventBase & {
        type: 'execution.completed' | 'execution.failed' | 'execution.cancelled';
        status_reason: ExecutionStatusReason;
        processed_records: number;
        failed_records: number;
        total_records: number;
    }
    | LifecycleEventBase & {
        type: 'execution.undone';
        undone_by: string;
        restored_records: number;
        failed_records: number;
    };

export type LifecycleEventType = LifecycleEvent['type'];

export type LifecycleEventSubscriber = (
    event: LifecycleEvent,
) => Promise<void> | void;

export interface LifecycleEventSink {
    emit(event: LifecycleEvent): void;
}

export class NoopLifecycleEventSink implements LifecycleEventSink {
    emit(): void {
        return;
    }
}

const LOGGED_EVENT_TYPES: readonly LifecycleEventType[] = [
    'execution.completed',
    'execution.failed',
    'execution.cancelled',
    'execution.undone',
];

/**
 * Fans lifecycle events out to in-process subscribers. Emitting never
 * throws; a failing subscriber is reported and the others still run.
 */
export class InProcessLifecycleEventSink implements LifecycleEventSink {
    private readonly subscribers: LifecycleEventSubscriber[] = [];

    constructor(private readonly logTerminalEvents = true) {}

    subscribe(subscriber: LifecycleEventSubscriber): () => void {
        this.subscribers.push(subscriber);

        return () => {
            const index = this.subscribers.indexOf(subscriber);

            if (index >= 0) {
                this.subscribers.splice(index, 1);
            }
        };
    }

    emit(event: LifecycleEvent): void {
        if (this.logTerminalEvents && LOGGED_EVENT_TYPES.includes(event.type)) {
            console.log('bulk execution lifecycle', {
                ...event,
            });
        }

        for (const subscriber of [...this.subscribers]) {
            void Promise.resolve()
                .then(() => subscriber(event))
                .catch((error: unknown) => {
                    console.warn('lifecycle subscriber failed', {
                        event_type: event.type,
                        execution_id: event.execution_id,
                        error: error instanceof Error
                            ? error.message
                            : String(error),
                    });
                });
        }
    }
}
