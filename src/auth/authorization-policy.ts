import { ActionAllowlistEntry } from '../env';

export interface AuthorizationRequest {
    actor: string;
    action: string;
    entityType: string;
}

export interface AuthorizationPolicy {
    isAllowed(request: AuthorizationRequest): Promise<boolean>;
}

export class AllowAllAuthorizationPolicy implements AuthorizationPolicy {
    async isAllowed(_request: AuthorizationRequest): Promise<boolean> {
        return true;
    }
}

function matchesPattern(pattern: string, value: string): boolean {
    return pattern === '*' || pattern === value;
}

/**
 * Allows a request when any entry matches it. An entry without an actor
 * applies to every actor; `*` matches any action or entity type.
 */
export class AllowlistAuthorizationPolicy implements AuthorizationPolicy {
    constructor(private readonly entries: readonly ActionAllowlistEntry[]) {}

    async isAllowed(request: AuthorizationRequest): Promise<boolean> {
        return this.entries.some((entry) =>
            (entry.actor === undefined || entry.actor === request.actor) &&
            matchesPattern(entry.action, request.action) &&
            matchesPattern(entry.entity_type, request.entityType),
        );
    }
}

export function createAuthorizationPolicy(
    allowlist: ActionAllowlistEntry[] | null,
): AuthorizationPolicy {
    if (allowlist === null) {
        return new AllowAllAuthorizationPolicy();
    }

    return new AllowlistAuthorizationPolicy(allowlist);
}
