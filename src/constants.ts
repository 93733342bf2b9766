export const BULK_EXECUTION_SCHEMA_VERSION =
    'bulk.execution.schema.v1';

export const BULK_SERVICE_SCOPE = 'bulk';

export const BULK_TOKEN_AUDIENCE = `bulk-engine:${BULK_SERVICE_SCOPE}`;

export const AUTH_DENY_REASON_CODES = [
    'denied_token_expired',
    'denied_token_invalid_signature',
    'denied_token_wrong_service_scope',
    'denied_token_malformed',
] as const;

export type AuthDenyReasonCode = (typeof AUTH_DENY_REASON_CODES)[number];

export const CHECKPOINT_BUFFER_SIZE = 10;

export const CHECKPOINT_TTL_SECONDS = 24 * 60 * 60;
