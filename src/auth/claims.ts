import { z } from 'zod';
import { AuthDenyReasonCode } from '../constants';

const requiredText = z.string().refine((value) => value.trim() !== '');

const epochSeconds = z.number().finite();

// Any non-blank scope parses; the authenticator decides whether it is ours.
const TokenClaimsSchema = z.object({
    iss: requiredText,
    sub: requiredText,
    aud: requiredText,
    jti: requiredText,
    iat: epochSeconds,
    exp: epochSeconds,
    service_scope: requiredText,
});

export type AuthTokenClaims = z.infer<typeof TokenClaimsSchema>;

export type ParseClaimsResult =
    | {
        success: true;
        claims: AuthTokenClaims;
    }
    | {
        success: false;
        reasonCode: AuthDenyReasonCode;
    };

export function parseTokenClaims(
    payload: Record<string, unknown>,
): ParseClaimsResult {
    const parsed = TokenClaimsSchema.safeParse(payload);

    if (!parsed.success) {
        return {
            success: false,
            reasonCode: 'denied_token_malformed',
        };
    }

    return {
        success: true,
        claims: parsed.data,
    };
}
