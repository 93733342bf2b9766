import {
    AuthDenyReasonCode,
    BULK_SERVICE_SCOPE,
    BULK_TOKEN_AUDIENCE,
} from '../constants';
import {
    AuthTokenClaims,
    parseTokenClaims,
} from './claims';
import { verifyJwt } from './jwt';

export interface BulkRequestAuth {
    actor: string;
    claims: AuthTokenClaims;
}

export interface RequestAuthenticatorConfig {
    signingKey: string;
    tokenClockSkewSeconds: number;
    expectedIssuer?: string;
    now?: () => Date;
}

export interface AuthenticateSuccess {
    success: true;
    auth: BulkRequestAuth;
}

export interface AuthenticateFailure {
    success: false;
    reasonCode: AuthDenyReasonCode;
}

export type AuthenticateResult = AuthenticateSuccess | AuthenticateFailure;

function parseBearerToken(authorizationHeader: string | undefined): string | null {
    if (!authorizationHeader) {
        return null;
    }

    const [scheme, token] = authorizationHeader.split(' ', 2);

    if (!scheme || !token || scheme.toLowerCase() !== 'bearer') {
        return null;
    }

    const trimmed = token.trim();

    return trimmed === '' ? null : trimmed;
}

function deny(reasonCode: AuthDenyReasonCode): AuthenticateFailure {
    return {
        success: false,
        reasonCode,
    };
}

export class RequestAuthenticator {
    private readonly nowFn: () => Date;

    constructor(private readonly config: RequestAuthenticatorConfig) {
        this.nowFn = config.now || (() => new Date());
    }

    authenticate(
        authorizationHeader: string | undefined,
    ): AuthenticateResult {
        const token = parseBearerToken(authorizationHeader);

        if (!token) {
            return deny('denied_token_malformed');
        }

        const verified = verifyJwt(token, this.config.signingKey);

        if (!verified.valid) {
            return deny(
                verified.reason === 'invalid_signature'
                    ? 'denied_token_invalid_signature'
                    : 'denied_token_malformed',
            );
        }

        const claimsResult = parseTokenClaims(verified.payload);

        if (!claimsResult.success) {
            return deny(claimsResult.reasonCode);
        }

        const claims = claimsResult.claims;

        if (
            claims.service_scope !== BULK_SERVICE_SCOPE ||
            claims.aud !== BULK_TOKEN_AUDIENCE
        ) {
            return deny('denied_token_wrong_service_scope');
        }

        if (
            this.config.expectedIssuer &&
            claims.iss !== this.config.expectedIssuer
        ) {
            return deny('denied_token_malformed');
        }

        const nowSeconds = Math.floor(this.nowFn().getTime() / 1000);
        const skew = this.config.tokenClockSkewSeconds;

        if (nowSeconds > claims.exp + skew) {
            return deny('denied_token_expired');
        }

        if (claims.iat > nowSeconds + skew || claims.iat >= claims.exp) {
            return deny('denied_token_malformed');
        }

        return {
            success: true,
            auth: {
                actor: claims.sub,
                claims,
            },
        };
    }
}
