import { describe, test } from 'node:test';
import { strict as assert } from 'node:assert';
import { signJwt } from './jwt';
import {
    RequestAuthenticator,
    RequestAuthenticatorConfig,
} from './authenticator';
import {
    buildScopedToken,
    TEST_SIGNING_KEY,
} from '../test-helpers';

const NOW_SECONDS = 1700000000;

function buildAuthenticator(
    overrides: Partial<RequestAuthenticatorConfig> = {},
): RequestAuthenticator {
    return new RequestAuthenticator({
        signingKey: TEST_SIGNING_KEY,
        tokenClockSkewSeconds: 30,
        now: () => new Date(NOW_SECONDS * 1000),
        ...overrides,
    });
}

function reasonOf(
    auth: RequestAuthenticator,
    header: string | undefined,
): string | null {
    const result = auth.authenticate(header);

    return result.success ? null : result.reasonCode;
}

describe('RequestAuthenticator', () => {
    test('accepts a bulk-scoped token and exposes the actor', () => {
        const auth = buildAuthenticator();
        const token = buildScopedToken({
            signingKey: TEST_SIGNING_KEY,
            actor: 'operator-7',
            issuedAt: NOW_SECONDS,
        });
        const result = auth.authenticate(`Bearer ${token}`);

        assert.equal(result.success, true);
        if (result.success) {
            assert.equal(result.auth.actor, 'operator-7');
            assert.equal(result.auth.claims.aud, 'bulk-engine:bulk');
        }
    });

    test('rejects missing or non-bearer headers', () => {
        const auth = buildAuthenticator();

        assert.equal(reasonOf(auth, undefined), 'denied_token_malformed');
        assert.equal(reasonOf(auth, 'Basic abc'), 'denied_token_malformed');
        assert.equal(reasonOf(auth, 'Bearer'), 'denied_token_malformed');
    });

    test('rejects a token signed with another key', () => {
        const token = buildScopedToken({
            signingKey: 'other-secret',
            issuedAt: NOW_SECONDS,
        });

        assert.equal(
            reasonOf(buildAuthenticator(), `Bearer ${token}`),
            'denied_token_invalid_signature',
        );
    });

    test('honours clock skew around expiry', () => {
        const auth = buildAuthenticator();
        const withinSkew = buildScopedToken({
            signingKey: TEST_SIGNING_KEY,
            issuedAt: NOW_SECONDS - 310,
            expiresInSeconds: 300,
        });
        const beyondSkew = buildScopedToken({
            signingKey: TEST_SIGNING_KEY,
            issuedAt: NOW_SECONDS - 400,
            expiresInSeconds: 300,
        });

        assert.equal(reasonOf(auth, `Bearer ${withinSkew}`), null);
        assert.equal(
            reasonOf(auth, `Bearer ${beyondSkew}`),
            'denied_token_expired',
        );
    });

    test('rejects tokens issued in the future or with iat >= exp', () => {
        const auth = buildAuthenticator();
        const future = buildScopedToken({
            signingKey: TEST_SIGNING_KEY,
            issuedAt: NOW_SECONDS + 120,
        });
        const inverted = signJwt(
            {
                iss: 'bulk-auth',
                sub: 'operator-1',
                aud: 'bulk-engine:bulk',
                jti: 'tok-inverted',
                iat: NOW_SECONDS,
                exp: NOW_SECONDS,
                service_scope: 'bulk',
            },
            TEST_SIGNING_KEY,
        );

        assert.equal(
            reasonOf(auth, `Bearer ${future}`),
            'denied_token_malformed',
        );
        assert.equal(
            reasonOf(auth, `Bearer ${inverted}`),
            'denied_token_malformed',
        );
    });

    test('rejects another scope or audience', () => {
        const auth = buildAuthenticator();
        const foreignToken = buildScopedToken({
            signingKey: TEST_SIGNING_KEY,
            issuedAt: NOW_SECONDS,
            scope: 'reports',
        });
        const wrongAudience = buildScopedToken({
            signingKey: TEST_SIGNING_KEY,
            issuedAt: NOW_SECONDS,
            audience: 'bulk-engine:other',
        });

        assert.equal(
            reasonOf(auth, `Bearer ${foreignToken}`),
            'denied_token_wrong_service_scope',
        );
        assert.equal(
            reasonOf(auth, `Bearer ${wrongAudience}`),
            'denied_token_wrong_service_scope',
        );
    });

    test('checks the issuer only when one is configured', () => {
        const token = buildScopedToken({
            signingKey: TEST_SIGNING_KEY,
            issuedAt: NOW_SECONDS,
            issuer: 'someone-else',
        });

        assert.equal(reasonOf(buildAuthenticator(), `Bearer ${token}`), null);
        assert.equal(
            reasonOf(
                buildAuthenticator({ expectedIssuer: 'bulk-auth' }),
                `Bearer ${token}`,
            ),
            'denied_token_malformed',
        );
    });
});
