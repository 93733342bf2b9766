import {
    createHmac,
    timingSafeEqual,
} from 'node:crypto';

export interface JwtPayload {
    [key: string]: unknown;
}

export type JwtRejectReason =
    | 'malformed'
    | 'unsupported_algorithm'
    | 'invalid_signature';

export type VerifiedJwt =
    | {
        valid: true;
        payload: JwtPayload;
    }
    | {
        valid: false;
        reason: JwtRejectReason;
    };

const SUPPORTED_HEADER = {
    alg: 'HS256',
    typ: 'JWT',
} as const;

function encodeSegment(value: unknown): string {
    return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

function decodeSegment(segment: string): unknown {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
}

function sign(signingInput: string, signingKey: string): string {
    return createHmac('sha256', signingKey)
        .update(signingInput)
        .digest('base64url');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function signJwt(payload: JwtPayload, signingKey: string): string {
    const signingInput =
        `${encodeSegment(SUPPORTED_HEADER)}.${encodeSegment(payload)}`;

    return `${signingInput}.${sign(signingInput, signingKey)}`;
}

export function verifyJwt(token: string, signingKey: string): VerifiedJwt {
    const parts = token.split('.');

    if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
        return {
            valid: false,
            reason: 'malformed',
        };
    }

    const [headerSegment, payloadSegment, signatureSegment] = parts;
    let header: unknown;
    let payload: unknown;

    try {
        header = decodeSegment(headerSegment);
        payload = decodeSegment(payloadSegment);
    } catch {
        return {
            valid: false,
            reason: 'malformed',
        };
    }

    if (!isRecord(header) || !isRecord(payload)) {
        return {
            valid: false,
            reason: 'malformed',
        };
    }

    if (header.alg !== SUPPORTED_HEADER.alg) {
        return {
            valid: false,
            reason: 'unsupported_algorithm',
        };
    }

    const expected = Buffer.from(
        sign(`${headerSegment}.${payloadSegment}`, signingKey),
        'utf8',
    );
    const supplied = Buffer.from(signatureSegment, 'utf8');

    if (
        expected.length !== supplied.length ||
        !timingSafeEqual(expected, supplied)
    ) {
        return {
            valid: false,
            reason: 'invalid_signature',
        };
    }

    return {
        valid: true,
        payload,
    };
}
