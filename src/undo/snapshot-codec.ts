import { deflateSync, inflateSync } from 'node:zlib';
import { z } from 'zod';

export const DEFAULT_COMPRESS_ABOVE_BYTES = 1024;

const JSON_PREFIX = 'json:';
const DEFLATE_PREFIX = 'deflate:';

const CapturedStateSchema = z
    .object({
        fields: z.record(z.unknown()),
        // Declared fields the record did not have before the mutation.
        absent: z.array(z.string()).default([]),
        deleted_at: z.string().nullable(),
    })
    .strict();

export type CapturedState = z.infer<typeof CapturedStateSchema>;

export class SnapshotCodec {
    constructor(
        private readonly compressAboveBytes: number =
            DEFAULT_COMPRESS_ABOVE_BYTES,
    ) {}

    encode(state: CapturedState): string {
        const json = JSON.stringify(state);

        if (Buffer.byteLength(json, 'utf8') <= this.compressAboveBytes) {
            return `${JSON_PREFIX}${json}`;
        }

        return `${DEFLATE_PREFIX}${
            deflateSync(Buffer.from(json, 'utf8')).toString('base64')
        }`;
    }

    decode(encoded: string): CapturedState {
        let json: string;

        if (encoded.startsWith(JSON_PREFIX)) {
            json = encoded.slice(JSON_PREFIX.length);
        } else if (encoded.startsWith(DEFLATE_PREFIX)) {
            json = inflateSync(
                Buffer.from(encoded.slice(DEFLATE_PREFIX.length), 'base64'),
            ).toString('utf8');
        } else {
            throw new Error('unrecognized snapshot encoding');
        }

        return CapturedStateSchema.parse(JSON.parse(json));
    }
}
