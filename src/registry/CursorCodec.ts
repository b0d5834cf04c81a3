/**
 * CursorCodec — opaque pagination cursors
 *
 * A cursor carries the listing offset of the next page. It is either signed
 * (payload visible, HMAC-SHA256 tag) or encrypted (AES-256-GCM), so a client
 * can neither forge nor edit a position.
 *
 * @module
 */
import { createCipheriv, createDecipheriv, createHash, createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';

export type CursorMode = 'signed' | 'encrypted';

export interface CursorCodecOptions {
    /** 'signed' (default) or 'encrypted'. */
    mode?: CursorMode;
    /**
     * Shared secret. Any length: it is hashed into a 256-bit key.
     * When absent a random key is generated, so cursors only survive
     * within one process.
     */
    secret?: string;
}

const CursorPayloadSchema = z.object({
    offset: z.number().int().nonnegative(),
});

export type CursorPayload = z.infer<typeof CursorPayloadSchema>;

const IV_BYTES = 12;
const TAG_BYTES = 16;

export class CursorCodec {
    private readonly _mode: CursorMode;
    private readonly _key: Buffer;

    constructor(options?: CursorCodecOptions) {
        this._mode = options?.mode ?? 'signed';
        this._key = options?.secret
            ? createHash('sha256').update(options.secret).digest()
            : randomBytes(32);
    }

    encode(payload: CursorPayload): string {
        const data = Buffer.from(JSON.stringify(payload), 'utf8');

        if (this._mode === 'encrypted') {
            const iv = randomBytes(IV_BYTES);
            const cipher = createCipheriv('aes-256-gcm', this._key, iv);
            const sealed = Buffer.concat([cipher.update(data), cipher.final(), cipher.getAuthTag()]);
            return `${iv.toString('base64url')}.${sealed.toString('base64url')}`;
        }

        return `${data.toString('base64url')}.${this._sign(data).toString('base64url')}`;
    }

    /** Returns undefined for malformed, tampered or foreign cursors. */
    decode(cursor: string): CursorPayload | undefined {
        const parts = cursor.split('.');
        if (parts.length !== 2) return undefined;
        const [head, body] = parts;
        if (!head || !body) return undefined;

        try {
            const data = this._mode === 'encrypted'
                ? this._open(Buffer.from(head, 'base64url'), Buffer.from(body, 'base64url'))
                : this._verify(Buffer.from(head, 'base64url'), Buffer.from(body, 'base64url'));
            if (!data) return undefined;

            const parsed = CursorPayloadSchema.safeParse(JSON.parse(data.toString('utf8')));
            return parsed.success ? parsed.data : undefined;
        } catch {
            // bad base64, failed auth tag or non-JSON payload
            return undefined;
        }
    }

    private _sign(data: Buffer): Buffer {
        return createHmac('sha256', this._key).update(data).digest();
    }

    private _verify(data: Buffer, signature: Buffer): Buffer | undefined {
        const expected = this._sign(data);
        if (signature.length !== expected.length) return undefined;
        return timingSafeEqual(signature, expected) ? data : undefined;
    }

    private _open(iv: Buffer, sealed: Buffer): Buffer | undefined {
        if (iv.length !== IV_BYTES || sealed.length < TAG_BYTES) return undefined;
        const decipher = createDecipheriv('aes-256-gcm', this._key, iv);
        decipher.setAuthTag(sealed.subarray(sealed.length - TAG_BYTES));
        return Buffer.concat([decipher.update(sealed.subarray(0, sealed.length - TAG_BYTES)), decipher.final()]);
    }
}
