import { NextResponse } from 'next/server';
import { ERROR_STATUS, malformedPayload, type ApiError } from './errors';

export type BodyResult = { success: true; text: string } | { success: false; error: ApiError };

const TOO_LARGE = 'request body too large';

/**
 * Reads the request body as UTF-8, refusing anything over `maxBytes`.
 * A declared Content-Length over the cap is refused before any byte is read.
 */
export async function readBodyText(request: Request, maxBytes: number): Promise<BodyResult> {
    const declared = Number(request.headers.get('content-length'));
    if (Number.isFinite(declared) && declared > maxBytes) {
        return { success: false, error: malformedPayload(TOO_LARGE) };
    }
    if (!request.body) {
        return { success: true, text: '' };
    }

    const reader = request.body.getReader();
    const chunks: Uint8Array[] = [];
    let received = 0;
    for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        received += value.byteLength;
        if (received > maxBytes) {
            await reader.cancel();
            return { success: false, error: malformedPayload(TOO_LARGE) };
        }
        chunks.push(value);
    }

    return { success: true, text: Buffer.concat(chunks).toString('utf8') };
}

export function jsonError(status: number, message: string, init?: { headers?: HeadersInit }): NextResponse {
    return NextResponse.json({ error: message }, { status, headers: init?.headers });
}

export function errorResponse(error: ApiError, init?: { headers?: HeadersInit }): NextResponse {
    return jsonError(ERROR_STATUS[error.kind], error.message, init);
}

/** Builds a handler that answers 405 for methods a route does not serve. */
export function methodNotAllowed(allow: string[]): () => NextResponse {
    return () =>
        errorResponse({ kind: 'MethodNotAllowed', message: 'method not allowed' }, { headers: { Allow: allow.join(', ') } });
}
