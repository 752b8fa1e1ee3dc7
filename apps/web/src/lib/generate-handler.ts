/**
 * POST /api/generate pipeline:
 * rate limit → body cap → JSON → validation → dual render → response.
 * Every failure is terminal and answered with `{ error }`.
 */
import { NextResponse } from 'next/server';
import type { MapRenderer } from '@/types/map';
import type { AppConfig } from './config';
import { clientIdentifier } from './client-ip';
import { generateMap, toGenerateResponse } from './generate';
import { validateGeneratePayload, parseJsonBody } from './generate-validator';
import { errorResponse, jsonError, readBodyText } from './http';
import type { FixedWindowRateLimiter } from './rate-limit';

export interface GenerateHandlerDeps {
    config: AppConfig;
    limiter: FixedWindowRateLimiter;
    /** Resolved on each request so a failed startup load surfaces as a 500, not a module crash. */
    getRenderer: () => MapRenderer;
    now?: () => number;
}

export function createGenerateHandler({ config, limiter, getRenderer, now = Date.now }: GenerateHandlerDeps) {
    return async function POST(request: Request): Promise<NextResponse> {
        try {
            // No socket address here: `next start` copies it into X-Forwarded-For.
            const clientKey = clientIdentifier(request.headers);
            const decision = limiter.consume(clientKey, now());
            if (!decision.allowed) {
                return errorResponse(
                    { kind: 'RateLimited', message: 'rate limit exceeded' },
                    { headers: { 'Retry-After': String(decision.retryAfterSec) } }
                );
            }

            const body = await readBodyText(request, config.maxBodyBytes);
            if (!body.success) {
                return errorResponse(body.error);
            }
            const json = parseJsonBody(body.text);
            if (!json.success) {
                return errorResponse(json.error);
            }
            const validated = validateGeneratePayload(json.data, config.limits);
            if (!validated.success) {
                return errorResponse(validated.error);
            }

            const outcome = generateMap(validated.config, getRenderer(), { now });
            if (!outcome.success) {
                console.warn(`[generate] ${outcome.error.message}`);
                return errorResponse(outcome.error);
            }

            return NextResponse.json(toGenerateResponse(outcome.result));
        } catch (error) {
            console.error('[generate] unexpected failure:', error);
            return jsonError(500, 'internal server error');
        }
    };
}
