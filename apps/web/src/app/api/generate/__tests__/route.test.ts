import { describe, it, expect, vi, afterEach } from 'vitest';
import type { MapRenderer, RenderOptions } from '@/types/map';
import { DEFAULT_CONFIG, type AppConfig } from '@/lib/config';
import { createGenerateHandler } from '@/lib/generate-handler';
import { FixedWindowRateLimiter } from '@/lib/rate-limit';
import { DELETE, GET, OPTIONS } from '../route';

const NOW = 1_000_000;

function fakeRenderer(): MapRenderer {
    return {
        render: (_width: number, _supersample: number, _charAspect: number, _marker: unknown, options: RenderOptions) =>
            options.colorMode === 'always' ? 'ANSI\n' : 'PLAIN\n',
    };
}

function setup(overrides: { config?: Partial<AppConfig>; limit?: number; getRenderer?: () => MapRenderer } = {}) {
    const config: AppConfig = { ...DEFAULT_CONFIG, ...overrides.config };
    return createGenerateHandler({
        config,
        limiter: new FixedWindowRateLimiter(overrides.limit ?? 20, 60_000),
        getRenderer: overrides.getRenderer ?? fakeRenderer,
        now: () => NOW,
    });
}

function post(body: string | undefined, ip = '203.0.113.7'): Request {
    return new Request('http://localhost/api/generate', {
        method: 'POST',
        headers: { 'content-type': 'application/json', 'x-forwarded-for': ip },
        body,
    });
}

describe('POST /api/generate', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('returns both renders and meta for the default payload', async () => {
        const POST = setup();
        const res = await POST(post('{}'));

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({
            plain: 'PLAIN\n',
            ansi: 'ANSI\n',
            meta: { width: 120, height: 30, supersample: 3, char_aspect: 2, duration_ms: 0, bytes: 6 },
        });
    });

    it('mirrors plain into ansi when color is off', async () => {
        const POST = setup();
        const res = await POST(post(JSON.stringify({ width: 80, char_aspect: 2.5, color: { mode: 'never' } })));

        expect(res.status).toBe(200);
        const data = await res.json();
        expect(data.ansi).toBe('PLAIN\n');
        expect(data.meta.height).toBe(16);
    });

    it('rejects bodies that are not JSON', async () => {
        const POST = setup();
        const res = await POST(post('{"width": 120,'));

        expect(res.status).toBe(400);
        expect((await res.json()).error).toMatch(/^invalid JSON payload: /);
    });

    it('rejects an empty body', async () => {
        const POST = setup();
        const res = await POST(post(undefined));

        expect(res.status).toBe(400);
        expect((await res.json()).error).toMatch(/^invalid JSON payload: /);
    });

    it('rejects unknown fields', async () => {
        const POST = setup();
        const res = await POST(post(JSON.stringify({ height: 40 })));

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: "invalid JSON payload: Unrecognized key(s) in object: 'height'" });
    });

    it('reports the first bound violation', async () => {
        const POST = setup();
        const res = await POST(post(JSON.stringify({ width: 10, supersample: 9 })));

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'width must be between 20 and 240' });
    });

    it('refuses bodies over the configured cap', async () => {
        const POST = setup({ config: { maxBodyBytes: 16 } });
        const res = await POST(post(JSON.stringify({ width: 120, supersample: 3 })));

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'invalid JSON payload: request body too large' });
    });

    it('maps renderer failures to 400 and logs them', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const POST = setup({
            getRenderer: () => ({
                render: () => {
                    throw new Error('boom');
                },
            }),
        });
        const res = await POST(post('{}'));

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'render plain output failed: boom' });
        expect(warn).toHaveBeenCalledWith('[generate] render plain output failed: boom');
    });

    it('answers 429 with Retry-After once a client spends its budget', async () => {
        const POST = setup({ limit: 1 });

        expect((await POST(post('{}'))).status).toBe(200);
        const limited = await POST(post('{}'));
        expect(limited.status).toBe(429);
        expect(limited.headers.get('Retry-After')).toBe('60');
        expect(await limited.json()).toEqual({ error: 'rate limit exceeded' });

        expect((await POST(post('{}', '198.51.100.4'))).status).toBe(200);
    });

    it('charges rejected payloads against the budget', async () => {
        const POST = setup({ limit: 1 });

        expect((await POST(post('not json'))).status).toBe(400);
        expect((await POST(post('{}'))).status).toBe(429);
    });

    it('hides unexpected failures behind a 500', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const failure = new Error('land mask unavailable');
        const POST = setup({
            getRenderer: () => {
                throw failure;
            },
        });
        const res = await POST(post('{}'));

        expect(res.status).toBe(500);
        expect(await res.json()).toEqual({ error: 'internal server error' });
        expect(error).toHaveBeenCalledWith('[generate] unexpected failure:', failure);
    });
});

describe('other methods on /api/generate', () => {
    it('answer 405 with an Allow header', async () => {
        for (const handler of [GET, DELETE, OPTIONS]) {
            const res = handler();
            expect(res.status).toBe(405);
            expect(res.headers.get('Allow')).toBe('POST');
            expect(await res.json()).toEqual({ error: 'method not allowed' });
        }
    });
});
