import { loadConfig } from '@/lib/config';
import { createGenerateHandler } from '@/lib/generate-handler';
import { methodNotAllowed } from '@/lib/http';
import { getDefaultLandMask } from '@/lib/map-ascii/land-mask';
import { createMapRenderer } from '@/lib/map-ascii/render';
import { FixedWindowRateLimiter } from '@/lib/rate-limit';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const config = loadConfig();

/** Generates a plain and an ANSI-colored ASCII world map. Rate limited per client. */
export const POST = createGenerateHandler({
    config,
    limiter: new FixedWindowRateLimiter(config.rateLimit, config.rateWindowMs),
    getRenderer: () => createMapRenderer(getDefaultLandMask()),
});

const notAllowed = methodNotAllowed(['POST']);
export const GET = notAllowed;
export const PUT = notAllowed;
export const PATCH = notAllowed;
export const DELETE = notAllowed;
export const OPTIONS = notAllowed;
