/**
 * Dual-render orchestration: a colorless baseline is always rendered, and a
 * colorized variant is rendered separately only when color mode is `always`.
 * Either render failing fails the whole generation.
 */
import type {
    GenerateConfig,
    GenerateResponse,
    GenerateResult,
    MapRenderer,
    RenderOptions,
} from '@/types/map';
import type { ApiError } from './errors';

export type RenderVariant = 'plain' | 'ansi';

export interface RenderFailure extends ApiError {
    kind: 'RenderFailed';
    variant: RenderVariant;
}

export type GenerateOutcome = { success: true; result: GenerateResult } | { success: false; error: RenderFailure };

export interface GenerateOptions {
    /** Millisecond clock used for `durationMs`. */
    now?: () => number;
}

/** Rows of the map body for a given width; depends only on geometry, never on rendered text. */
export function computeMapHeight(width: number, charAspect: number): number {
    return Math.round(width / (2 * charAspect));
}

function renderVariant(
    renderer: MapRenderer,
    config: GenerateConfig,
    variant: RenderVariant,
    options: RenderOptions
): { success: true; text: string } | { success: false; error: RenderFailure } {
    try {
        const text = renderer.render(config.width, config.supersample, config.charAspect, config.marker, options);
        return { success: true, text };
    } catch (error) {
        const cause = error instanceof Error ? error.message : String(error);
        return {
            success: false,
            error: { kind: 'RenderFailed', variant, message: `render ${variant} output failed: ${cause}` },
        };
    }
}

export function generateMap(
    config: GenerateConfig,
    renderer: MapRenderer,
    { now = Date.now }: GenerateOptions = {}
): GenerateOutcome {
    const { color } = config;
    const started = now();

    const plain = renderVariant(renderer, config, 'plain', {
        marginRows: config.margin,
        frame: config.frame,
        colorMode: 'never',
        mapColor: color.mapColor,
        frameColor: color.frameColor,
        markerColor: color.markerColor,
    });
    if (!plain.success) return plain;

    let ansi = plain.text;
    if (color.mode === 'always') {
        const colored = renderVariant(renderer, config, 'ansi', {
            marginRows: config.margin,
            frame: config.frame,
            colorMode: color.mode,
            mapColor: color.mapColor,
            frameColor: color.frameColor,
            markerColor: color.markerColor,
        });
        if (!colored.success) return colored;
        ansi = colored.text;
    }

    const durationMs = Math.max(0, Math.trunc(now() - started));

    return {
        success: true,
        result: {
            plain: plain.text,
            ansi,
            meta: {
                width: config.width,
                height: computeMapHeight(config.width, config.charAspect),
                supersample: config.supersample,
                charAspect: config.charAspect,
                durationMs,
                bytes: Buffer.byteLength(plain.text, 'utf8'),
            },
        },
    };
}

export function toGenerateResponse(result: GenerateResult): GenerateResponse {
    const { meta } = result;
    return {
        plain: result.plain,
        ansi: result.ansi,
        meta: {
            width: meta.width,
            height: meta.height,
            supersample: meta.supersample,
            char_aspect: meta.charAspect,
            duration_ms: meta.durationMs,
            bytes: meta.bytes,
        },
    };
}
