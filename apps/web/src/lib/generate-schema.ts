/**
 * Wire schema for POST /api/generate.
 * Every field carries its default so a partial payload decodes over the defaults;
 * an explicit null, at any level, leaves the default in place.
 * Objects are strict: unknown keys are a malformed payload, not ignored.
 */
import { z } from 'zod';

export const DEFAULT_MARKER_GLYPHS = {
    center: 'O',
    horizontal: '-',
    vertical: '|',
} as const;

/** Treats JSON null like an absent field so the wrapped default applies. */
function orDefault<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess((value) => value ?? undefined, schema);
}

export const MarkerPayloadSchema = z
    .object({
        enabled: orDefault(z.boolean().default(false)),
        lon: orDefault(z.number().default(0)),
        lat: orDefault(z.number().default(0)),
        center: orDefault(z.string().default(DEFAULT_MARKER_GLYPHS.center)),
        horizontal: orDefault(z.string().default(DEFAULT_MARKER_GLYPHS.horizontal)),
        vertical: orDefault(z.string().default(DEFAULT_MARKER_GLYPHS.vertical)),
        arm_x: orDefault(z.number().int().default(-1)),
        arm_y: orDefault(z.number().int().default(-1)),
    })
    .strict();

export const ColorPayloadSchema = z
    .object({
        mode: orDefault(z.string().default('always')),
        map_color: orDefault(z.string().default('green')),
        frame_color: orDefault(z.string().default('bright-white')),
        marker_color: orDefault(z.string().default('bright-red')),
    })
    .strict();

export const GeneratePayloadSchema = orDefault(
    z
        .object({
            width: orDefault(z.number().int().default(120)),
            supersample: orDefault(z.number().int().default(3)),
            char_aspect: orDefault(z.number().default(2.0)),
            margin: orDefault(z.number().int().default(2)),
            frame: orDefault(z.boolean().default(true)),
            marker: orDefault(MarkerPayloadSchema.default({})),
            color: orDefault(ColorPayloadSchema.default({})),
        })
        .strict()
        .default({})
);

export type GeneratePayload = z.infer<typeof GeneratePayloadSchema>;
