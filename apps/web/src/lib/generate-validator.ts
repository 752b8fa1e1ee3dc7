/**
 * Turns an untrusted generate payload into a render-ready GenerateConfig.
 *
 * Structural problems (bad JSON, unknown keys, wrong types) are MalformedPayload.
 * Bounds are then checked in a fixed order and the first violation is reported
 * as ValidationFailed; nothing is accumulated.
 */
import type { ZodIssue } from 'zod';
import {
    ANSI_COLORS,
    COLOR_MODES,
    type AnsiColor,
    type ColorMode,
    type GenerateConfig,
    type GenerateLimits,
    type Marker,
} from '@/types/map';
import { malformedPayload, validationFailed, type ApiError } from './errors';
import { DEFAULT_MARKER_GLYPHS, GeneratePayloadSchema, type GeneratePayload } from './generate-schema';

export type ValidationResult =
    | { success: true; config: GenerateConfig }
    | { success: false; error: ApiError };

export type JsonParseResult = { success: true; data: unknown } | { success: false; error: ApiError };

type GlyphResult = { success: true; glyph: string } | { success: false; error: ApiError };

const COLOR_MODE_SET: ReadonlySet<string> = new Set(COLOR_MODES);
const ANSI_COLOR_SET: ReadonlySet<string> = new Set<string>(['', ...ANSI_COLORS]);

function isColorMode(value: string): value is ColorMode {
    return COLOR_MODE_SET.has(value);
}

function isAnsiColor(value: string): value is AnsiColor {
    return ANSI_COLOR_SET.has(value);
}

function normalizeName(value: string): string {
    return value.trim().toLowerCase();
}

/** Parses a request body. Trailing content after the JSON value is rejected along with syntax errors. */
export function parseJsonBody(text: string): JsonParseResult {
    try {
        return { success: true, data: JSON.parse(text) };
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        return { success: false, error: malformedPayload(detail) };
    }
}

function describeIssue(issue: ZodIssue): string {
    return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Reads a single-ASCII-character field. Blank falls back to the default glyph.
 */
export function parseAsciiGlyph(value: string, fallback: string, field: string): GlyphResult {
    const trimmed = value.trim();
    if (trimmed === '') {
        return { success: true, glyph: fallback };
    }

    const codePoints = Array.from(trimmed);
    if (codePoints.length !== 1) {
        return { success: false, error: validationFailed(`${field} must be a single ASCII character`) };
    }
    const codePoint = trimmed.codePointAt(0) ?? 0;
    if (codePoint > 127) {
        return { success: false, error: validationFailed(`${field} must be ASCII`) };
    }
    return { success: true, glyph: trimmed };
}

function checkMarker(payload: GeneratePayload['marker']): { success: true; marker: Marker } | { success: false; error: ApiError } {
    const { lon, lat } = payload;
    if (!Number.isFinite(lon) || lon < -180 || lon > 180) {
        return { success: false, error: validationFailed('marker.lon must be between -180 and 180') };
    }
    if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
        return { success: false, error: validationFailed('marker.lat must be between -90 and 90') };
    }
    if (payload.arm_x < -1 || payload.arm_y < -1) {
        return { success: false, error: validationFailed('marker arm lengths must be -1 or greater') };
    }

    const center = parseAsciiGlyph(payload.center, DEFAULT_MARKER_GLYPHS.center, 'marker.center');
    if (!center.success) return center;
    const horizontal = parseAsciiGlyph(payload.horizontal, DEFAULT_MARKER_GLYPHS.horizontal, 'marker.horizontal');
    if (!horizontal.success) return horizontal;
    const vertical = parseAsciiGlyph(payload.vertical, DEFAULT_MARKER_GLYPHS.vertical, 'marker.vertical');
    if (!vertical.success) return vertical;

    return {
        success: true,
        marker: {
            lon,
            lat,
            center: center.glyph,
            horizontal: horizontal.glyph,
            vertical: vertical.glyph,
            armX: payload.arm_x,
            armY: payload.arm_y,
        },
    };
}

export function validateGeneratePayload(raw: unknown, limits: GenerateLimits): ValidationResult {
    const parsed = GeneratePayloadSchema.safeParse(raw);
    if (!parsed.success) {
        const [issue] = parsed.error.issues;
        return { success: false, error: malformedPayload(issue ? describeIssue(issue) : 'unexpected shape') };
    }
    const payload = parsed.data;

    if (payload.width < limits.minWidth || payload.width > limits.maxWidth) {
        return {
            success: false,
            error: validationFailed(`width must be between ${limits.minWidth} and ${limits.maxWidth}`),
        };
    }
    if (payload.supersample < limits.minSupersample || payload.supersample > limits.maxSupersample) {
        return {
            success: false,
            error: validationFailed(
                `supersample must be between ${limits.minSupersample} and ${limits.maxSupersample}`
            ),
        };
    }
    if (payload.margin < 0 || payload.margin > limits.maxMargin) {
        return { success: false, error: validationFailed(`margin must be between 0 and ${limits.maxMargin}`) };
    }
    const charAspect = payload.char_aspect;
    if (!Number.isFinite(charAspect) || charAspect < limits.minCharAspect || charAspect > limits.maxCharAspect) {
        return {
            success: false,
            error: validationFailed(
                `char_aspect must be between ${limits.minCharAspect.toFixed(1)} and ${limits.maxCharAspect.toFixed(1)}`
            ),
        };
    }

    const mode = normalizeName(payload.color.mode);
    if (!isColorMode(mode)) {
        return { success: false, error: validationFailed('color.mode must be one of: never, always') };
    }
    const mapColor = normalizeName(payload.color.map_color);
    if (!isAnsiColor(mapColor)) {
        return { success: false, error: validationFailed('color.map_color is not a supported ANSI 16 color') };
    }
    const frameColor = normalizeName(payload.color.frame_color);
    if (!isAnsiColor(frameColor)) {
        return { success: false, error: validationFailed('color.frame_color is not a supported ANSI 16 color') };
    }
    const markerColor = normalizeName(payload.color.marker_color);
    if (!isAnsiColor(markerColor)) {
        return { success: false, error: validationFailed('color.marker_color is not a supported ANSI 16 color') };
    }

    let marker: Marker | null = null;
    if (payload.marker.enabled) {
        const checked = checkMarker(payload.marker);
        if (!checked.success) return checked;
        marker = checked.marker;
    }

    return {
        success: true,
        config: {
            width: payload.width,
            supersample: payload.supersample,
            charAspect,
            margin: payload.margin,
            frame: payload.frame,
            marker,
            color: { mode, mapColor, frameColor, markerColor },
        },
    };
}
