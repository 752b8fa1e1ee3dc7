/**
 * Render-ready types shared by the validator, the orchestrator and the renderer.
 * Request-scoped and immutable once produced by validation.
 */

export const ANSI_COLORS = [
    'black',
    'red',
    'green',
    'yellow',
    'blue',
    'magenta',
    'cyan',
    'white',
    'bright-black',
    'bright-red',
    'bright-green',
    'bright-yellow',
    'bright-blue',
    'bright-magenta',
    'bright-cyan',
    'bright-white',
] as const;

/** One of the 16 ANSI palette names, or '' for the terminal default. */
export type AnsiColor = (typeof ANSI_COLORS)[number] | '';

export const COLOR_MODES = ['never', 'always'] as const;
export type ColorMode = (typeof COLOR_MODES)[number];

export interface Marker {
    lon: number;
    lat: number;
    /** Single ASCII characters. */
    center: string;
    horizontal: string;
    vertical: string;
    /** Arm length in cells; -1 means unbounded. */
    armX: number;
    armY: number;
}

export interface ColorConfig {
    mode: ColorMode;
    mapColor: AnsiColor;
    frameColor: AnsiColor;
    markerColor: AnsiColor;
}

export interface GenerateConfig {
    readonly width: number;
    readonly supersample: number;
    readonly charAspect: number;
    readonly margin: number;
    readonly frame: boolean;
    readonly marker: Readonly<Marker> | null;
    readonly color: Readonly<ColorConfig>;
}

export interface GenerateLimits {
    minWidth: number;
    maxWidth: number;
    minSupersample: number;
    maxSupersample: number;
    maxMargin: number;
    minCharAspect: number;
    maxCharAspect: number;
}

export interface RenderOptions {
    marginRows: number;
    frame: boolean;
    colorMode: string;
    mapColor: string;
    frameColor: string;
    markerColor: string;
}

/** Consumed rendering capability. Throws when it rejects the parameters. */
export interface MapRenderer {
    render(
        width: number,
        supersample: number,
        charAspect: number,
        marker: Readonly<Marker> | null,
        options: RenderOptions
    ): string;
}

export interface GenerateMeta {
    width: number;
    height: number;
    supersample: number;
    charAspect: number;
    durationMs: number;
    bytes: number;
}

export interface GenerateResult {
    plain: string;
    ansi: string;
    meta: GenerateMeta;
}

/** JSON body of a successful POST /api/generate. */
export interface GenerateResponse {
    plain: string;
    ansi: string;
    meta: {
        width: number;
        height: number;
        supersample: number;
        char_aspect: number;
        duration_ms: number;
        bytes: number;
    };
}
