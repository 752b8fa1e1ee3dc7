/**
 * Equirectangular ASCII world renderer.
 *
 * The map body is `width` columns by round(width / (2 * charAspect)) rows; each
 * cell is sampled on a supersample x supersample lattice against the land mask.
 */
import type { MapRenderer, Marker, RenderOptions } from '@/types/map';
import { colorize, sgrCode } from './ansi';
import type { LandMask } from './land-mask';

export const LAND_GLYPH = '#';
export const COAST_GLYPH = '.';
export const WATER_GLYPH = ' ';

type CellRole = 'water' | 'land' | 'marker';

interface Cell {
    glyph: string;
    role: CellRole;
}

interface Palette {
    map: number | null;
    frame: number | null;
    marker: number | null;
}

export class MapRenderError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MapRenderError';
    }
}

function assertGeometry(width: number, supersample: number, charAspect: number, marginRows: number): number {
    if (!Number.isInteger(width) || width < 1) {
        throw new MapRenderError(`width must be a positive integer, got ${width}`);
    }
    if (!Number.isInteger(supersample) || supersample < 1) {
        throw new MapRenderError(`supersample must be a positive integer, got ${supersample}`);
    }
    if (!Number.isFinite(charAspect) || charAspect <= 0) {
        throw new MapRenderError(`char aspect must be a positive number, got ${charAspect}`);
    }
    if (!Number.isInteger(marginRows) || marginRows < 0) {
        throw new MapRenderError(`margin rows must be a non-negative integer, got ${marginRows}`);
    }
    const rows = Math.round(width / (2 * charAspect));
    if (rows < 1) {
        throw new MapRenderError(`map height rounds to ${rows} rows for width ${width} and char aspect ${charAspect}`);
    }
    return rows;
}

function assertGlyph(glyph: string, name: string): void {
    const codePoints = Array.from(glyph);
    if (codePoints.length !== 1 || (glyph.codePointAt(0) ?? 0) > 127) {
        throw new MapRenderError(`marker ${name} glyph must be one ASCII character`);
    }
}

function assertMarker(marker: Readonly<Marker>): void {
    if (!Number.isFinite(marker.lon) || marker.lon < -180 || marker.lon > 180) {
        throw new MapRenderError(`marker longitude ${marker.lon} is outside [-180, 180]`);
    }
    if (!Number.isFinite(marker.lat) || marker.lat < -90 || marker.lat > 90) {
        throw new MapRenderError(`marker latitude ${marker.lat} is outside [-90, 90]`);
    }
    if (!Number.isInteger(marker.armX) || !Number.isInteger(marker.armY) || marker.armX < -1 || marker.armY < -1) {
        throw new MapRenderError('marker arm lengths must be integers of -1 or greater');
    }
    assertGlyph(marker.center, 'center');
    assertGlyph(marker.horizontal, 'horizontal');
    assertGlyph(marker.vertical, 'vertical');
}

function resolvePalette(options: RenderOptions): Palette | null {
    const mode = options.colorMode.trim().toLowerCase();
    if (mode === 'never') return null;
    if (mode !== 'always') {
        throw new MapRenderError(`unsupported color mode "${options.colorMode}"`);
    }
    try {
        return {
            map: sgrCode(options.mapColor),
            frame: sgrCode(options.frameColor),
            marker: sgrCode(options.markerColor),
        };
    } catch (error) {
        throw new MapRenderError(error instanceof Error ? error.message : String(error));
    }
}

function rasterize(mask: LandMask, width: number, rows: number, supersample: number): Cell[][] {
    const lonStep = 360 / width;
    const latStep = 180 / rows;
    const samples = supersample * supersample;
    const grid: Cell[][] = [];

    for (let row = 0; row < rows; row++) {
        const line: Cell[] = [];
        for (let col = 0; col < width; col++) {
            let landSamples = 0;
            for (let sy = 0; sy < supersample; sy++) {
                const lat = 90 - (row + (sy + 0.5) / supersample) * latStep;
                for (let sx = 0; sx < supersample; sx++) {
                    const lon = -180 + (col + (sx + 0.5) / supersample) * lonStep;
                    if (mask.isLand(lon, lat)) landSamples++;
                }
            }
            if (landSamples * 2 >= samples) {
                line.push({ glyph: LAND_GLYPH, role: 'land' });
            } else if (landSamples > 0) {
                line.push({ glyph: COAST_GLYPH, role: 'land' });
            } else {
                line.push({ glyph: WATER_GLYPH, role: 'water' });
            }
        }
        grid.push(line);
    }
    return grid;
}

/** Grid cell holding a coordinate; the poles and the antimeridian clamp into the last row/column. */
export function projectToCell(lon: number, lat: number, width: number, rows: number): { row: number; col: number } {
    const col = Math.min(width - 1, Math.max(0, Math.floor(((lon + 180) / 360) * width)));
    const row = Math.min(rows - 1, Math.max(0, Math.floor(((90 - lat) / 180) * rows)));
    return { row, col };
}

function drawMarker(grid: Cell[][], marker: Readonly<Marker>, width: number, rows: number): void {
    const { row, col } = projectToCell(marker.lon, marker.lat, width, rows);
    const reachX = marker.armX === -1 ? width : marker.armX;
    const reachY = marker.armY === -1 ? rows : marker.armY;

    for (let d = 1; d <= reachX; d++) {
        for (const c of [col - d, col + d]) {
            if (c >= 0 && c < width) grid[row][c] = { glyph: marker.horizontal, role: 'marker' };
        }
    }
    for (let d = 1; d <= reachY; d++) {
        for (const r of [row - d, row + d]) {
            if (r >= 0 && r < rows) grid[r][col] = { glyph: marker.vertical, role: 'marker' };
        }
    }
    grid[row][col] = { glyph: marker.center, role: 'marker' };
}

function lineText(cells: Cell[], palette: Palette | null): string {
    if (!palette) {
        return cells.map((cell) => cell.glyph).join('');
    }
    let out = '';
    let i = 0;
    while (i < cells.length) {
        const role = cells[i].role;
        let run = '';
        while (i < cells.length && cells[i].role === role) {
            run += cells[i].glyph;
            i++;
        }
        out += role === 'land' ? colorize(run, palette.map) : role === 'marker' ? colorize(run, palette.marker) : run;
    }
    return out;
}

export function renderWorldAscii(
    mask: LandMask,
    width: number,
    supersample: number,
    charAspect: number,
    marker: Readonly<Marker> | null,
    options: RenderOptions
): string {
    const rows = assertGeometry(width, supersample, charAspect, options.marginRows);
    if (marker) assertMarker(marker);
    const palette = resolvePalette(options);

    const grid = rasterize(mask, width, rows, supersample);
    if (marker) drawMarker(grid, marker, width, rows);

    const blank = WATER_GLYPH.repeat(width);
    const body = [
        ...Array.from({ length: options.marginRows }, () => blank),
        ...grid.map((cells) => lineText(cells, palette)),
        ...Array.from({ length: options.marginRows }, () => blank),
    ];

    let lines = body;
    if (options.frame) {
        const frameCode = palette ? palette.frame : null;
        const edge = colorize(`+${'-'.repeat(width)}+`, frameCode);
        const side = colorize('|', frameCode);
        lines = [edge, ...body.map((line) => `${side}${line}${side}`), edge];
    }

    return `${lines.join('\n')}\n`;
}

/** Binds a land mask into the renderer interface the generate pipeline consumes. */
export function createMapRenderer(mask: LandMask): MapRenderer {
    return {
        render: (width, supersample, charAspect, marker, options) =>
            renderWorldAscii(mask, width, supersample, charAspect, marker, options),
    };
}
