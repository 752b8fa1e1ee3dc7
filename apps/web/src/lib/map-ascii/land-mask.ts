/**
 * Land/water lookup over coarse world outlines in [lon, lat] degrees.
 * Rings of one polygon combine by even-odd, so an inner ring is a lake.
 */
import { z } from 'zod';
import landData from './data/land.json';

export type LonLat = readonly [number, number];
export type Ring = readonly LonLat[];

export interface LandPolygon {
    name: string;
    rings: readonly Ring[];
}

interface IndexedPolygon {
    rings: readonly Ring[];
    minLon: number;
    maxLon: number;
    minLat: number;
    maxLat: number;
}

const LonLatSchema = z.tuple([z.number().min(-180).max(180), z.number().min(-90).max(90)]);

export const LandMaskDataSchema = z.object({
    polygons: z
        .array(
            z.object({
                name: z.string().min(1),
                rings: z.array(z.array(LonLatSchema).min(3)).min(1),
            })
        )
        .min(1),
});

function ringContains(ring: Ring, lon: number, lat: number): boolean {
    let inside = false;
    for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
        const [xi, yi] = ring[i];
        const [xj, yj] = ring[j];
        if (yi > lat !== yj > lat && lon < ((xj - xi) * (lat - yi)) / (yj - yi) + xi) {
            inside = !inside;
        }
    }
    return inside;
}

export class LandMask {
    private readonly polygons: IndexedPolygon[];

    constructor(polygons: readonly LandPolygon[]) {
        this.polygons = polygons.map(({ rings }) => {
            const points = rings.flat();
            const lons = points.map(([lon]) => lon);
            const lats = points.map(([, lat]) => lat);
            return {
                rings,
                minLon: Math.min(...lons),
                maxLon: Math.max(...lons),
                minLat: Math.min(...lats),
                maxLat: Math.max(...lats),
            };
        });
    }

    get polygonCount(): number {
        return this.polygons.length;
    }

    isLand(lon: number, lat: number): boolean {
        for (const polygon of this.polygons) {
            if (lon < polygon.minLon || lon > polygon.maxLon || lat < polygon.minLat || lat > polygon.maxLat) {
                continue;
            }
            let inside = false;
            for (const ring of polygon.rings) {
                if (ringContains(ring, lon, lat)) inside = !inside;
            }
            if (inside) return true;
        }
        return false;
    }
}

/** Builds a mask from raw outline data; throws when the data is malformed. */
export function loadLandMask(data: unknown): LandMask {
    const parsed = LandMaskDataSchema.safeParse(data);
    if (!parsed.success) {
        const [issue] = parsed.error.issues;
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new Error(`invalid land mask data${where}: ${issue?.message ?? 'unexpected shape'}`);
    }
    return new LandMask(parsed.data.polygons);
}

let defaultMask: LandMask | null = null;

/** The bundled world outlines, validated once per module instance. */
export function getDefaultLandMask(): LandMask {
    if (!defaultMask) {
        defaultMask = loadLandMask(landData);
    }
    return defaultMask;
}
