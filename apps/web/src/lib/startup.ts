import { describeLimits, loadConfig, type AppConfig } from './config';
import { getDefaultLandMask, type LandMask } from './map-ascii/land-mask';

export interface StartupOptions {
    config?: AppConfig;
    loadLandMask?: () => LandMask;
    exit?: (code: number) => void;
}

/**
 * Runs once per server process. A land mask that fails to load is fatal:
 * the process exits instead of serving requests it cannot render.
 */
export function startup({
    config = loadConfig(),
    loadLandMask = getDefaultLandMask,
    exit = (code) => process.exit(code),
}: StartupOptions = {}): boolean {
    console.log(`[startup] ${describeLimits(config)}`);

    try {
        const mask = loadLandMask();
        console.log(`[startup] land mask loaded (${mask.polygonCount} polygons)`);
        return true;
    } catch (error) {
        console.error('[startup] failed to load land mask:', error);
        exit(1);
        return false;
    }
}
