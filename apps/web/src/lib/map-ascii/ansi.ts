import type { AnsiColor } from '@/types/map';

type PaletteName = Exclude<AnsiColor, ''>;

const SGR_FOREGROUND: Record<PaletteName, number> = {
    black: 30,
    red: 31,
    green: 32,
    yellow: 33,
    blue: 34,
    magenta: 35,
    cyan: 36,
    white: 37,
    'bright-black': 90,
    'bright-red': 91,
    'bright-green': 92,
    'bright-yellow': 93,
    'bright-blue': 94,
    'bright-magenta': 95,
    'bright-cyan': 96,
    'bright-white': 97,
};

export const ANSI_RESET = '\u001b[0m';

function isPaletteName(name: string): name is PaletteName {
    return Object.prototype.hasOwnProperty.call(SGR_FOREGROUND, name);
}

/**
 * SGR foreground code for a palette name; null for '' (terminal default).
 * Throws for names outside the palette.
 */
export function sgrCode(name: string): number | null {
    const key = name.trim().toLowerCase();
    if (key === '') return null;
    if (!isPaletteName(key)) {
        throw new Error(`unsupported color "${name}"`);
    }
    return SGR_FOREGROUND[key];
}

export function colorize(text: string, code: number | null): string {
    if (code === null || text === '') return text;
    return `\u001b[${code}m${text}${ANSI_RESET}`;
}
