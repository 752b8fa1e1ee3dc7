/** Derives the rate-limit key for a request from proxy headers or the socket address. */
import { isIP } from 'node:net';

export const ANONYMOUS_CLIENT = 'anonymous';

const IPV4_MAPPED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/;

/** Returns the canonical text of an IP address, or null when `value` is not one. */
export function canonicalIp(value: string): string | null {
    const candidate = value.trim();
    const version = isIP(candidate);
    if (version === 4) {
        return candidate;
    }
    if (version !== 6) {
        return null;
    }

    // Zone IDs (fe80::1%eth0) pass isIP but are not client addresses.
    if (candidate.includes('%')) {
        return null;
    }

    const lower = candidate.toLowerCase();
    const mapped = IPV4_MAPPED.exec(lower);
    if (mapped && isIP(mapped[1]) === 4) {
        return mapped[1];
    }
    // WHATWG URL serialises IPv6 hosts in compressed, lower-case form.
    return new URL(`http://[${lower}]/`).hostname.slice(1, -1);
}

/** Strips a port from `host:port` or `[v6]:port`; bare addresses pass through. */
function hostFromRemoteAddress(remote: string): string {
    const value = remote.trim();
    const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(value);
    if (bracketed) {
        return bracketed[1];
    }
    if (isIP(value) !== 0) {
        return value;
    }
    const hostPort = /^([^:]+):\d+$/.exec(value);
    return hostPort ? hostPort[1] : value;
}

export function clientIdentifier(headers: Headers, remoteAddress?: string | null): string {
    const forwardedFor = headers.get('x-forwarded-for')?.trim();
    if (forwardedFor) {
        const first = canonicalIp(forwardedFor.split(',')[0]);
        if (first) return first;
    }

    const realIp = headers.get('x-real-ip')?.trim();
    if (realIp) {
        const parsed = canonicalIp(realIp);
        if (parsed) return parsed;
    }

    if (remoteAddress) {
        const parsed = canonicalIp(hostFromRemoteAddress(remoteAddress));
        if (parsed) return parsed;
    }

    return ANONYMOUS_CLIENT;
}
