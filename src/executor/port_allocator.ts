// src/executor/port_allocator.ts

import { PORT_PROBE_ATTEMPTS } from '../config';
import { isPortAvailable } from './process_runner';
import type { PortProbe } from './types';

/**
 * First bindable port in [start, start + attempts) that is not already
 * reserved. Falls back to the first unreserved port from start + attempts
 * without probing it; never rejects.
 */
export async function allocatePort(
    start: number,
    attempts: number = PORT_PROBE_ATTEMPTS,
    probe: PortProbe = isPortAvailable,
    reserved: ReadonlySet<number> = new Set()
): Promise<number> {
    for (let i = 0; i < attempts; i++) {
        const port = start + i;
        if (port > 65535) break;
        if (reserved.has(port)) continue;
        if (await probe(port)) return port;
    }
    let fallback = start + attempts;
    while (reserved.has(fallback)) fallback++;
    return fallback;
}
