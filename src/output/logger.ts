/**
 * Logger utility for chunkwright
 *
 * The engine reports oversized chunks and fences through warn(). Output goes
 * to the console unless a pipeline installs its own sink, and silent mode
 * mutes it.
 */

export interface LogSink {
    warn(message: string): void;
}

const PREFIX = '[chunkwright]';

let silentMode = false;
let sink: LogSink = console;

/**
 * Enable or disable silent mode.
 * When enabled, warn() outputs nothing.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

export function isSilentMode(): boolean {
    return silentMode;
}

/**
 * Routes output to `next`; pass nothing to restore the console.
 */
export function setLogSink(next: LogSink = console): void {
    sink = next;
}

export function warn(message: string): void {
    if (!silentMode) {
        sink.warn(`${PREFIX} ${message}`);
    }
}
