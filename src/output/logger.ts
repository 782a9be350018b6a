/**
 * Console output for the CLI and trace messages of the analyzer.
 *
 * Silent mode keeps stdout for machine-readable output (json) only; verbose
 * mode adds debug traces on stderr. Errors are never silenced.
 */
import { LOG_PREFIX } from '../config/constants';

interface OutputModes {
    silent: boolean;
    verbose: boolean;
}

const modes: OutputModes = { silent: false, verbose: false };

export function setSilentMode(silent: boolean): void {
    modes.silent = silent;
}

export function isSilentMode(): boolean {
    return modes.silent;
}

export function setVerboseMode(verbose: boolean): void {
    modes.verbose = verbose;
}

export function isVerboseMode(): boolean {
    return modes.verbose;
}

// stdout
export function log(...args: unknown[]): void {
    if (!modes.silent) console.log(...args);
}

// stderr
export function warn(...args: unknown[]): void {
    if (!modes.silent) console.warn(...args);
}

// stderr, verbose mode only
export function debug(...args: unknown[]): void {
    if (modes.verbose && !modes.silent) console.error(...args);
}

export function error(...args: unknown[]): void {
    console.error(...args);
}

/**
 * Sink for messages from library code. The analyzer takes one in its options,
 * so embedding code can capture traces instead of printing them.
 */
export interface Logger {
    debug(message: string): void;
    warn(message: string): void;
}

export const consoleLogger: Logger = {
    debug: (message) => debug(`${LOG_PREFIX} ${message}`),
    warn: (message) => warn(`${LOG_PREFIX} Warning: ${message}`),
};
