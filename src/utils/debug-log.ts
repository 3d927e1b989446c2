import { readTimelineConfig } from '@config/timelineConfig';
import { processEnv, type EnvSource } from './env';

// Lightweight debug logging shared by the timing and song modules
export function isDebugEnabled(env: EnvSource = processEnv()): boolean {
    return readTimelineConfig(env).debug;
}

export function debugLog(...args: unknown[]): void {
    if (isDebugEnabled()) {
        // eslint-disable-next-line no-console
        console.log(...args);
    }
}
