import { ConfigError } from './errors.js';
import type { JsonwoodConfig, ObjectBacking } from './types.js';

export const OBJECT_BACKING_ENV = 'JSONWOOD_OBJECT_BACKING';

const OBJECT_BACKINGS: readonly ObjectBacking[] = ['ordered', 'hashed'];

function isObjectBacking(value: string): value is ObjectBacking {
    return (OBJECT_BACKINGS as readonly string[]).includes(value);
}

function toObjectBacking(value: string, source: string): ObjectBacking {
    if (!isObjectBacking(value)) {
        throw new ConfigError(`${source}: expected one of ${OBJECT_BACKINGS.join(', ')}, got "${value}"`);
    }
    return value;
}

/**
 * Read the initial configuration from the environment.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): JsonwoodConfig {
    const raw = env[OBJECT_BACKING_ENV];
    return {
        objectBacking: raw === undefined || raw === '' ? 'ordered' : toObjectBacking(raw, OBJECT_BACKING_ENV),
    };
}

let current: Readonly<JsonwoodConfig> = Object.freeze(loadConfig());

export function getConfig(): Readonly<JsonwoodConfig> {
    return current;
}

/**
 * Change the process-wide settings. Meant to be called once at startup:
 * maps created before the call keep the backing they were built with.
 */
export function configure(options: Partial<JsonwoodConfig>): Readonly<JsonwoodConfig> {
    const objectBacking = options.objectBacking === undefined
        ? current.objectBacking
        : toObjectBacking(options.objectBacking, 'objectBacking');
    current = Object.freeze({ ...current, objectBacking });
    return current;
}
