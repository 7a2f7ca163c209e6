import type { LogLevel } from '../types/index.js';
import { InvalidOptionError } from '../utils/errors.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (value === undefined) return undefined;
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) throw new InvalidOptionError('--log-level', value);
    return level;
}

/**
 * A non-negative integer flag. Absent flags stay undefined so lower
 * configuration layers apply.
 */
export function parseCount(value: string | undefined, option: string): number | undefined {
    if (value === undefined) return undefined;
    if (!/^\d+$/.test(value)) throw new InvalidOptionError(option, value);
    return parseInt(value, 10);
}

/**
 * Neighborhood depth: 1 or 2, the range the config file accepts.
 */
export function parseDepth(value: string | undefined): number | undefined {
    const depth = parseCount(value, '--depth');
    if (depth !== undefined && (depth < 1 || depth > 2)) {
        throw new InvalidOptionError('--depth', String(value));
    }
    return depth;
}
