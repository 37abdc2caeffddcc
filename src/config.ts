import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseBoolean } from './params/Parameter.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

// src/ when run from sources, dist/src/ when built
function readPackageVersion(): string {
    for (const candidate of ['../package.json', '../../package.json']) {
        const file = path.resolve(moduleDir, candidate);
        if (!fs.existsSync(file)) continue;
        const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
            return parsed.version;
        }
    }
    return '0.0.0';
}

const configDir = process.env.STACK_CONFIG_DIR ?? path.join(process.env.HOME ?? '.', '.stacknode');
const rawLogLevel = (process.env.LOG_LEVEL ?? 'info').toLowerCase();

export const config = {
    version: readPackageVersion(),
    // Directory holding the settings file and the stack's runtime data
    configDir,
    settingsFile: process.env.STACK_CONFIG_FILE ?? path.join(configDir, 'user-settings.yml'),
    nativeMode: parseBoolean(process.env.STACK_NATIVE_MODE ?? 'false') ?? false,
    logLevel: isLogLevel(rawLogLevel) ? rawLogLevel : 'info',
};
export type Config = typeof config;

export { LOG_LEVELS };
