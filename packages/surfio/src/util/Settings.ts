import fs from 'fs/promises';
import type { ApplySurfaceTransformOptions } from '../surface/SurfaceNormalizer';
import { hasErrorCode } from './FileUtil';
import { BatchFileLogger, consoleLogger, type SurfaceLogger } from './Logger';

export interface NormalizerSettings {
    outputDir?: string;
    invert: boolean;
    center: boolean;
    logFile?: string;
}

export const defaultNormalizerSettings: Readonly<NormalizerSettings> = {
    invert: true,
    center: false,
};

export class SettingsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SettingsError';
    }
}

/** '1', 't', 'y' (any case) are true; everything else is false */
export function parseFlag(v: string): boolean {
    return ['1', 't', 'T', 'y', 'Y'].includes(v.trim()[0] ?? '');
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function parseSettings(raw: unknown, source = 'settings'): Partial<NormalizerSettings> {
    if (!isRecord(raw)) {
        throw new SettingsError(`${source}: expected a JSON object`);
    }
    const out: Partial<NormalizerSettings> = {};
    const str = (k: 'outputDir' | 'logFile') => {
        const v = raw[k];
        if (v === undefined) return;
        if (typeof v !== 'string') throw new SettingsError(`${source}: ${k} must be a string`);
        out[k] = v;
    };
    const bool = (k: 'invert' | 'center') => {
        const v = raw[k];
        if (v === undefined) return;
        if (typeof v !== 'boolean') throw new SettingsError(`${source}: ${k} must be true or false`);
        out[k] = v;
    };
    str('outputDir');
    str('logFile');
    bool('invert');
    bool('center');
    return out;
}

/**
 * Defaults, then the JSON settings file (a missing file is fine), then
 * SURFNORM_OUTPUT_DIR / SURFNORM_LOG_FILE / SURFNORM_INVERT from the environment.
 */
export async function loadNormalizerSettings(
    settingsPath?: string,
    env: NodeJS.ProcessEnv = process.env,
): Promise<NormalizerSettings> {
    let fromFile: Partial<NormalizerSettings> = {};
    if (settingsPath) {
        try {
            const raw = await fs.readFile(settingsPath, 'utf8');
            fromFile = parseSettings(JSON.parse(raw), settingsPath);
        } catch (e) {
            if (!hasErrorCode(e, 'ENOENT')) throw e;
        }
    }

    const settings: NormalizerSettings = { ...defaultNormalizerSettings, ...fromFile };
    if (env.SURFNORM_OUTPUT_DIR) settings.outputDir = env.SURFNORM_OUTPUT_DIR;
    if (env.SURFNORM_LOG_FILE) settings.logFile = env.SURFNORM_LOG_FILE;
    if (env.SURFNORM_INVERT) settings.invert = parseFlag(env.SURFNORM_INVERT);
    return settings;
}

export function createLoggerFromSettings(settings: NormalizerSettings): SurfaceLogger {
    return settings.logFile ? new BatchFileLogger({ filePath: settings.logFile }) : consoleLogger;
}

export function resolveTransformOptions(
    settings: NormalizerSettings,
    logger: SurfaceLogger = createLoggerFromSettings(settings),
): ApplySurfaceTransformOptions {
    return {
        invert: settings.invert,
        center: settings.center,
        outputDir: settings.outputDir,
        logger,
    };
}
