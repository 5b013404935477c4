import * as path from 'path';
import {
    MeshStructureError,
    NiftiXform,
    UnsupportedFormatError,
    addOffset,
    apply,
    getMetaValue,
    hasMetaEntry,
    identity,
    insertMetaEntry,
    invert as invertMatrix,
    replaceMetaValue,
    setMetaValue,
    vertexCount,
    type MetaEntry,
    type MetaList,
    type Vec3,
} from '@surfnorm/core';
import { castToDataType } from '../formats/GiftiCodec';
import { readSurfaceMesh, writeSurfaceMesh, type GiftiSurface } from '../formats/GiftiUtil';
import { classifyTransformFile, loadTransform } from '../formats/TransformFile';
import { splitExtension } from '../util/FileUtil';
import { consoleLogger, type SurfaceLogger } from '../util/Logger';

/** Volume-geometry centre (c_ras) written by FreeSurfer, one key per axis */
export const OFFSET_KEYS: readonly [string, string, string] = ['VolGeomC_R', 'VolGeomC_A', 'VolGeomC_S'];

/** '%f' of 0.0; downstream tools then apply no offset at all */
export const ZERO_OFFSET = '0.000000';

export const TARGET_SUFFIX = '_target.surf.gii';

const MIDTHICKNESS_MARKERS = ['midthickness', 'graymid'];

export const SECONDARY_STRUCTURE: Readonly<MetaEntry> = { name: 'AnatomicalStructureSecondary', value: 'MidThickness' };
export const GEOMETRIC_TYPE: Readonly<MetaEntry> = { name: 'GeometricType', value: 'Anatomical' };

export interface NormalizeSurfaceOptions {
    /** Directory the result is written to; stands in for the process working directory */
    cwd?: string;
    logger?: SurfaceLogger;
}

export interface ApplySurfaceTransformOptions {
    invert?: boolean; // default true
    center?: boolean; // default false
    outputDir?: string; // default process.cwd()
    offsetKeys?: readonly [string, string, string];
    logger?: SurfaceLogger;
}

export function isMidthicknessName(fileName: string): boolean {
    const lower = path.basename(fileName).toLowerCase();
    return MIDTHICKNESS_MARKERS.some((m) => lower.includes(m));
}

function parseOffsetValue(key: string, raw: string): number {
    const v = Number(raw.trim());
    if (!raw.trim() || Number.isNaN(v)) {
        throw new MeshStructureError(`Metadata ${key} is not a number: '${raw}'`);
    }
    return v;
}

/** Offsets for Operation A: an absent key counts as 0 */
export function readOffsetOrZero(meta: MetaList, keys: readonly [string, string, string] = OFFSET_KEYS): Vec3 {
    const val = (k: string) => {
        const raw = getMetaValue(meta, k);
        return raw === undefined ? 0.0 : parseOffsetValue(k, raw);
    };
    return [val(keys[0]), val(keys[1]), val(keys[2])];
}

/** Offsets for recentring after a transform: every key must be there */
export function readRequiredOffset(meta: MetaList, keys: readonly [string, string, string] = OFFSET_KEYS): Vec3 {
    const val = (k: string) => {
        const raw = getMetaValue(meta, k);
        if (raw === undefined) throw new MeshStructureError(`Point-set metadata has no ${k} entry to recentre with`);
        return parseOffsetValue(k, raw);
    };
    return [val(keys[0]), val(keys[1]), val(keys[2])];
}

/** Adds the MidThickness descriptors at positions 1 and 2 when they are missing */
export function ensureMidthicknessMeta(meta: MetaList) {
    const hasSecondary = hasMetaEntry(meta, SECONDARY_STRUCTURE.name);
    const hasGeomType = hasMetaEntry(meta, GEOMETRIC_TYPE.name);
    if (!hasSecondary) insertMetaEntry(meta, 1, SECONDARY_STRUCTURE);
    if (!hasGeomType) insertMetaEntry(meta, 2, GEOMETRIC_TYPE);
}

export function targetFileName(inFile: string): string {
    return `${splitExtension(inFile).stem}${TARGET_SUFFIX}`;
}

/** Operation A, in memory: coords <- transform · (coords + c_ras), then c_ras zeroed */
export function normalizeMesh(mesh: GiftiSurface, transform = identity(), fileName = mesh.sourcePath) {
    const { pointSet } = mesh;
    const offset = readOffsetOrZero(pointSet.meta);

    const moved = apply(addOffset(pointSet.coords, offset), transform);
    const coords = castToDataType(moved, mesh.pointLayout.dataType);
    if (!(coords instanceof Float32Array || coords instanceof Float64Array)) {
        throw new MeshStructureError(`Point-set data type ${mesh.pointLayout.dataType} is not a float type`);
    }
    pointSet.coords = coords;

    for (const k of OFFSET_KEYS) {
        replaceMetaValue(pointSet.meta, k, ZERO_OFFSET);
    }
    if (isMidthicknessName(fileName)) {
        ensureMidthicknessMeta(pointSet.meta);
    }
}

/**
 * Adds the FreeSurfer volume-geometry offset to every vertex (then applies the
 * optional transform) and zeroes that offset, so no later tool applies it twice.
 * The result is written under the input's base name in `cwd`, not next to the input.
 */
export async function normalizeSurface(
    inFile: string,
    transformFile?: string,
    options: NormalizeSurfaceOptions = {},
): Promise<string> {
    const logger = options.logger ?? consoleLogger;
    const outFile = path.resolve(options.cwd ?? process.cwd(), path.basename(inFile));
    try {
        const mesh = await readSurfaceMesh(inFile, (msg) => logger.warn(msg));
        const transform = await loadTransform(transformFile);

        normalizeMesh(mesh, transform, inFile);

        await writeSurfaceMesh(mesh, outFile);
        logger.info(
            `normalize ${inFile} -> ${outFile} (${vertexCount(mesh.pointSet)} vertices, transform=${transformFile ?? 'identity'})`,
        );
        return outFile;
    } catch (e) {
        logger.error(`normalize ${inFile} failed: ${e instanceof Error ? e.message : String(e)}`);
        throw e;
    }
}

/** Operation B, in memory; `matrix` is applied as given (invert beforehand if needed) */
export function transformMesh(
    mesh: GiftiSurface,
    matrix = identity(),
    center = false,
    offsetKeys: readonly [string, string, string] = OFFSET_KEYS,
) {
    const { pointSet, faceSet } = mesh;
    // Offsets come from the metadata as read, before any zeroing
    const offset = center ? readRequiredOffset(pointSet.meta, offsetKeys) : undefined;

    let moved = apply(pointSet.coords, matrix);
    if (offset) {
        moved = addOffset(moved, offset);
        for (const k of offsetKeys) {
            setMetaValue(pointSet.meta, k, ZERO_OFFSET);
        }
    }

    // The transform now lives in the coordinates; a recorded one would be applied twice
    pointSet.coordSys = {
        dataSpace: NiftiXform.ALIGNED_ANAT,
        transformedSpace: NiftiXform.ALIGNED_ANAT,
        xform: identity(),
    };

    pointSet.coords = Float32Array.from(moved);
    mesh.pointLayout = { ...mesh.pointLayout, dataType: 'NIFTI_TYPE_FLOAT32' };

    faceSet.indices = Float32Array.from(faceSet.indices);
    faceSet.meta = [];
    faceSet.coordSys = undefined;
    mesh.faceLayout = { ...mesh.faceLayout, dataType: 'NIFTI_TYPE_FLOAT32' };
}

/**
 * Applies an FSL or LTA affine to a surface, optionally inverted, optionally
 * followed by adding the volume-geometry offset.  Output is
 * `<outputDir>/<stem>_target.surf.gii`.
 */
export async function applySurfaceTransform(
    inFile: string,
    transformFile: string,
    options: ApplySurfaceTransformOptions = {},
): Promise<string> {
    const logger = options.logger ?? consoleLogger;
    const invert = options.invert ?? true;
    const center = options.center ?? false;
    const outFile = path.resolve(options.outputDir ?? process.cwd(), targetFileName(inFile));
    try {
        const mesh = await readSurfaceMesh(inFile, (msg) => logger.warn(msg));
        const loaded = await loadTransform(transformFile);
        const matrix = invert ? invertMatrix(loaded) : loaded;

        transformMesh(mesh, matrix, center, options.offsetKeys ?? OFFSET_KEYS);

        await writeSurfaceMesh(mesh, outFile);
        logger.info(
            `transform ${inFile} -> ${outFile} (${vertexCount(mesh.pointSet)} vertices, invert=${invert}, center=${center})`,
        );
        return outFile;
    } catch (e) {
        logger.error(`transform ${inFile} failed: ${e instanceof Error ? e.message : String(e)}`);
        throw e;
    }
}

export interface ApplyLtaTransformOptions {
    absoluteCoords?: boolean; // default true
    invert?: boolean; // default true
    outputDir?: string;
    logger?: SurfaceLogger;
}

/** LTA-only wrapper; absolute coordinates mean recentring after the transform */
export async function applyLtaTransform(
    inFile: string,
    ltaFile: string,
    options: ApplyLtaTransformOptions = {},
): Promise<string> {
    if (classifyTransformFile(ltaFile).kind !== 'lta') {
        throw new UnsupportedFormatError(ltaFile);
    }
    return applySurfaceTransform(inFile, ltaFile, {
        invert: options.invert ?? true,
        center: options.absoluteCoords ?? true,
        outputDir: options.outputDir,
        logger: options.logger,
    });
}
