import { mkdir } from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
    FormatError,
    MeshStructureError,
    NiftiXform,
    SingularMatrixError,
    UnsupportedFormatError,
    getMetaValue,
    isIdentity,
} from '@surfnorm/core';

import { applyLtaTransform, applySurfaceTransform, isMidthicknessName, normalizeSurface, targetFileName } from './SurfaceNormalizer';
import { encodeData } from '../formats/GiftiCodec';
import { readSurfaceMesh } from '../formats/GiftiUtil';
import { fileExists, loadXmlFile } from '../util/FileUtil';
import { MemoryLogger, silentLogger } from '../util/Logger';
import { childElements } from '../util/XMLUtil';
import {
    FREESURFER_META,
    TETRA_FACES,
    TETRA_POINTS,
    asciiRows,
    giftiXml,
    makeTempDir,
    removeDir,
    surfaceXml,
    writeFixture,
} from '../testutil/fixtures';

const SHIFT_X5 = '1 0 0 5\n0 1 0 0\n0 0 1 0\n0 0 0 1\n';
const SINGULAR = '0 0 0 0\n0 0 0 0\n0 0 0 0\n0 0 0 1\n';
const IDENTITY_LTA = [
    'type      = 1 # LINEAR_RAS_TO_RAS',
    'nxforms   = 1',
    '1 4 4',
    '1 0 0 0',
    '0 1 0 0',
    '0 0 1 0',
    '0 0 0 1',
].join('\n');

// FREESURFER_META offsets are (1.5, -2.25, 10)
const TETRA_PLUS_OFFSET = [1.5, -2.25, 10, 2.5, -2.25, 10, 1.5, -1.25, 10, 1.5, -2.25, 11];

let root = '';
let inDir = '';
let outDir = '';

beforeEach(async () => {
    root = await makeTempDir();
    inDir = path.join(root, 'in');
    outDir = path.join(root, 'out');
    await makeDirs(inDir, outDir);
});

afterEach(async () => {
    await removeDir(root);
});

async function makeDirs(...dirs: string[]) {
    for (const d of dirs) await mkdir(d, { recursive: true });
}

describe('isMidthicknessName', () => {
    it('matches either marker in the base name', () => {
        expect(isMidthicknessName('/subj/surf/lh.midthickness.surf.gii')).toBe(true);
        expect(isMidthicknessName('rh.GrayMid.gii')).toBe(true);
        expect(isMidthicknessName('/midthickness/lh.white.gii')).toBe(false);
    });
});

describe('targetFileName', () => {
    it('swaps the last extension for the target suffix', () => {
        expect(targetFileName('/data/lh.white.surf.gii')).toBe('lh.white.surf_target.surf.gii');
        expect(targetFileName('lh.pial')).toBe('lh_target.surf.gii');
    });
});

describe('normalizeSurface', () => {
    it('adds the volume-geometry offset and zeroes it', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const outFile = await normalizeSurface(inFile, undefined, { cwd: outDir, logger: silentLogger });

        expect(outFile).toBe(path.join(outDir, 'lh.white.gii'));
        const mesh = await readSurfaceMesh(outFile);
        expect(Array.from(mesh.pointSet.coords)).toEqual(TETRA_PLUS_OFFSET);
        expect(Array.from(mesh.faceSet.indices)).toEqual(TETRA_FACES);
        expect(mesh.pointSet.meta).toEqual([
            { name: 'AnatomicalStructurePrimary', value: 'CortexLeft' },
            { name: 'VolGeomWidth', value: '256' },
            { name: 'VolGeomC_R', value: '0.000000' },
            { name: 'VolGeomC_A', value: '0.000000' },
            { name: 'VolGeomC_S', value: '0.000000' },
        ]);
        // Untouched parts
        expect(mesh.pointSet.coordSys?.dataSpace).toBe(NiftiXform.TALAIRACH);
        expect(mesh.faceSet.meta).toEqual([{ name: 'TopologicalType', value: 'Closed' }]);
    });

    it('applies the transform after the offset', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const xfm = await writeFixture(inDir, 'shift.mat', SHIFT_X5);
        const outFile = await normalizeSurface(inFile, xfm, { cwd: outDir, logger: silentLogger });

        const mesh = await readSurfaceMesh(outFile);
        expect(Array.from(mesh.pointSet.coords.slice(0, 3))).toEqual([6.5, -2.25, 10]);
    });

    it('changes nothing on a second run', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const once = await normalizeSurface(inFile, undefined, { cwd: outDir, logger: silentLogger });
        const againDir = path.join(root, 'again');
        await makeDirs(againDir);
        const twice = await normalizeSurface(once, undefined, { cwd: againDir, logger: silentLogger });

        const a = await readSurfaceMesh(once);
        const b = await readSurfaceMesh(twice);
        expect(Array.from(b.pointSet.coords)).toEqual(Array.from(a.pointSet.coords));
        expect(b.pointSet.meta).toEqual(a.pointSet.meta);
    });

    it('leaves a mesh without offsets where it was', async () => {
        const inFile = await writeFixture(
            inDir,
            'lh.sphere.gii',
            surfaceXml({ pointMeta: [['AnatomicalStructurePrimary', 'CortexLeft']] }),
        );
        const outFile = await normalizeSurface(inFile, undefined, { cwd: outDir, logger: silentLogger });
        const mesh = await readSurfaceMesh(outFile);
        expect(Array.from(mesh.pointSet.coords)).toEqual(TETRA_POINTS);
        // Absent keys are not created
        expect(mesh.pointSet.meta).toEqual([{ name: 'AnatomicalStructurePrimary', value: 'CortexLeft' }]);
    });

    it('tags midthickness surfaces once', async () => {
        const inFile = await writeFixture(inDir, 'lh.midthickness.surf.gii', surfaceXml());
        const outFile = await normalizeSurface(inFile, undefined, { cwd: outDir, logger: silentLogger });
        const expected = [
            'AnatomicalStructurePrimary',
            'AnatomicalStructureSecondary',
            'GeometricType',
            'VolGeomWidth',
            'VolGeomC_R',
            'VolGeomC_A',
            'VolGeomC_S',
        ];
        const mesh = await readSurfaceMesh(outFile);
        expect(mesh.pointSet.meta.map((e) => e.name)).toEqual(expected);
        expect(getMetaValue(mesh.pointSet.meta, 'AnatomicalStructureSecondary')).toBe('MidThickness');
        expect(getMetaValue(mesh.pointSet.meta, 'GeometricType')).toBe('Anatomical');

        const againDir = path.join(root, 'again');
        await makeDirs(againDir);
        const twice = await readSurfaceMesh(
            await normalizeSurface(outFile, undefined, { cwd: againDir, logger: silentLogger }),
        );
        expect(twice.pointSet.meta.map((e) => e.name)).toEqual(expected);
    });

    it('keeps the input encoding', async () => {
        const layout = {
            dataType: 'NIFTI_TYPE_FLOAT32',
            encoding: 'GZipBase64Binary',
            endian: 'LittleEndian',
            order: 'RowMajorOrder',
        } as const;
        const xml = giftiXml({
            arrays: [
                {
                    intent: 'NIFTI_INTENT_POINTSET',
                    dataType: layout.dataType,
                    encoding: layout.encoding,
                    dim0: 4,
                    data: encodeData(TETRA_POINTS, layout, 3),
                    meta: FREESURFER_META,
                },
                { intent: 'NIFTI_INTENT_TRIANGLE', dataType: 'NIFTI_TYPE_INT32', dim0: 4, data: asciiRows(TETRA_FACES) },
            ],
        });
        const inFile = await writeFixture(inDir, 'lh.white.gii', xml);
        const outFile = await normalizeSurface(inFile, undefined, { cwd: outDir, logger: silentLogger });

        const [points, faces] = childElements((await loadXmlFile(outFile)).documentElement, 'DataArray');
        expect(points.getAttribute('Encoding')).toBe('GZipBase64Binary');
        expect(faces.getAttribute('Encoding')).toBe('ASCII');
        const mesh = await readSurfaceMesh(outFile);
        expect(Array.from(mesh.pointSet.coords)).toEqual(TETRA_PLUS_OFFSET);
    });

    it('logs one line per call', async () => {
        const logger = new MemoryLogger();
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const outFile = await normalizeSurface(inFile, undefined, { cwd: outDir, logger });
        expect(logger.lines).toEqual([
            { level: 'info', line: `normalize ${inFile} -> ${outFile} (4 vertices, transform=identity)` },
        ]);
    });

    it('fails without a triangle array and writes nothing', async () => {
        const xml = giftiXml({
            arrays: [
                { intent: 'NIFTI_INTENT_POINTSET', dataType: 'NIFTI_TYPE_FLOAT32', dim0: 4, data: asciiRows(TETRA_POINTS) },
            ],
        });
        const inFile = await writeFixture(inDir, 'lh.white.gii', xml);
        await expect(normalizeSurface(inFile, undefined, { cwd: outDir, logger: silentLogger })).rejects.toBeInstanceOf(
            MeshStructureError,
        );
        expect(await fileExists(path.join(outDir, 'lh.white.gii'))).toBe(false);
    });
});

describe('applySurfaceTransform', () => {
    it('applies the matrix as given and resets the coordinate system', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.surf.gii', surfaceXml({ withFaceCoordSys: true }));
        const xfm = await writeFixture(inDir, 'shift.mat', SHIFT_X5);
        const outFile = await applySurfaceTransform(inFile, xfm, { invert: false, outputDir: outDir, logger: silentLogger });

        expect(outFile).toBe(path.join(outDir, 'lh.white.surf_target.surf.gii'));
        const mesh = await readSurfaceMesh(outFile);
        expect(Array.from(mesh.pointSet.coords)).toEqual([5, 0, 0, 6, 0, 0, 5, 1, 0, 5, 0, 1]);

        expect(mesh.pointSet.coordSys?.dataSpace).toBe(NiftiXform.ALIGNED_ANAT);
        expect(mesh.pointSet.coordSys?.transformedSpace).toBe(NiftiXform.ALIGNED_ANAT);
        expect(mesh.pointSet.coordSys && isIdentity(mesh.pointSet.coordSys.xform)).toBe(true);
        // Offsets stay as they were without center
        expect(getMetaValue(mesh.pointSet.meta, 'VolGeomC_R')).toBe('1.500000');

        expect(mesh.pointLayout.dataType).toBe('NIFTI_TYPE_FLOAT32');
        expect(mesh.faceLayout.dataType).toBe('NIFTI_TYPE_FLOAT32');
        expect(mesh.faceSet.indices).toBeInstanceOf(Float32Array);
        expect(Array.from(mesh.faceSet.indices)).toEqual(TETRA_FACES);
        expect(mesh.faceSet.meta).toEqual([]);
        expect(mesh.faceSet.coordSys).toBeUndefined();
    });

    it('inverts by default', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const xfm = await writeFixture(inDir, 'shift.mat', SHIFT_X5);
        const outFile = await applySurfaceTransform(inFile, xfm, { outputDir: outDir, logger: silentLogger });

        const mesh = await readSurfaceMesh(outFile);
        expect(Array.from(mesh.pointSet.coords)).toEqual([-5, 0, 0, -4, 0, 0, -5, 1, 0, -5, 0, 1]);
    });

    it('leaves coordinates alone under an identity LTA', async () => {
        const points = [1, 2, 3, 0, 0, 0, 4, 5, 6, 7, 8, 9];
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml({ points }));
        const lta = await writeFixture(inDir, 'id.lta', IDENTITY_LTA);
        const outFile = await applySurfaceTransform(inFile, lta, { outputDir: outDir, logger: silentLogger });

        const mesh = await readSurfaceMesh(outFile);
        expect(Array.from(mesh.pointSet.coords)).toEqual(points);
    });

    it('adds the offset after the transform when centring', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const xfm = await writeFixture(inDir, 'shift.mat', SHIFT_X5);
        const outFile = await applySurfaceTransform(inFile, xfm, {
            invert: false,
            center: true,
            outputDir: outDir,
            logger: silentLogger,
        });

        const mesh = await readSurfaceMesh(outFile);
        expect(Array.from(mesh.pointSet.coords.slice(0, 3))).toEqual([6.5, -2.25, 10]);
        expect(Array.from(mesh.pointSet.coords.slice(9, 12))).toEqual([6.5, -2.25, 11]);
        for (const k of ['VolGeomC_R', 'VolGeomC_A', 'VolGeomC_S']) {
            expect(getMetaValue(mesh.pointSet.meta, k)).toBe('0.000000');
        }
    });

    it('needs every offset key to centre', async () => {
        const inFile = await writeFixture(
            inDir,
            'lh.white.gii',
            surfaceXml({ pointMeta: [['AnatomicalStructurePrimary', 'CortexLeft']] }),
        );
        const xfm = await writeFixture(inDir, 'shift.mat', SHIFT_X5);
        await expect(
            applySurfaceTransform(inFile, xfm, { center: true, outputDir: outDir, logger: silentLogger }),
        ).rejects.toThrow(/no VolGeomC_R entry/);
        expect(await fileExists(path.join(outDir, 'lh.white_target.surf.gii'))).toBe(false);
    });

    it('fails on an LTA without a matrix marker and writes nothing', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const lta = await writeFixture(inDir, 'bad.lta', 'type = 1\n1 0 0 0\n0 1 0 0\n0 0 1 0\n0 0 0 1\n');
        await expect(
            applySurfaceTransform(inFile, lta, { outputDir: outDir, logger: silentLogger }),
        ).rejects.toBeInstanceOf(FormatError);
        expect(await fileExists(path.join(outDir, 'lh.white_target.surf.gii'))).toBe(false);
    });

    it('fails on a singular matrix when inverting', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const xfm = await writeFixture(inDir, 'flat.mat', SINGULAR);
        await expect(
            applySurfaceTransform(inFile, xfm, { outputDir: outDir, logger: silentLogger }),
        ).rejects.toBeInstanceOf(SingularMatrixError);
        expect(await fileExists(path.join(outDir, 'lh.white_target.surf.gii'))).toBe(false);
    });

    it('rejects unknown transform types and logs the failure', async () => {
        const logger = new MemoryLogger();
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const xfm = path.join(inDir, 'talairach.xfm');
        await expect(applySurfaceTransform(inFile, xfm, { outputDir: outDir, logger })).rejects.toBeInstanceOf(
            UnsupportedFormatError,
        );
        expect(logger.lines).toEqual([
            {
                level: 'error',
                line: `transform ${inFile} failed: Unknown transform type for ${xfm}; pass FSL (.mat) or LTA (.lta)`,
            },
        ]);
    });
});

describe('applyLtaTransform', () => {
    it('centres by default', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const lta = await writeFixture(inDir, 'id.lta', IDENTITY_LTA);
        const outFile = await applyLtaTransform(inFile, lta, { outputDir: outDir, logger: silentLogger });

        const mesh = await readSurfaceMesh(outFile);
        expect(Array.from(mesh.pointSet.coords)).toEqual(TETRA_PLUS_OFFSET);
    });

    it('skips the offset for relative coordinates', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const lta = await writeFixture(inDir, 'id.lta', IDENTITY_LTA);
        const outFile = await applyLtaTransform(inFile, lta, {
            absoluteCoords: false,
            outputDir: outDir,
            logger: silentLogger,
        });

        const mesh = await readSurfaceMesh(outFile);
        expect(Array.from(mesh.pointSet.coords)).toEqual(TETRA_POINTS);
    });

    it('accepts only LTA files', async () => {
        const inFile = await writeFixture(inDir, 'lh.white.gii', surfaceXml());
        const xfm = await writeFixture(inDir, 'shift.mat', SHIFT_X5);
        await expect(applyLtaTransform(inFile, xfm, { outputDir: outDir, logger: silentLogger })).rejects.toBeInstanceOf(
            UnsupportedFormatError,
        );
    });
});
