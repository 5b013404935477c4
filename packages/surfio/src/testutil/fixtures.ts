import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

//
// Small hand-built GIFTI documents for the tests.
//

export interface FixtureArray {
    intent: string;
    dataType: string;
    encoding?: string; // default ASCII
    endian?: string;
    order?: string;
    dim0: number;
    dim1?: number; // default 3
    data: string; // <Data> payload as written
    meta?: [string, string][];
    coordSys?: { dataSpace: string; transformedSpace: string; matrix: number[] };
}

export interface FixtureOptions {
    fileMeta?: [string, string][];
    arrays: FixtureArray[];
}

function metaXml(meta: [string, string][], indent: string): string {
    if (meta.length === 0) return `${indent}<MetaData/>\n`;
    const mds = meta
        .map(([n, v]) => `${indent}   <MD><Name><![CDATA[${n}]]></Name><Value><![CDATA[${v}]]></Value></MD>\n`)
        .join('');
    return `${indent}<MetaData>\n${mds}${indent}</MetaData>\n`;
}

function arrayXml(a: FixtureArray): string {
    const attrs = [
        `Intent="${a.intent}"`,
        `DataType="${a.dataType}"`,
        `ArrayIndexingOrder="${a.order ?? 'RowMajorOrder'}"`,
        `Dimensionality="2"`,
        `Dim0="${a.dim0}"`,
        `Dim1="${a.dim1 ?? 3}"`,
        `Encoding="${a.encoding ?? 'ASCII'}"`,
        `Endian="${a.endian ?? 'LittleEndian'}"`,
        `ExternalFileName=""`,
        `ExternalFileOffset=""`,
    ].join(' ');
    let cs = '';
    if (a.coordSys) {
        cs =
            `      <CoordinateSystemTransformMatrix>\n` +
            `         <DataSpace><![CDATA[${a.coordSys.dataSpace}]]></DataSpace>\n` +
            `         <TransformedSpace><![CDATA[${a.coordSys.transformedSpace}]]></TransformedSpace>\n` +
            `         <MatrixData>${a.coordSys.matrix.join(' ')}</MatrixData>\n` +
            `      </CoordinateSystemTransformMatrix>\n`;
    }
    return (
        `   <DataArray ${attrs}>\n` +
        metaXml(a.meta ?? [], '      ') +
        cs +
        `      <Data>${a.data}</Data>\n` +
        `   </DataArray>\n`
    );
}

export function giftiXml(opts: FixtureOptions): string {
    return (
        `<?xml version="1.0" encoding="UTF-8"?>\n` +
        `<!DOCTYPE GIFTI SYSTEM "http://www.nitrc.org/frs/download.php/115/gifti.dtd">\n` +
        `<GIFTI Version="1.0" NumberOfDataArrays="${opts.arrays.length}">\n` +
        metaXml(opts.fileMeta ?? [], '   ') +
        `   <LabelTable/>\n` +
        opts.arrays.map(arrayXml).join('') +
        `</GIFTI>\n`
    );
}

export const IDENTITY_16 = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];

export const TETRA_POINTS = [0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1];
export const TETRA_FACES = [0, 1, 2, 0, 1, 3, 0, 2, 3, 1, 2, 3];

export const FREESURFER_META: [string, string][] = [
    ['AnatomicalStructurePrimary', 'CortexLeft'],
    ['VolGeomWidth', '256'],
    ['VolGeomC_R', '1.500000'],
    ['VolGeomC_A', '-2.250000'],
    ['VolGeomC_S', '10.000000'],
];

export function asciiRows(values: number[], cols = 3): string {
    const lines: string[] = [];
    for (let i = 0; i < values.length; i += cols) {
        lines.push(values.slice(i, i + cols).join(' '));
    }
    return `\n${lines.join('\n')}\n`;
}

/** Point-set + triangle mesh in ASCII, FreeSurfer-style metadata unless overridden */
export function surfaceXml(
    opts: {
        points?: number[];
        faces?: number[];
        pointMeta?: [string, string][];
        pointDataType?: string;
        faceMeta?: [string, string][];
        withFaceCoordSys?: boolean;
        fileMeta?: [string, string][];
    } = {},
): string {
    const points = opts.points ?? TETRA_POINTS;
    const faces = opts.faces ?? TETRA_FACES;
    return giftiXml({
        fileMeta: opts.fileMeta ?? [['UserName', 'tester']],
        arrays: [
            {
                intent: 'NIFTI_INTENT_POINTSET',
                dataType: opts.pointDataType ?? 'NIFTI_TYPE_FLOAT32',
                dim0: points.length / 3,
                data: asciiRows(points),
                meta: opts.pointMeta ?? FREESURFER_META,
                coordSys: { dataSpace: 'NIFTI_XFORM_TALAIRACH', transformedSpace: 'NIFTI_XFORM_TALAIRACH', matrix: IDENTITY_16 },
            },
            {
                intent: 'NIFTI_INTENT_TRIANGLE',
                dataType: 'NIFTI_TYPE_INT32',
                dim0: faces.length / 3,
                data: asciiRows(faces),
                meta: opts.faceMeta ?? [['TopologicalType', 'Closed']],
                coordSys: opts.withFaceCoordSys
                    ? { dataSpace: 'NIFTI_XFORM_UNKNOWN', transformedSpace: 'NIFTI_XFORM_UNKNOWN', matrix: IDENTITY_16 }
                    : undefined,
            },
        ],
    });
}

export async function makeTempDir(prefix = 'surfnorm-'): Promise<string> {
    return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFixture(dir: string, name: string, content: string): Promise<string> {
    const p = path.join(dir, name);
    await fsp.writeFile(p, content, 'utf8');
    return p;
}

export async function removeDir(dir: string) {
    await fsp.rm(dir, { recursive: true, force: true });
}
