import { FormatError, UnsupportedFormatError, fromRows, identity, type AffineTransform } from '@surfnorm/core';
import { readTextFile } from '../util/FileUtil';

//
// FSL (.mat) and FreeSurfer LTA (.lta) affine transform files.
//

export type TransformFileRef = { kind: 'fsl'; path: string } | { kind: 'lta'; path: string };

/** Marks the start of a single 4x4 matrix block in an LTA file */
export const LTA_MATRIX_MARKER = '1 4 4';

export function classifyTransformFile(path: string): TransformFileRef {
    if (path.endsWith('.mat')) return { kind: 'fsl', path };
    if (path.endsWith('.lta')) return { kind: 'lta', path };
    throw new UnsupportedFormatError(path);
}

function parseRow(line: string, lineNo: number, path?: string): number[] {
    const toks = line.trim().split(/\s+/);
    const vals = toks.map(Number);
    if (toks.length !== 4 || vals.some((v) => Number.isNaN(v))) {
        throw new FormatError(`line ${lineNo}: expected 4 numbers, got '${line.trim()}'`, path);
    }
    return vals;
}

/** Plain row-major 4x4 matrix; blank and '#' lines are skipped */
export function parseFslMatrix(text: string, path?: string): AffineTransform {
    const rows: number[][] = [];
    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length && rows.length < 4; ++i) {
        const l = lines[i].trim();
        if (!l || l.startsWith('#')) continue;
        rows.push(parseRow(l, i + 1, path));
    }
    if (rows.length < 4) {
        throw new FormatError(`expected 4 matrix rows, found ${rows.length}`, path);
    }
    return fromRows(rows);
}

/** The four lines after the first line starting with '1 4 4' */
export function parseLtaMatrix(text: string, path?: string): AffineTransform {
    const lines = text.split(/\r?\n/);
    const markerAt = lines.findIndex((l) => l.startsWith(LTA_MATRIX_MARKER));
    if (markerAt < 0) {
        throw new FormatError(`no '${LTA_MATRIX_MARKER}' matrix marker`, path);
    }
    const body = lines.slice(markerAt + 1, markerAt + 5);
    if (body.length < 4 || body.some((l) => !l.trim())) {
        throw new FormatError(`expected 4 matrix rows after '${LTA_MATRIX_MARKER}'`, path);
    }
    return fromRows(body.map((l, i) => parseRow(l, markerAt + 2 + i, path)));
}

/** Identity when no file is given */
export async function loadTransform(path?: string): Promise<AffineTransform> {
    if (path === undefined) return identity();

    const ref = classifyTransformFile(path);
    const text = await readTextFile(ref.path);
    switch (ref.kind) {
        case 'fsl':
            return parseFslMatrix(text, ref.path);
        case 'lta':
            return parseLtaMatrix(text, ref.path);
    }
}
