import { decompressSync, zlibSync } from 'fflate';
import { MeshStructureError, type NumericArray } from '@surfnorm/core';

//
// Encoding and decoding of GIFTI <Data> payloads.
// Decoded values are always held row-major; the array's declared order is
// only used on the way in and out.
//

export const GIFTI_DATA_TYPES = [
    'NIFTI_TYPE_UINT8',
    'NIFTI_TYPE_INT8',
    'NIFTI_TYPE_INT16',
    'NIFTI_TYPE_UINT16',
    'NIFTI_TYPE_INT32',
    'NIFTI_TYPE_UINT32',
    'NIFTI_TYPE_FLOAT32',
    'NIFTI_TYPE_FLOAT64',
] as const;
export type GiftiDataType = (typeof GIFTI_DATA_TYPES)[number];

export const GIFTI_ENCODINGS = ['ASCII', 'Base64Binary', 'GZipBase64Binary'] as const;
export type GiftiEncoding = (typeof GIFTI_ENCODINGS)[number];

export type GiftiEndian = 'LittleEndian' | 'BigEndian';
export type GiftiIndexingOrder = 'RowMajorOrder' | 'ColumnMajorOrder';

export interface GiftiArrayLayout {
    dataType: GiftiDataType;
    encoding: GiftiEncoding;
    endian: GiftiEndian;
    order: GiftiIndexingOrder;
}

interface DataTypeInfo {
    bytes: number;
    create: (n: number) => NumericArray;
    from: (values: ArrayLike<number>) => NumericArray;
    get: (dv: DataView, offset: number, le: boolean) => number;
    set: (dv: DataView, offset: number, value: number, le: boolean) => void;
}

const DATA_TYPES: Record<GiftiDataType, DataTypeInfo> = {
    NIFTI_TYPE_UINT8: {
        bytes: 1,
        create: (n) => new Uint8Array(n),
        from: (v) => Uint8Array.from(v),
        get: (dv, o) => dv.getUint8(o),
        set: (dv, o, v) => dv.setUint8(o, v),
    },
    NIFTI_TYPE_INT8: {
        bytes: 1,
        create: (n) => new Int8Array(n),
        from: (v) => Int8Array.from(v),
        get: (dv, o) => dv.getInt8(o),
        set: (dv, o, v) => dv.setInt8(o, v),
    },
    NIFTI_TYPE_INT16: {
        bytes: 2,
        create: (n) => new Int16Array(n),
        from: (v) => Int16Array.from(v),
        get: (dv, o, le) => dv.getInt16(o, le),
        set: (dv, o, v, le) => dv.setInt16(o, v, le),
    },
    NIFTI_TYPE_UINT16: {
        bytes: 2,
        create: (n) => new Uint16Array(n),
        from: (v) => Uint16Array.from(v),
        get: (dv, o, le) => dv.getUint16(o, le),
        set: (dv, o, v, le) => dv.setUint16(o, v, le),
    },
    NIFTI_TYPE_INT32: {
        bytes: 4,
        create: (n) => new Int32Array(n),
        from: (v) => Int32Array.from(v),
        get: (dv, o, le) => dv.getInt32(o, le),
        set: (dv, o, v, le) => dv.setInt32(o, v, le),
    },
    NIFTI_TYPE_UINT32: {
        bytes: 4,
        create: (n) => new Uint32Array(n),
        from: (v) => Uint32Array.from(v),
        get: (dv, o, le) => dv.getUint32(o, le),
        set: (dv, o, v, le) => dv.setUint32(o, v, le),
    },
    NIFTI_TYPE_FLOAT32: {
        bytes: 4,
        create: (n) => new Float32Array(n),
        from: (v) => Float32Array.from(v),
        get: (dv, o, le) => dv.getFloat32(o, le),
        set: (dv, o, v, le) => dv.setFloat32(o, v, le),
    },
    NIFTI_TYPE_FLOAT64: {
        bytes: 8,
        create: (n) => new Float64Array(n),
        from: (v) => Float64Array.from(v),
        get: (dv, o, le) => dv.getFloat64(o, le),
        set: (dv, o, v, le) => dv.setFloat64(o, v, le),
    },
};

const dataTypeNames: readonly string[] = GIFTI_DATA_TYPES;
const encodingNames: readonly string[] = GIFTI_ENCODINGS;

export function isGiftiDataType(s: string): s is GiftiDataType {
    return dataTypeNames.includes(s);
}

export function isGiftiEncoding(s: string): s is GiftiEncoding {
    return encodingNames.includes(s);
}

/** New array of the data type's element kind holding `values` (floats narrow, ints truncate) */
export function castToDataType(values: ArrayLike<number>, dt: GiftiDataType): NumericArray {
    return DATA_TYPES[dt].from(values);
}

/** Index of (r, c) in a rows x cols buffer laid out in the given order */
function orderedIndex(r: number, c: number, rows: number, cols: number, order: GiftiIndexingOrder) {
    return order === 'RowMajorOrder' ? r * cols + c : c * rows + r;
}

/** Shortest decimal that reads back to the same float32 */
export function formatFloat32(v: number): string {
    if (!Number.isFinite(v)) return String(v);
    const f = Math.fround(v);
    for (let p = 1; p < 10; ++p) {
        const s = f.toPrecision(p);
        if (Math.fround(Number(s)) === f) return String(Number(s));
    }
    return String(f);
}

function formatValue(v: number, dt: GiftiDataType): string {
    if (dt === 'NIFTI_TYPE_FLOAT32') return formatFloat32(v);
    return String(v);
}

function decodeBase64(text: string): Uint8Array {
    const buf = Buffer.from(text.replace(/\s+/g, ''), 'base64');
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

function encodeBase64(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Decodes a <Data> payload of rows x cols values into a row-major array of the
 * layout's data type.
 */
export function decodeData(text: string, layout: GiftiArrayLayout, rows: number, cols: number): NumericArray {
    const count = rows * cols;
    const info = DATA_TYPES[layout.dataType];
    const out = info.create(count);

    if (layout.encoding === 'ASCII') {
        const tokens = text.split(/\s+/).filter((t) => t.length > 0);
        if (tokens.length !== count) {
            throw new MeshStructureError(`ASCII data holds ${tokens.length} values, expected ${count}`);
        }
        for (let r = 0; r < rows; ++r) {
            for (let c = 0; c < cols; ++c) {
                const tok = tokens[orderedIndex(r, c, rows, cols, layout.order)];
                const v = Number(tok);
                if (Number.isNaN(v) && tok.toLowerCase() !== 'nan') {
                    throw new MeshStructureError(`Non-numeric value '${tok}' in ASCII data`);
                }
                out[r * cols + c] = v;
            }
        }
        return out;
    }

    let bytes: Uint8Array = decodeBase64(text);
    if (layout.encoding === 'GZipBase64Binary') {
        try {
            bytes = decompressSync(bytes);
        } catch (e) {
            throw new MeshStructureError('Compressed data could not be inflated', { cause: e });
        }
    }
    if (bytes.byteLength !== count * info.bytes) {
        throw new MeshStructureError(`Binary data holds ${bytes.byteLength} bytes, expected ${count * info.bytes}`);
    }

    const dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const le = layout.endian === 'LittleEndian';
    for (let r = 0; r < rows; ++r) {
        for (let c = 0; c < cols; ++c) {
            out[r * cols + c] = info.get(dv, orderedIndex(r, c, rows, cols, layout.order) * info.bytes, le);
        }
    }
    return out;
}

/** Inverse of decodeData; `values` is row-major */
export function encodeData(values: ArrayLike<number>, layout: GiftiArrayLayout, cols: number): string {
    const rows = values.length / cols;
    const info = DATA_TYPES[layout.dataType];

    if (layout.encoding === 'ASCII') {
        const lineLen = layout.order === 'RowMajorOrder' ? cols : rows;
        const nLines = layout.order === 'RowMajorOrder' ? rows : cols;
        const lines: string[] = [];
        for (let l = 0; l < nLines; ++l) {
            const parts: string[] = [];
            for (let k = 0; k < lineLen; ++k) {
                const v = layout.order === 'RowMajorOrder' ? values[l * cols + k] : values[k * cols + l];
                parts.push(formatValue(v, layout.dataType));
            }
            lines.push(parts.join(' '));
        }
        return `\n${lines.join('\n')}\n`;
    }

    let bytes: Uint8Array = new Uint8Array(values.length * info.bytes);
    const dv = new DataView(bytes.buffer);
    const le = layout.endian === 'LittleEndian';
    for (let r = 0; r < rows; ++r) {
        for (let c = 0; c < cols; ++c) {
            info.set(dv, orderedIndex(r, c, rows, cols, layout.order) * info.bytes, values[r * cols + c], le);
        }
    }
    if (layout.encoding === 'GZipBase64Binary') {
        bytes = zlibSync(bytes);
    }
    return encodeBase64(bytes);
}
