import type { Matrix4 } from 'three';

/**
 * 4x4 homogeneous affine map.  three's Matrix4 keeps its elements column-major
 * in float64; use fromRows/toRows when the row-major view is wanted.
 */
export type AffineTransform = Matrix4;

export type Vec3 = [number, number, number];

export type CoordArray = Float32Array | Float64Array;

export type NumericArray =
    | Int8Array
    | Uint8Array
    | Int16Array
    | Uint16Array
    | Int32Array
    | Uint32Array
    | Float32Array
    | Float64Array;

export interface MetaEntry {
    name: string;
    value: string;
}

/** Metadata is positional; entries are inserted at fixed indices, so it is never a map */
export type MetaList = MetaEntry[];

/** NIfTI xform codes used for GIFTI DataSpace / TransformedSpace */
export const NiftiXform = {
    UNKNOWN: 0,
    SCANNER_ANAT: 1,
    ALIGNED_ANAT: 2,
    TALAIRACH: 3,
    MNI_152: 4,
    TEMPLATE_OTHER: 5,
} as const;

export type NiftiXformCode = (typeof NiftiXform)[keyof typeof NiftiXform];

export interface CoordSystem {
    dataSpace: number;
    transformedSpace: number;
    // Provenance only; never the transform this library applies
    xform: AffineTransform;
}

export interface PointSet {
    coords: CoordArray; // 3*N, row-major
    meta: MetaList;
    coordSys?: CoordSystem;
}

export interface FaceSet {
    indices: NumericArray; // 3*N, row-major
    meta: MetaList;
    coordSys?: CoordSystem;
}

export interface SurfaceMesh {
    pointSet: PointSet;
    faceSet: FaceSet;
}

export function vertexCount(pointSet: PointSet): number {
    return pointSet.coords.length / 3;
}

export function faceCount(faceSet: FaceSet): number {
    return faceSet.indices.length / 3;
}
