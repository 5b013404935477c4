export type {
    AffineTransform,
    CoordArray,
    CoordSystem,
    FaceSet,
    MetaEntry,
    MetaList,
    NiftiXformCode,
    NumericArray,
    PointSet,
    SurfaceMesh,
    Vec3,
} from './types/SurfaceTypes';

export { NiftiXform, faceCount, vertexCount } from './types/SurfaceTypes';

export {
    FormatError,
    MeshStructureError,
    SingularMatrixError,
    SurfaceError,
    UnsupportedFormatError,
} from './util/Errors';

export { addOffset, apply, compose, fromRows, identity, invert, isIdentity, toRows, translation } from './util/Affine';

export {
    cloneMetaList,
    getMetaValue,
    hasMetaEntry,
    insertMetaEntry,
    replaceMetaValue,
    setMetaValue,
} from './util/MetaList';
