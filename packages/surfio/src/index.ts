export {
    applyLtaTransform,
    applySurfaceTransform,
    ensureMidthicknessMeta,
    isMidthicknessName,
    normalizeMesh,
    normalizeSurface,
    readOffsetOrZero,
    readRequiredOffset,
    targetFileName,
    transformMesh,
    GEOMETRIC_TYPE,
    OFFSET_KEYS,
    SECONDARY_STRUCTURE,
    TARGET_SUFFIX,
    ZERO_OFFSET,
} from './surface/SurfaceNormalizer';

export type {
    ApplyLtaTransformOptions,
    ApplySurfaceTransformOptions,
    NormalizeSurfaceOptions,
} from './surface/SurfaceNormalizer';

export {
    classifyTransformFile,
    loadTransform,
    parseFslMatrix,
    parseLtaMatrix,
    LTA_MATRIX_MARKER,
} from './formats/TransformFile';

export type { TransformFileRef } from './formats/TransformFile';

export {
    GiftiSurface,
    INTENT_POINTSET,
    INTENT_TRIANGLE,
    parseSurfaceDocument,
    readSurfaceMesh,
    serializeSurfaceMesh,
    writeSurfaceMesh,
    xformCode,
    xformName,
} from './formats/GiftiUtil';

export { castToDataType, decodeData, encodeData, formatFloat32 } from './formats/GiftiCodec';

export type { GiftiArrayLayout, GiftiDataType, GiftiEncoding, GiftiEndian, GiftiIndexingOrder } from './formats/GiftiCodec';

export { BatchFileLogger, MemoryLogger, consoleLogger, silentLogger } from './util/Logger';

export type { BatchFileLoggerOptions, LogLevel, SurfaceLogger } from './util/Logger';

export {
    SettingsError,
    createLoggerFromSettings,
    defaultNormalizerSettings,
    loadNormalizerSettings,
    parseSettings,
    resolveTransformOptions,
} from './util/Settings';

export type { NormalizerSettings } from './util/Settings';

export { loadXmlFile, parseXml, serializeXml, splitExtension } from './util/FileUtil';
