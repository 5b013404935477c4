export class SurfaceError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SurfaceError';
    }
}

/** Transform file content could not be parsed */
export class FormatError extends SurfaceError {
    readonly path?: string;

    constructor(message: string, path?: string) {
        super(path ? `${path}: ${message}` : message);
        this.name = 'FormatError';
        this.path = path;
    }
}

/** Transform file extension is neither FSL (.mat) nor LTA (.lta) */
export class UnsupportedFormatError extends SurfaceError {
    readonly path: string;

    constructor(path: string) {
        super(`Unknown transform type for ${path}; pass FSL (.mat) or LTA (.lta)`);
        this.name = 'UnsupportedFormatError';
        this.path = path;
    }
}

export class SingularMatrixError extends SurfaceError {
    constructor(message = 'Matrix is singular and cannot be inverted') {
        super(message);
        this.name = 'SingularMatrixError';
    }
}

/** Mesh container is missing a required data array or holds one we cannot decode */
export class MeshStructureError extends SurfaceError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MeshStructureError';
    }
}
