import {
    MeshStructureError,
    NiftiXform,
    fromRows,
    toRows,
    type CoordArray,
    type CoordSystem,
    type FaceSet,
    type MetaList,
    type NumericArray,
    type PointSet,
    type SurfaceMesh,
} from '@surfnorm/core';
import { XmlParseError, loadXmlFile, serializeXml, writeTextFile } from '../util/FileUtil';
import {
    appendCDataElement,
    appendTextElement,
    childElements,
    findChildElement,
    getAttrDef,
    getElementText,
    getIntAttrDef,
    removeAllChildren,
    setElementText,
} from '../util/XMLUtil';
import {
    decodeData,
    encodeData,
    isGiftiDataType,
    isGiftiEncoding,
    type GiftiArrayLayout,
    type GiftiEndian,
    type GiftiIndexingOrder,
} from './GiftiCodec';

export const INTENT_POINTSET = 'NIFTI_INTENT_POINTSET';
export const INTENT_TRIANGLE = 'NIFTI_INTENT_TRIANGLE';

const XFORM_NAMES: Record<number, string> = {
    [NiftiXform.UNKNOWN]: 'NIFTI_XFORM_UNKNOWN',
    [NiftiXform.SCANNER_ANAT]: 'NIFTI_XFORM_SCANNER_ANAT',
    [NiftiXform.ALIGNED_ANAT]: 'NIFTI_XFORM_ALIGNED_ANAT',
    [NiftiXform.TALAIRACH]: 'NIFTI_XFORM_TALAIRACH',
    [NiftiXform.MNI_152]: 'NIFTI_XFORM_MNI_152',
    [NiftiXform.TEMPLATE_OTHER]: 'NIFTI_XFORM_TEMPLATE_OTHER',
};

export function xformName(code: number): string {
    const nm = XFORM_NAMES[code];
    if (nm === undefined) throw new MeshStructureError(`Unknown NIfTI xform code ${code}`);
    return nm;
}

export function xformCode(name: string): number {
    const trimmed = name.trim();
    for (const [code, nm] of Object.entries(XFORM_NAMES)) {
        if (nm === trimmed) return Number(code);
    }
    // Some writers store the bare integer
    if (/^\d+$/.test(trimmed) && XFORM_NAMES[Number(trimmed)] !== undefined) return Number(trimmed);
    throw new MeshStructureError(`Unknown NIfTI xform space '${name}'`);
}

/**
 * A surface read from a GIFTI file.  The parsed document is kept so that
 * serializing rewrites only the point-set and triangle arrays; everything
 * else goes back out as it came in.
 */
export class GiftiSurface implements SurfaceMesh {
    readonly doc: Document;
    readonly sourcePath: string;
    pointSet: PointSet;
    faceSet: FaceSet;
    pointLayout: GiftiArrayLayout;
    faceLayout: GiftiArrayLayout;
    readonly pointElement: Element;
    readonly faceElement: Element;

    constructor(args: {
        doc: Document;
        sourcePath: string;
        pointSet: PointSet;
        faceSet: FaceSet;
        pointLayout: GiftiArrayLayout;
        faceLayout: GiftiArrayLayout;
        pointElement: Element;
        faceElement: Element;
    }) {
        this.doc = args.doc;
        this.sourcePath = args.sourcePath;
        this.pointSet = args.pointSet;
        this.faceSet = args.faceSet;
        this.pointLayout = args.pointLayout;
        this.faceLayout = args.faceLayout;
        this.pointElement = args.pointElement;
        this.faceElement = args.faceElement;
    }
}

interface DataArrayRec {
    values: NumericArray;
    layout: GiftiArrayLayout;
    meta: MetaList;
    coordSys?: CoordSystem;
}

function readLayout(da: Element): GiftiArrayLayout {
    const dataType = getAttrDef(da, 'DataType', '');
    if (!isGiftiDataType(dataType)) {
        throw new MeshStructureError(`Unsupported DataType '${dataType}'`);
    }
    const encoding = getAttrDef(da, 'Encoding', 'ASCII');
    if (encoding === 'ExternalFileBinary') {
        throw new MeshStructureError('External file data arrays are not supported');
    }
    if (!isGiftiEncoding(encoding)) {
        throw new MeshStructureError(`Unsupported Encoding '${encoding}'`);
    }
    const rawEndian = getAttrDef(da, 'Endian', 'LittleEndian');
    const endian: GiftiEndian = rawEndian === 'BigEndian' ? 'BigEndian' : 'LittleEndian';
    const rawOrder = getAttrDef(da, 'ArrayIndexingOrder', 'RowMajorOrder');
    const order: GiftiIndexingOrder = rawOrder === 'ColumnMajorOrder' ? 'ColumnMajorOrder' : 'RowMajorOrder';
    return { dataType, encoding, endian, order };
}

export function readMetaList(parent: Element): MetaList {
    const md = findChildElement(parent, 'MetaData');
    if (!md) return [];
    return childElements(md, 'MD').map((e) => ({
        name: getElementText(findChildElement(e, 'Name')),
        value: getElementText(findChildElement(e, 'Value')),
    }));
}

function readCoordSystem(da: Element): CoordSystem | undefined {
    const cs = findChildElement(da, 'CoordinateSystemTransformMatrix');
    if (!cs) return undefined;
    const nums = getElementText(findChildElement(cs, 'MatrixData'))
        .split(/\s+/)
        .filter((t) => t.length > 0)
        .map(Number);
    if (nums.length !== 16 || nums.some((v) => Number.isNaN(v))) {
        throw new MeshStructureError(`CoordinateSystemTransformMatrix needs 16 numbers, got ${nums.length}`);
    }
    const rows = [0, 4, 8, 12].map((i) => nums.slice(i, i + 4));
    return {
        dataSpace: xformCode(getElementText(findChildElement(cs, 'DataSpace'))),
        transformedSpace: xformCode(getElementText(findChildElement(cs, 'TransformedSpace'))),
        xform: fromRows(rows),
    };
}

function readDataArray(da: Element, what: string): DataArrayRec {
    const dims = getIntAttrDef(da, 'Dimensionality', 0);
    const rows = getIntAttrDef(da, 'Dim0', -1);
    const cols = getIntAttrDef(da, 'Dim1', -1);
    if (dims !== 2 || cols !== 3 || !(rows >= 0)) {
        throw new MeshStructureError(`${what} array must be N x 3 (Dimensionality=${dims}, Dim0=${rows}, Dim1=${cols})`);
    }
    const layout = readLayout(da);
    const dataEl = findChildElement(da, 'Data');
    if (!dataEl) throw new MeshStructureError(`${what} array has no <Data>`);
    return {
        values: decodeData(dataEl.textContent ?? '', layout, rows, cols),
        layout,
        meta: readMetaList(da),
        coordSys: readCoordSystem(da),
    };
}

function isCoordArray(a: NumericArray): a is CoordArray {
    return a instanceof Float32Array || a instanceof Float64Array;
}

export function parseSurfaceDocument(doc: Document, sourcePath: string): GiftiSurface {
    const root = doc.documentElement;
    if (!root || root.tagName !== 'GIFTI') {
        throw new MeshStructureError(`${sourcePath}: root element is not <GIFTI>`);
    }
    const arrays = childElements(root, 'DataArray');
    const pointElement = arrays.find((a) => a.getAttribute('Intent') === INTENT_POINTSET);
    const faceElement = arrays.find((a) => a.getAttribute('Intent') === INTENT_TRIANGLE);
    if (!pointElement) throw new MeshStructureError(`${sourcePath}: no ${INTENT_POINTSET} data array`);
    if (!faceElement) throw new MeshStructureError(`${sourcePath}: no ${INTENT_TRIANGLE} data array`);

    const points = readDataArray(pointElement, 'Point-set');
    const faces = readDataArray(faceElement, 'Triangle');
    if (!isCoordArray(points.values)) {
        throw new MeshStructureError(`${sourcePath}: point-set must be float32 or float64, not ${points.layout.dataType}`);
    }

    return new GiftiSurface({
        doc,
        sourcePath,
        pointSet: { coords: points.values, meta: points.meta, coordSys: points.coordSys },
        faceSet: { indices: faces.values, meta: faces.meta, coordSys: faces.coordSys },
        pointLayout: points.layout,
        faceLayout: faces.layout,
        pointElement,
        faceElement,
    });
}

export async function readSurfaceMesh(filePath: string, onWarning?: (msg: string) => void): Promise<GiftiSurface> {
    let doc: Document;
    try {
        doc = await loadXmlFile(filePath, onWarning);
    } catch (e) {
        if (e instanceof XmlParseError) {
            throw new MeshStructureError(`${filePath}: not a readable GIFTI document`, { cause: e });
        }
        throw e;
    }
    return parseSurfaceDocument(doc, filePath);
}

/** Puts `child` before the first of the named siblings present, or at the end */
function insertBeforeFirst(parent: Element, child: Element, before: string[]) {
    for (const tag of before) {
        const ref = findChildElement(parent, tag);
        if (ref) {
            parent.insertBefore(child, ref);
            return;
        }
    }
    parent.appendChild(child);
}

function writeMetaList(doc: Document, da: Element, meta: MetaList) {
    let md = findChildElement(da, 'MetaData');
    if (!md) {
        if (meta.length === 0) return;
        md = doc.createElement('MetaData');
        insertBeforeFirst(da, md, ['CoordinateSystemTransformMatrix', 'Data']);
    }
    removeAllChildren(md);
    for (const e of meta) {
        const mde = doc.createElement('MD');
        appendCDataElement(doc, mde, 'Name', e.name);
        appendCDataElement(doc, mde, 'Value', e.value);
        md.appendChild(mde);
    }
}

function writeCoordSystem(doc: Document, da: Element, coordSys: CoordSystem | undefined) {
    let cs = findChildElement(da, 'CoordinateSystemTransformMatrix');
    if (!coordSys) {
        if (cs) da.removeChild(cs);
        return;
    }
    if (!cs) {
        cs = doc.createElement('CoordinateSystemTransformMatrix');
        insertBeforeFirst(da, cs, ['Data']);
    }
    removeAllChildren(cs);
    appendCDataElement(doc, cs, 'DataSpace', xformName(coordSys.dataSpace));
    appendCDataElement(doc, cs, 'TransformedSpace', xformName(coordSys.transformedSpace));
    const matrixText = toRows(coordSys.xform)
        .map((r) => r.map((v) => String(v + 0)).join(' '))
        .join('\n');
    appendTextElement(doc, cs, 'MatrixData', `\n${matrixText}\n`);
}

function writeDataArray(
    doc: Document,
    da: Element,
    values: NumericArray,
    layout: GiftiArrayLayout,
    meta: MetaList,
    coordSys: CoordSystem | undefined,
) {
    da.setAttribute('DataType', layout.dataType);
    da.setAttribute('Encoding', layout.encoding);
    da.setAttribute('Endian', layout.endian);
    da.setAttribute('ArrayIndexingOrder', layout.order);
    da.setAttribute('Dim0', String(values.length / 3));

    writeMetaList(doc, da, meta);
    writeCoordSystem(doc, da, coordSys);

    let dataEl = findChildElement(da, 'Data');
    if (!dataEl) {
        dataEl = doc.createElement('Data');
        da.appendChild(dataEl);
    }
    setElementText(doc, dataEl, encodeData(values, layout, 3));
}

export function serializeSurfaceMesh(mesh: GiftiSurface): string {
    const { doc } = mesh;
    writeDataArray(doc, mesh.pointElement, mesh.pointSet.coords, mesh.pointLayout, mesh.pointSet.meta, mesh.pointSet.coordSys);
    writeDataArray(doc, mesh.faceElement, mesh.faceSet.indices, mesh.faceLayout, mesh.faceSet.meta, mesh.faceSet.coordSys);
    return serializeXml(doc);
}

/** Serializes completely before the one write, so a failure leaves no file behind */
export async function writeSurfaceMesh(mesh: GiftiSurface, filePath: string): Promise<void> {
    const xml = serializeSurfaceMesh(mesh);
    await writeTextFile(filePath, xml);
}
