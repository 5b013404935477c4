import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import * as fsp from 'fs/promises';
import * as path from 'path';

export class XmlParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'XmlParseError';
    }
}

export function parseXml(xmlContent: string, source: string, onWarning?: (msg: string) => void): Document {
    const parser = new DOMParser({
        errorHandler: {
            warning: (msg: unknown) => onWarning?.(`${source}: ${String(msg)}`),
            error: (msg: unknown) => {
                throw new XmlParseError(`${source}: ${String(msg)}`);
            },
            fatalError: (msg: unknown) => {
                throw new XmlParseError(`${source}: ${String(msg)}`);
            },
        },
    });
    return parser.parseFromString(xmlContent, 'text/xml');
}

export async function loadXmlFile(filePath: string, onWarning?: (msg: string) => void) {
    const xmlContent = await fsp.readFile(filePath, { encoding: 'utf-8' });
    return parseXml(xmlContent, filePath, onWarning);
}

export function serializeXml(doc: Document): string {
    return new XMLSerializer().serializeToString(doc);
}

export async function readTextFile(filePath: string): Promise<string> {
    return fsp.readFile(filePath, { encoding: 'utf-8' });
}

/** Single write of already-complete content; nothing touches the target before this */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
    await fsp.writeFile(filePath, content, { encoding: 'utf-8' });
}

export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fsp.access(filePath);
        return true;
    } catch (e) {
        if (hasErrorCode(e, 'ENOENT')) return false;
        throw e;
    }
}

export function hasErrorCode(e: unknown, code: string): boolean {
    return e instanceof Error && 'code' in e && e.code === code;
}

/** Last extension only, with the compound ones treated as one (like .nii.gz) */
const COMPOUND_EXTENSIONS = ['.nii.gz', '.tar.gz', '.niml.dset'];

export function splitExtension(fileName: string): { stem: string; ext: string } {
    const base = path.basename(fileName);
    for (const ext of COMPOUND_EXTENSIONS) {
        if (base.endsWith(ext)) {
            return { stem: base.slice(0, base.length - ext.length), ext };
        }
    }
    const ext = path.extname(base);
    return { stem: base.slice(0, base.length - ext.length), ext };
}
