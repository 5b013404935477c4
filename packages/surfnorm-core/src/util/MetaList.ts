import type { MetaEntry, MetaList } from '../types/SurfaceTypes';

export function getMetaValue(meta: MetaList, name: string): string | undefined {
    return meta.find((e) => e.name === name)?.value;
}

export function hasMetaEntry(meta: MetaList, name: string): boolean {
    return meta.some((e) => e.name === name);
}

/** Updates every entry with this name; returns false (and adds nothing) if there is none */
export function replaceMetaValue(meta: MetaList, name: string, value: string): boolean {
    let found = false;
    for (const e of meta) {
        if (e.name === name) {
            e.value = value;
            found = true;
        }
    }
    return found;
}

/** Like replaceMetaValue, but appends the entry when it is missing */
export function setMetaValue(meta: MetaList, name: string, value: string): void {
    if (!replaceMetaValue(meta, name, value)) {
        meta.push({ name, value });
    }
}

/** Inserts at index, or appends when the list is shorter than that */
export function insertMetaEntry(meta: MetaList, index: number, entry: MetaEntry): void {
    meta.splice(Math.min(index, meta.length), 0, { ...entry });
}

export function cloneMetaList(meta: MetaList): MetaList {
    return meta.map((e) => ({ ...e }));
}
