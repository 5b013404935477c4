export class XMLConstants
{
    static ELEMENT_NODE = 1;
}

export function isElement(n: Node): n is Element {
    return n.nodeType === XMLConstants.ELEMENT_NODE;
}

export function childElements(e: Element, t?: string): Element[] {
    const out: Element[] = [];
    for (let ie = 0; ie < e.childNodes.length; ++ie) {
        const n = e.childNodes[ie];
        if (isElement(n) && (t === undefined || n.tagName === t)) out.push(n);
    }
    return out;
}

export function findChildElement(e: Element, t: string): Element | undefined {
    for (let ie = 0; ie < e.childNodes.length; ++ie) {
        const n = e.childNodes[ie];
        if (isElement(n) && n.tagName === t) return n;
    }
    return undefined;
}

export function getIntAttrDef(n: Element | null | undefined, nm: string, def: number) : number
{
    if (!n) return def;
    const v = n.getAttribute(nm);
    if (!v) return def;
    return Number.parseInt(v);
}

export function getAttrDef(n: Element | null | undefined, nm: string, def: string) : string
{
    if (!n) return def;
    const v = n.getAttribute(nm);
    if (!v) return def;
    return v;
}

/** Text and CDATA content, trimmed */
export function getElementText(e: Element | null | undefined): string {
    if (!e) return '';
    return (e.textContent ?? '').trim();
}

export function removeAllChildren(e: Element) {
    while (e.firstChild) {
        e.removeChild(e.firstChild);
    }
}

/** Appends <tag><![CDATA[text]]></tag>; text that would end the section early goes in as plain text */
export function appendCDataElement(doc: Document, parent: Element, tag: string, text: string): Element {
    const ce = doc.createElement(tag);
    ce.appendChild(text.includes(']]>') ? doc.createTextNode(text) : doc.createCDATASection(text));
    parent.appendChild(ce);
    return ce;
}

export function appendTextElement(doc: Document, parent: Element, tag: string, text: string): Element {
    const ce = doc.createElement(tag);
    ce.appendChild(doc.createTextNode(text));
    parent.appendChild(ce);
    return ce;
}

export function setElementText(doc: Document, e: Element, text: string) {
    removeAllChildren(e);
    e.appendChild(doc.createTextNode(text));
}
