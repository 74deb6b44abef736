import { Document } from "../dom/Document.js";
import { Element } from "../dom/Element.js";

export interface SampleTree {
    doc: Document;
    root: Element;
    a: Element;
    b: Element;
    c: Element;
    d: Element;
}

/** root(a(b, c), d), attached to a fresh document. */
export function buildSampleTree(): SampleTree {
    const doc = new Document();
    const root = doc.createElement("root");
    const a = doc.createElement("a");
    const b = doc.createElement("b");
    const c = doc.createElement("c");
    const d = doc.createElement("d");

    doc.appendChild(root);
    root.appendChild(a);
    a.appendChild(b);
    a.appendChild(c);
    root.appendChild(d);

    return { doc, root, a, b, c, d };
}

export function names(nodes: Iterable<{ nodeName: string }>): string[] {
    return Array.from(nodes, node => node.nodeName.toLowerCase());
}
