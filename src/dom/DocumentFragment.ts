import type { Document } from "./Document.js";
import { Node } from "./Node.js";
import { NodeType } from "./NodeType.js";
import { HTMLCollection } from "../collections/HTMLCollection.js";

export class DocumentFragment extends Node {
    readonly nodeType = NodeType.DOCUMENT_FRAGMENT_NODE;
    readonly nodeName = "#document-fragment";

    private childElements: HTMLCollection | null = null;

    constructor(ownerDocument: Document) {
        super(ownerDocument);
    }

    public get children(): HTMLCollection {
        if (!this.childElements) {
            this.childElements = HTMLCollection.children(this);
        }
        return this.childElements;
    }

    // Fragments carry no fields of their own; only their children are compared.
    public hasSameValue(_other: Node): boolean {
        return true;
    }

    protected acceptsChildren(): boolean {
        return true;
    }
}
