import type { Document } from "./Document.js";
import { Node } from "./Node.js";
import { NodeType } from "./NodeType.js";

export class DocumentType extends Node {
    readonly nodeType = NodeType.DOCUMENT_TYPE_NODE;

    constructor(
        ownerDocument: Document,
        public readonly name: string,
        public readonly publicId: string = "",
        public readonly systemId: string = ""
    ) {
        super(ownerDocument);
    }

    public get nodeName(): string {
        return this.name;
    }

    public get textContent(): string | null {
        return null;
    }

    public hasSameValue(other: Node): boolean {
        return other instanceof DocumentType
            && this.name === other.name
            && this.publicId === other.publicId
            && this.systemId === other.systemId;
    }
}
