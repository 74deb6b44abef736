import type { Document } from "./Document.js";
import { Node } from "./Node.js";
import { NodeType } from "./NodeType.js";
import { bumpTreeGeneration } from "./TreeGeneration.js";

export abstract class CharacterData extends Node {
    protected constructor(ownerDocument: Document, private text: string) {
        super(ownerDocument);
    }

    public get data(): string {
        return this.text;
    }

    public set data(value: string) {
        this.text = value;
        bumpTreeGeneration();
    }

    public get length(): number {
        return this.text.length;
    }

    public get nodeValue(): string | null {
        return this.text;
    }

    public get textContent(): string | null {
        return this.text;
    }

    public appendData(data: string): void {
        this.data = this.text + data;
    }

    public hasSameValue(other: Node): boolean {
        return other instanceof CharacterData && this.text === other.text;
    }
}

export class Text extends CharacterData {
    readonly nodeType = NodeType.TEXT_NODE;
    readonly nodeName = "#text";

    constructor(ownerDocument: Document, data: string) {
        super(ownerDocument, data);
    }
}

export class Comment extends CharacterData {
    readonly nodeType = NodeType.COMMENT_NODE;
    readonly nodeName = "#comment";

    constructor(ownerDocument: Document, data: string) {
        super(ownerDocument, data);
    }
}

export class CDATASection extends CharacterData {
    readonly nodeType = NodeType.CDATA_SECTION_NODE;
    readonly nodeName = "#cdata-section";

    constructor(ownerDocument: Document, data: string) {
        super(ownerDocument, data);
    }
}

export class ProcessingInstruction extends CharacterData {
    readonly nodeType = NodeType.PROCESSING_INSTRUCTION_NODE;

    constructor(ownerDocument: Document, public readonly target: string, data: string) {
        super(ownerDocument, data);
    }

    public get nodeName(): string {
        return this.target;
    }

    public hasSameValue(other: Node): boolean {
        return other instanceof ProcessingInstruction
            && this.target === other.target
            && super.hasSameValue(other);
    }
}
