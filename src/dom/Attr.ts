import type { Document } from "./Document.js";
import type { Element } from "./Element.js";
import { Node } from "./Node.js";
import { NodeType } from "./NodeType.js";
import { bumpTreeGeneration } from "./TreeGeneration.js";

export class Attr extends Node {
    readonly nodeType = NodeType.ATTRIBUTE_NODE;

    private element: Element | null = null;

    constructor(
        ownerDocument: Document,
        public readonly localName: string,
        private attrValue: string = "",
        public readonly namespaceURI: string | null = null,
        public readonly prefix: string | null = null
    ) {
        super(ownerDocument);
    }

    public get name(): string {
        return this.prefix === null ? this.localName : `${this.prefix}:${this.localName}`;
    }

    public get nodeName(): string {
        return this.name;
    }

    public get value(): string {
        return this.attrValue;
    }

    public set value(value: string) {
        this.attrValue = value;
        bumpTreeGeneration();
    }

    public get nodeValue(): string | null {
        return this.attrValue;
    }

    public get textContent(): string | null {
        return this.attrValue;
    }

    public get ownerElement(): Element | null {
        return this.element;
    }

    /** Called by NamedNodeMap when the attribute is attached or detached. */
    public bindOwner(element: Element | null): void {
        this.element = element;
    }

    public hasSameValue(other: Node): boolean {
        return other instanceof Attr
            && this.namespaceURI === other.namespaceURI
            && this.localName === other.localName
            && this.attrValue === other.attrValue;
    }
}
