import { Attr } from "./Attr.js";
import type { Document } from "./Document.js";
import { Node } from "./Node.js";
import { HTML_NAMESPACE, NodeType } from "./NodeType.js";
import { splitQualifiedName } from "./QualifiedName.js";
import { HTMLCollection } from "../collections/HTMLCollection.js";
import { splitClassNames } from "../collections/Matchers.js";
import { NamedNodeMap } from "../collections/NamedNodeMap.js";

export class Element extends Node {
    readonly nodeType = NodeType.ELEMENT_NODE;

    private readonly attributeMap: NamedNodeMap;
    private childElements: HTMLCollection | null = null;

    constructor(
        private readonly doc: Document,
        public readonly localName: string,
        public readonly namespaceURI: string | null = HTML_NAMESPACE,
        public readonly prefix: string | null = null
    ) {
        super(doc);
        this.attributeMap = new NamedNodeMap(this);
    }

    public get tagName(): string {
        const qualified = this.prefix === null ? this.localName : `${this.prefix}:${this.localName}`;
        return this.namespaceURI === HTML_NAMESPACE ? qualified.toUpperCase() : qualified;
    }

    public get nodeName(): string {
        return this.tagName;
    }

    public get attributes(): NamedNodeMap {
        return this.attributeMap;
    }

    /** Live collection of the child elements, via the children-only walker. */
    public get children(): HTMLCollection {
        if (!this.childElements) {
            this.childElements = HTMLCollection.children(this);
        }
        return this.childElements;
    }

    public get id(): string {
        return this.getAttribute("id") ?? "";
    }

    public set id(value: string) {
        this.setAttribute("id", value);
    }

    public get className(): string {
        return this.getAttribute("class") ?? "";
    }

    public set className(value: string) {
        this.setAttribute("class", value);
    }

    public hasClass(className: string): boolean {
        return splitClassNames(this.className).includes(className);
    }

    public getAttribute(qualifiedName: string): string | null {
        return this.attributeMap.getNamedItem(qualifiedName)?.value ?? null;
    }

    public getAttributeNS(namespace: string | null, localName: string): string | null {
        return this.attributeMap.getNamedItemNS(namespace, localName)?.value ?? null;
    }

    public getAttributeNode(qualifiedName: string): Attr | null {
        return this.attributeMap.getNamedItem(qualifiedName);
    }

    public hasAttribute(qualifiedName: string): boolean {
        return this.attributeMap.getNamedItem(qualifiedName) !== null;
    }

    public hasAttributes(): boolean {
        return this.attributeMap.length > 0;
    }

    public setAttribute(qualifiedName: string, value: string): void {
        const existing = this.attributeMap.getNamedItem(qualifiedName);
        if (existing !== null) {
            existing.value = value;
            return;
        }
        const name = this.namespaceURI === HTML_NAMESPACE ? qualifiedName.toLowerCase() : qualifiedName;
        this.attributeMap.setNamedItem(new Attr(this.doc, name, value));
    }

    public setAttributeNS(namespace: string | null, qualifiedName: string, value: string): void {
        const { prefix, localName } = splitQualifiedName(qualifiedName);
        const ns = namespace === "" ? null : namespace;
        const existing = this.attributeMap.getNamedItemNS(ns, localName);
        if (existing !== null) {
            existing.value = value;
            return;
        }
        this.attributeMap.setNamedItem(new Attr(this.doc, localName, value, ns, prefix));
    }

    public setAttributeNode(attr: Attr): Attr | null {
        return this.attributeMap.setNamedItem(attr);
    }

    public removeAttribute(qualifiedName: string): void {
        if (this.attributeMap.getNamedItem(qualifiedName) !== null) {
            this.attributeMap.removeNamedItem(qualifiedName);
        }
    }

    public getElementsByTagName(tagName: string): HTMLCollection {
        return HTMLCollection.byTagName(this, tagName);
    }

    public getElementsByClassName(classNames: string): HTMLCollection {
        return HTMLCollection.byClassName(this, classNames);
    }

    public hasSameValue(other: Node): boolean {
        if (!(other instanceof Element)) return false;
        if (this.namespaceURI !== other.namespaceURI || this.prefix !== other.prefix || this.localName !== other.localName) {
            return false;
        }
        if (this.attributeMap.length !== other.attributeMap.length) {
            return false;
        }
        for (const attr of this.attributeMap) {
            const counterpart = other.attributeMap.getNamedItemNS(attr.namespaceURI, attr.localName);
            if (counterpart === null || !attr.hasSameValue(counterpart)) {
                return false;
            }
        }
        return true;
    }

    protected acceptsChildren(): boolean {
        return true;
    }
}
