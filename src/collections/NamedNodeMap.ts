import type { Attr } from "../dom/Attr.js";
import type { Element } from "../dom/Element.js";
import { HTML_NAMESPACE } from "../dom/NodeType.js";
import { bumpTreeGeneration } from "../dom/TreeGeneration.js";
import { InUseAttributeError, NotFoundError } from "../errors/DomErrors.js";
import { SequentialMapIterator } from "./SequentialMapIterator.js";

/**
 * An element's attributes, in insertion order. This is the element's
 * attribute storage itself, so every read reflects the current state.
 *
 * https://dom.spec.whatwg.org/#namednodemap
 */
export class NamedNodeMap implements Iterable<Attr> {
    private readonly attrs: Attr[] = [];

    constructor(private readonly element: Element) {}

    public get length(): number {
        return this.attrs.length;
    }

    public item(index: number): Attr | null {
        if (!Number.isInteger(index) || index < 0) return null;
        return this.attrs[index] ?? null;
    }

    public getNamedItem(qualifiedName: string): Attr | null {
        const name = this.normalizeName(qualifiedName);
        return this.attrs.find(attr => attr.name === name) ?? null;
    }

    public getNamedItemNS(namespace: string | null, localName: string): Attr | null {
        const ns = namespace === "" ? null : namespace;
        return this.attrs.find(attr => attr.namespaceURI === ns && attr.localName === localName) ?? null;
    }

    /** Adds or replaces by namespace and local name; returns the replaced attribute. */
    public setNamedItem(attr: Attr): Attr | null {
        const owner = attr.ownerElement;
        if (owner !== null && owner !== this.element) {
            throw new InUseAttributeError(`Attribute '${attr.name}' already belongs to another element.`);
        }

        const existing = this.getNamedItemNS(attr.namespaceURI, attr.localName);
        if (existing === attr) {
            return attr;
        }

        if (existing !== null) {
            this.attrs[this.attrs.indexOf(existing)] = attr;
            existing.bindOwner(null);
        } else {
            this.attrs.push(attr);
        }
        attr.bindOwner(this.element);
        bumpTreeGeneration();
        return existing;
    }

    public setNamedItemNS(attr: Attr): Attr | null {
        return this.setNamedItem(attr);
    }

    public removeNamedItem(qualifiedName: string): Attr {
        const attr = this.getNamedItem(qualifiedName);
        if (attr === null) {
            throw new NotFoundError(`No attribute named '${qualifiedName}'.`);
        }
        this.detach(attr);
        return attr;
    }

    public removeNamedItemNS(namespace: string | null, localName: string): Attr {
        const attr = this.getNamedItemNS(namespace, localName);
        if (attr === null) {
            throw new NotFoundError(`No attribute '${localName}' in namespace '${namespace ?? ""}'.`);
        }
        this.detach(attr);
        return attr;
    }

    [Symbol.iterator](): SequentialMapIterator<Attr> {
        return new SequentialMapIterator(this);
    }

    private detach(attr: Attr): void {
        this.attrs.splice(this.attrs.indexOf(attr), 1);
        attr.bindOwner(null);
        bumpTreeGeneration();
    }

    // HTML elements match attribute names case-insensitively.
    private normalizeName(qualifiedName: string): string {
        return this.element.namespaceURI === HTML_NAMESPACE ? qualifiedName.toLowerCase() : qualifiedName;
    }
}
