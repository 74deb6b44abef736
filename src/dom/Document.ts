import { Attr } from "./Attr.js";
import { CDATASection, Comment, ProcessingInstruction, Text } from "./CharacterData.js";
import { DocumentFragment } from "./DocumentFragment.js";
import { DocumentType } from "./DocumentType.js";
import { Element } from "./Element.js";
import { Node } from "./Node.js";
import { domAccessor } from "./NodeAccessor.js";
import { HTML_NAMESPACE, NodeType, isElement } from "./NodeType.js";
import { assertValidName, splitQualifiedName } from "./QualifiedName.js";
import { HTMLCollection } from "../collections/HTMLCollection.js";
import { InvalidCharacterError } from "../errors/DomErrors.js";
import { NodeFilter, NodeFilterInput } from "../traversal/NodeFilter.js";
import { NodeIterator } from "../traversal/NodeIterator.js";
import { TreeWalker } from "../traversal/TreeWalker.js";
import { DepthFirstWalker } from "../traversal/Walker.js";

const treeOrder = new DepthFirstWalker<Node>(domAccessor);

/**
 * Root of an in-memory graph and factory for its nodes. Element names are
 * treated the HTML way: created lower-cased in the HTML namespace.
 */
export class Document extends Node {
    readonly nodeType = NodeType.DOCUMENT_NODE;
    readonly nodeName = "#document";

    constructor() {
        super(null);
    }

    public get textContent(): string | null {
        return null;
    }

    public get doctype(): DocumentType | null {
        let node = this.firstChild;
        while (node !== null) {
            if (node instanceof DocumentType) return node;
            node = node.nextSibling;
        }
        return null;
    }

    public get documentElement(): Element | null {
        let node = this.firstChild;
        while (node !== null) {
            if (isElement(node)) return node;
            node = node.nextSibling;
        }
        return null;
    }

    public get all(): HTMLCollection {
        return HTMLCollection.all(this);
    }

    public get links(): HTMLCollection {
        return HTMLCollection.links(this);
    }

    public get anchors(): HTMLCollection {
        return HTMLCollection.anchors(this);
    }

    public get children(): HTMLCollection {
        return HTMLCollection.children(this);
    }

    public createElement(localName: string): Element {
        assertValidName(localName);
        return new Element(this, localName.toLowerCase(), HTML_NAMESPACE);
    }

    public createElementNS(namespace: string | null, qualifiedName: string): Element {
        const { prefix, localName } = splitQualifiedName(qualifiedName);
        const ns = namespace === "" ? null : namespace;
        if (prefix !== null && ns === null) {
            throw new InvalidCharacterError(`A prefixed name needs a namespace: '${qualifiedName}'.`);
        }
        return new Element(this, localName, ns, prefix);
    }

    public createAttribute(localName: string): Attr {
        assertValidName(localName);
        return new Attr(this, localName.toLowerCase());
    }

    public createAttributeNS(namespace: string | null, qualifiedName: string): Attr {
        const { prefix, localName } = splitQualifiedName(qualifiedName);
        return new Attr(this, localName, "", namespace === "" ? null : namespace, prefix);
    }

    public createTextNode(data: string): Text {
        return new Text(this, data);
    }

    public createComment(data: string): Comment {
        return new Comment(this, data);
    }

    public createCDATASection(data: string): CDATASection {
        if (data.includes("]]>")) {
            throw new InvalidCharacterError("CDATA section data cannot contain ']]>'.");
        }
        return new CDATASection(this, data);
    }

    public createProcessingInstruction(target: string, data: string): ProcessingInstruction {
        assertValidName(target);
        if (data.includes("?>")) {
            throw new InvalidCharacterError("Processing instruction data cannot contain '?>'.");
        }
        return new ProcessingInstruction(this, target, data);
    }

    public createDocumentFragment(): DocumentFragment {
        return new DocumentFragment(this);
    }

    public createDocumentType(name: string, publicId = "", systemId = ""): DocumentType {
        assertValidName(name);
        return new DocumentType(this, name, publicId, systemId);
    }

    public getElementsByTagName(tagName: string): HTMLCollection {
        return HTMLCollection.byTagName(this, tagName);
    }

    public getElementsByClassName(classNames: string): HTMLCollection {
        return HTMLCollection.byClassName(this, classNames);
    }

    public getElementsByName(name: string): HTMLCollection {
        return HTMLCollection.byName(this, name);
    }

    public getElementById(id: string): Element | null {
        if (id.length === 0) return null;
        let node = treeOrder.next(this, null);
        while (node !== null) {
            if (isElement(node) && node.getAttribute("id") === id) {
                return node;
            }
            node = treeOrder.next(this, node);
        }
        return null;
    }

    public createTreeWalker(root: Node, whatToShow: number = NodeFilter.SHOW_ALL, filter: NodeFilterInput | null = null): TreeWalker {
        return new TreeWalker(root, whatToShow, filter);
    }

    public createNodeIterator(root: Node, whatToShow: number = NodeFilter.SHOW_ALL, filter: NodeFilterInput | null = null): NodeIterator {
        return new NodeIterator(root, whatToShow, filter);
    }

    // Documents compare by their children only.
    public hasSameValue(_other: Node): boolean {
        return true;
    }

    protected acceptsChildren(): boolean {
        return true;
    }
}
