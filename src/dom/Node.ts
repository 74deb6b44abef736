import type { Document } from "./Document.js";
import { LinkedNode, domAccessor } from "./NodeAccessor.js";
import { NodeType } from "./NodeType.js";
import { bumpTreeGeneration } from "./TreeGeneration.js";
import { HierarchyRequestError, NotFoundError } from "../errors/DomErrors.js";
import { NodeList } from "../collections/NodeList.js";
import { isEqualNode } from "../equality/NodeEquality.js";
import { DepthFirstWalker } from "../traversal/Walker.js";

const descendants = new DepthFirstWalker<Node>(domAccessor);

/**
 * Base of the in-memory node graph. Each node stores its own parent and
 * sibling links; the first/last child links live on the parent.
 *
 * Removing a node clears its parent and sibling links but keeps its own
 * subtree, so a walker holding it as `current` sees a detached root.
 */
export abstract class Node implements LinkedNode<Node> {
    abstract readonly nodeType: NodeType;
    abstract readonly nodeName: string;

    private parent: Node | null = null;
    private first: Node | null = null;
    private last: Node | null = null;
    private prev: Node | null = null;
    private next: Node | null = null;
    private childList: NodeList | null = null;

    protected constructor(private readonly owner: Document | null) {}

    /** The document that created this node; `null` for documents themselves. */
    public get ownerDocument(): Document | null {
        return this.owner;
    }

    public get parentNode(): Node | null {
        return this.parent;
    }

    public get firstChild(): Node | null {
        return this.first;
    }

    public get lastChild(): Node | null {
        return this.last;
    }

    public get previousSibling(): Node | null {
        return this.prev;
    }

    public get nextSibling(): Node | null {
        return this.next;
    }

    public get childNodes(): NodeList {
        if (!this.childList) {
            this.childList = new NodeList(this);
        }
        return this.childList;
    }

    public get nodeValue(): string | null {
        return null;
    }

    public get textContent(): string | null {
        let text = "";
        let node = descendants.next(this, null);
        while (node !== null) {
            if (node.nodeType === NodeType.TEXT_NODE || node.nodeType === NodeType.CDATA_SECTION_NODE) {
                text += node.nodeValue ?? "";
            }
            node = descendants.next(this, node);
        }
        return text;
    }

    public hasChildNodes(): boolean {
        return this.first !== null;
    }

    public getRootNode(): Node {
        let node: Node = this;
        while (node.parent !== null) {
            node = node.parent;
        }
        return node;
    }

    /** Inclusive: a node contains itself. */
    public contains(other: Node | null): boolean {
        let node = other;
        while (node !== null) {
            if (node === this) return true;
            node = node.parent;
        }
        return false;
    }

    public isSameNode(other: Node | null): boolean {
        return this === other;
    }

    public isEqualNode(other: Node | null): boolean {
        return other !== null && isEqualNode(this, other);
    }

    /**
     * Compares the fields that identify this kind of node, children excluded.
     * Only called with `other.nodeType === this.nodeType`.
     */
    public abstract hasSameValue(other: Node): boolean;

    public appendChild<T extends Node>(node: T): T {
        return this.insertBefore(node, null);
    }

    public insertBefore<T extends Node>(node: T, child: Node | null): T {
        this.ensurePreInsertValidity(node, child);

        // Inserting next to itself: the reference moves on before the node is unlinked.
        const reference = child === node ? node.next : child;

        if (node.nodeType === NodeType.DOCUMENT_FRAGMENT_NODE) {
            let moving = node.first;
            while (moving !== null) {
                const following = moving.next;
                node.unlink(moving);
                this.link(moving, reference);
                moving = following;
            }
        } else {
            if (node.parent !== null) {
                node.parent.unlink(node);
            }
            this.link(node, reference);
        }

        bumpTreeGeneration();
        return node;
    }

    public removeChild<T extends Node>(child: T): T {
        if (child.parent !== this) {
            throw new NotFoundError("The node to be removed is not a child of this node.");
        }
        this.unlink(child);
        bumpTreeGeneration();
        return child;
    }

    public replaceChild<T extends Node>(node: Node, child: T): T {
        if (child.parent !== this) {
            throw new NotFoundError("The node to be replaced is not a child of this node.");
        }
        if (node === child) {
            return child;
        }
        const reference = child.next === node ? node.next : child.next;
        this.ensurePreInsertValidity(node, null);
        this.unlink(child);
        this.insertBefore(node, reference);
        return child;
    }

    public remove(): void {
        if (this.parent !== null) {
            this.parent.removeChild(this);
        }
    }

    /** Whether this kind of node may hold children at all. */
    protected acceptsChildren(): boolean {
        return false;
    }

    private ensurePreInsertValidity(node: Node, child: Node | null): void {
        if (!this.acceptsChildren()) {
            throw new HierarchyRequestError(`A ${this.nodeName} node cannot have children.`);
        }
        if (node.contains(this)) {
            throw new HierarchyRequestError("The new child is an ancestor of the parent.");
        }
        if (child !== null && child.parent !== this) {
            throw new NotFoundError("The reference node is not a child of this node.");
        }
        if (node.nodeType === NodeType.DOCUMENT_NODE || node.nodeType === NodeType.ATTRIBUTE_NODE) {
            throw new HierarchyRequestError(`A ${node.nodeName} node cannot be inserted into a tree.`);
        }
        if (this.nodeType === NodeType.DOCUMENT_NODE && node.nodeType === NodeType.TEXT_NODE) {
            throw new HierarchyRequestError("Text cannot be a child of a document.");
        }
        if (this.nodeType !== NodeType.DOCUMENT_NODE && node.nodeType === NodeType.DOCUMENT_TYPE_NODE) {
            throw new HierarchyRequestError("A doctype can only be a child of a document.");
        }
    }

    private link(node: Node, before: Node | null): void {
        const after = before === null ? this.last : before.prev;

        node.parent = this;
        node.prev = after;
        node.next = before;

        if (after === null) {
            this.first = node;
        } else {
            after.next = node;
        }
        if (before === null) {
            this.last = node;
        } else {
            before.prev = node;
        }
    }

    private unlink(node: Node): void {
        if (node.prev === null) {
            this.first = node.next;
        } else {
            node.prev.next = node.next;
        }
        if (node.next === null) {
            this.last = node.prev;
        } else {
            node.next.prev = node.prev;
        }
        node.parent = null;
        node.prev = null;
        node.next = null;
    }
}
