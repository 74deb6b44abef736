import type { Node } from "../dom/Node.js";
import { domAccessor } from "../dom/NodeAccessor.js";
import { FilterRunner, NodeFilter, NodeFilterInput } from "./NodeFilter.js";
import { DepthFirstWalker } from "./Walker.js";

const following = new DepthFirstWalker<Node>(domAccessor);

/** The node just before `node` in tree order, staying inside `root`. */
function precedingWithin(root: Node, node: Node): Node | null {
    if (node === root) {
        return null;
    }
    let sibling = node.previousSibling;
    if (sibling === null) {
        return node.parentNode;
    }
    while (sibling.lastChild !== null) {
        sibling = sibling.lastChild;
    }
    return sibling;
}

/**
 * Flat cursor over the inclusive descendants of `root` in tree order.
 * Unlike TreeWalker there is no pruning: a rejected node only hides itself.
 * Once the reference node is no longer inside `root` (it or an ancestor was
 * removed), both directions return null.
 *
 * https://dom.spec.whatwg.org/#interface-nodeiterator
 */
export class NodeIterator {
    private reference: Node;
    private pointerBefore = true;
    private readonly runner: FilterRunner;

    constructor(
        public readonly root: Node,
        whatToShow: number = NodeFilter.SHOW_ALL,
        filter: NodeFilterInput | null = null
    ) {
        this.reference = root;
        this.runner = new FilterRunner(whatToShow, filter);
    }

    public get referenceNode(): Node {
        return this.reference;
    }

    public get pointerBeforeReferenceNode(): boolean {
        return this.pointerBefore;
    }

    public get whatToShow(): number {
        return this.runner.whatToShow;
    }

    public get filter(): NodeFilterInput | null {
        return this.runner.filter;
    }

    public nextNode(): Node | null {
        if (!this.root.contains(this.reference)) {
            return null;
        }
        let node = this.reference;
        let before = this.pointerBefore;

        for (;;) {
            if (before) {
                before = false;
            } else {
                const next = following.next(this.root, node);
                if (next === null) {
                    return null;
                }
                node = next;
            }
            if (this.runner.verify(node) === "accept") {
                break;
            }
        }

        this.reference = node;
        this.pointerBefore = before;
        return node;
    }

    public previousNode(): Node | null {
        if (!this.root.contains(this.reference)) {
            return null;
        }
        let node = this.reference;
        let before = this.pointerBefore;

        for (;;) {
            if (!before) {
                before = true;
            } else {
                const previous = precedingWithin(this.root, node);
                if (previous === null) {
                    return null;
                }
                node = previous;
            }
            if (this.runner.verify(node) === "accept") {
                break;
            }
        }

        this.reference = node;
        this.pointerBefore = before;
        return node;
    }

    /** No-op. */
    public detach(): void {
        return;
    }
}
