import type { Node } from "../dom/Node.js";
import { FilterRunner, FilterVerdict, NodeFilter, NodeFilterInput } from "./NodeFilter.js";

type ChildEnd = "first" | "last";
type SiblingDirection = "next" | "previous";

function childAt(node: Node, end: ChildEnd): Node | null {
    return end === "first" ? node.firstChild : node.lastChild;
}

function siblingOf(node: Node, direction: SiblingDirection): Node | null {
    return direction === "next" ? node.nextSibling : node.previousSibling;
}

/**
 * Filtered, bidirectional cursor over the subtree at `root`. A skipped node
 * is passed over but its children are still considered; a rejected node
 * hides its whole subtree.
 *
 * https://dom.spec.whatwg.org/#interface-treewalker
 */
export class TreeWalker {
    private current: Node;
    private readonly runner: FilterRunner;

    constructor(
        public readonly root: Node,
        whatToShow: number = NodeFilter.SHOW_ALL,
        filter: NodeFilterInput | null = null
    ) {
        this.current = root;
        this.runner = new FilterRunner(whatToShow, filter);
    }

    public get whatToShow(): number {
        return this.runner.whatToShow;
    }

    public get filter(): NodeFilterInput | null {
        return this.runner.filter;
    }

    public get currentNode(): Node {
        return this.current;
    }

    public set currentNode(node: Node) {
        this.current = node;
    }

    public parentNode(): Node | null {
        let node: Node | null = this.current;
        while (node !== null && node !== this.root) {
            node = node.parentNode;
            if (node !== null && this.runner.verify(node) === "accept") {
                this.current = node;
                return node;
            }
        }
        return null;
    }

    public firstChild(): Node | null {
        return this.traverseChildren("first");
    }

    public lastChild(): Node | null {
        return this.traverseChildren("last");
    }

    public nextSibling(): Node | null {
        return this.traverseSiblings("next");
    }

    public previousSibling(): Node | null {
        return this.traverseSiblings("previous");
    }

    public previousNode(): Node | null {
        let node = this.current;
        while (node !== this.root) {
            let sibling = node.previousSibling;
            while (sibling !== null) {
                node = sibling;
                let verdict = this.runner.verify(node);
                // Descend to the deepest last visible descendant.
                let child = node.lastChild;
                while (verdict !== "reject" && child !== null) {
                    node = child;
                    verdict = this.runner.verify(node);
                    child = node.lastChild;
                }
                if (verdict === "accept") {
                    this.current = node;
                    return node;
                }
                sibling = node.previousSibling;
            }

            const parent = node.parentNode;
            if (node === this.root || parent === null) {
                return null;
            }
            node = parent;
            if (this.runner.verify(node) === "accept") {
                this.current = node;
                return node;
            }
        }
        return null;
    }

    public nextNode(): Node | null {
        let node = this.current;
        let verdict: FilterVerdict = "accept";

        for (;;) {
            let child = node.firstChild;
            while (verdict !== "reject" && child !== null) {
                node = child;
                verdict = this.runner.verify(node);
                if (verdict === "accept") {
                    this.current = node;
                    return node;
                }
                child = node.firstChild;
            }

            // Nearest following sibling of node or of one of its ancestors, within root.
            let following: Node | null = null;
            let cursor: Node | null = node;
            while (cursor !== null) {
                if (cursor === this.root) {
                    return null;
                }
                following = cursor.nextSibling;
                if (following !== null) {
                    break;
                }
                cursor = cursor.parentNode;
            }
            if (following === null) {
                return null;
            }

            node = following;
            verdict = this.runner.verify(node);
            if (verdict === "accept") {
                this.current = node;
                return node;
            }
        }
    }

    private traverseChildren(end: ChildEnd): Node | null {
        const forward: SiblingDirection = end === "first" ? "next" : "previous";
        let node = childAt(this.current, end);

        while (node !== null) {
            const verdict = this.runner.verify(node);
            if (verdict === "accept") {
                this.current = node;
                return node;
            }
            if (verdict === "skip") {
                const child = childAt(node, end);
                if (child !== null) {
                    node = child;
                    continue;
                }
            }

            // No usable child: move across, climbing back up as far as current.
            let advanced = false;
            while (node !== null) {
                const sibling = siblingOf(node, forward);
                if (sibling !== null) {
                    node = sibling;
                    advanced = true;
                    break;
                }
                const parent: Node | null = node.parentNode;
                if (parent === null || parent === this.root || parent === this.current) {
                    return null;
                }
                node = parent;
            }
            if (!advanced) {
                return null;
            }
        }
        return null;
    }

    private traverseSiblings(direction: SiblingDirection): Node | null {
        const end: ChildEnd = direction === "next" ? "first" : "last";
        let node = this.current;
        if (node === this.root) {
            return null;
        }

        for (;;) {
            let sibling = siblingOf(node, direction);
            while (sibling !== null) {
                node = sibling;
                const verdict = this.runner.verify(node);
                if (verdict === "accept") {
                    this.current = node;
                    return node;
                }
                sibling = childAt(node, end);
                if (verdict === "reject" || sibling === null) {
                    sibling = siblingOf(node, direction);
                }
            }

            const parent = node.parentNode;
            if (parent === null || parent === this.root) {
                return null;
            }
            node = parent;
            if (this.runner.verify(node) === "accept") {
                return null;
            }
        }
    }
}
