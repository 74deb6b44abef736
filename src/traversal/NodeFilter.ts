import type { Node } from "../dom/Node.js";
import { InvalidStateError } from "../errors/DomErrors.js";

export const NodeFilter = {
    FILTER_ACCEPT: 1,
    FILTER_REJECT: 2,
    FILTER_SKIP: 3,

    SHOW_ALL: 0xFFFFFFFF,
    SHOW_ELEMENT: 0x1,
    SHOW_ATTRIBUTE: 0x2,
    SHOW_TEXT: 0x4,
    SHOW_CDATA_SECTION: 0x8,
    SHOW_ENTITY_REFERENCE: 0x10,
    SHOW_ENTITY: 0x20,
    SHOW_PROCESSING_INSTRUCTION: 0x40,
    SHOW_COMMENT: 0x80,
    SHOW_DOCUMENT: 0x100,
    SHOW_DOCUMENT_TYPE: 0x200,
    SHOW_DOCUMENT_FRAGMENT: 0x400,
    SHOW_NOTATION: 0x800
} as const;

export type NodeFilterCallback = (node: Node) => number;

export type NodeFilterInput = NodeFilterCallback | { acceptNode(node: Node): number };

export type FilterVerdict = "accept" | "skip" | "reject";

/**
 * Applies `whatToShow` and the user filter to a node, with the re-entrancy
 * guard a TreeWalker or NodeIterator needs: a filter that calls back into
 * the same traversal object gets an InvalidStateError.
 *
 * https://dom.spec.whatwg.org/#concept-node-filter
 */
export class FilterRunner {
    private active = false;

    constructor(
        public readonly whatToShow: number,
        public readonly filter: NodeFilterInput | null
    ) {}

    public verify(node: Node): FilterVerdict {
        if (this.active) {
            throw new InvalidStateError("A node filter is already running for this traversal.");
        }

        // Kinds outside whatToShow are passed over, but their children are still visited.
        const bit = 1 << (node.nodeType - 1);
        if ((this.whatToShow & bit) === 0) {
            return "skip";
        }

        if (this.filter === null) {
            return "accept";
        }

        this.active = true;
        let code: number;
        try {
            code = typeof this.filter === "function"
                ? this.filter(node)
                : this.filter.acceptNode(node);
        } finally {
            this.active = false;
        }

        switch (code) {
            case NodeFilter.FILTER_ACCEPT:
                return "accept";
            case NodeFilter.FILTER_SKIP:
                return "skip";
            default:
                return "reject";
        }
    }
}
