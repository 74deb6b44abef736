import type { Node } from "./Node.js";

/**
 * Read-only navigation over a tree the caller owns. Walkers only ever hold
 * the handles returned here; they never keep nodes alive or copy the tree.
 *
 * Lookups are total: "no such node" is `null`. An implementation backed by
 * fallible storage may throw, and `Walker.tryNext` reports that separately
 * from exhaustion.
 */
export interface NodeAccessor<N> {
    firstChild(node: N): N | null;
    lastChild(node: N): N | null;
    nextSibling(node: N): N | null;
    parentOf(node: N): N | null;
}

/** Shape of a node that stores its own links, such as the in-memory graph's `Node`. */
export interface LinkedNode<N extends LinkedNode<N>> {
    readonly parentNode: N | null;
    readonly firstChild: N | null;
    readonly lastChild: N | null;
    readonly nextSibling: N | null;
}

export function linkedNodeAccessor<N extends LinkedNode<N>>(): NodeAccessor<N> {
    return {
        firstChild: node => node.firstChild,
        lastChild: node => node.lastChild,
        nextSibling: node => node.nextSibling,
        parentOf: node => node.parentNode
    };
}

/** Accessor over the in-memory graph in `src/dom`. */
export const domAccessor: NodeAccessor<Node> = linkedNodeAccessor<Node>();
