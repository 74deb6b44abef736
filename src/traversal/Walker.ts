import { NodeAccessor } from "../dom/NodeAccessor.js";
import { TraversalError } from "../errors/DomErrors.js";
import { metrics } from "../utils/MetricsCollector.js";
import { createLogger } from "../utils/StructuredLogger.js";

const logger = createLogger("Walker");

export type WalkerPolicy = "depthFirst" | "children" | "none";

export type WalkStep<N> =
    | { status: "node"; node: N }
    | { status: "exhausted" }
    | { status: "failed"; error: TraversalError };

/**
 * Stateless step function over a tree it does not own. The cursor
 * (root, current) lives with the caller: pass `null` to start, then feed
 * back whatever the previous call returned. A `null` result ends that
 * cursor; passing `null` again restarts it.
 *
 * If the tree changes between calls, the step reads the links as they are
 * now. A `current` that is no longer a descendant of `root` (it, or one of
 * its ancestors, was removed or moved out) ends the walk, so a cursor never
 * yields a node outside `root`.
 */
abstract class BaseWalker<N> {
    abstract readonly policy: WalkerPolicy;

    constructor(protected readonly accessor: NodeAccessor<N>) {}

    public next(root: N, current: N | null): N | null {
        metrics.inc("walker_steps", { policy: this.policy });
        try {
            return this.step(root, current);
        } catch (error) {
            if (error instanceof TraversalError) throw error;
            throw new TraversalError(
                "accessor_failed",
                `Node lookup failed during a ${this.policy} step: ${error instanceof Error ? error.message : String(error)}`,
                { cause: error }
            );
        }
    }

    /**
     * Same step as `next`, with lookup failures reported as a `failed`
     * outcome instead of thrown, so they cannot be mistaken for the end of
     * the walk.
     */
    public tryNext(root: N, current: N | null): WalkStep<N> {
        try {
            const node = this.next(root, current);
            return node === null ? { status: "exhausted" } : { status: "node", node };
        } catch (error) {
            if (!(error instanceof TraversalError)) throw error;
            logger.warn("Traversal step failed", { policy: this.policy, reason: error.reason, error: error.message });
            metrics.inc("walker_failures", { policy: this.policy });
            return { status: "failed", error };
        }
    }

    protected abstract step(root: N, current: N | null): N | null;

    protected isDescendant(root: N, node: N): boolean {
        let ancestor = this.accessor.parentOf(node);
        while (ancestor !== null) {
            if (ancestor === root) return true;
            ancestor = this.accessor.parentOf(ancestor);
        }
        return false;
    }
}

// Preorder depth-first walk, i.e. tree order.
// https://dom.spec.whatwg.org/#concept-tree-order
export class DepthFirstWalker<N> extends BaseWalker<N> {
    readonly policy = "depthFirst";

    protected step(root: N, current: N | null): N | null {
        const nav = this.accessor;
        if (current !== null && current !== root && !this.isDescendant(root, current)) {
            return null;
        }
        let n = current ?? root;

        const child = nav.firstChild(n);
        if (child !== null) {
            return child;
        }

        // root's own siblings are outside the walk.
        if (n === root) {
            return null;
        }

        const sibling = nav.nextSibling(n);
        if (sibling !== null) {
            return sibling;
        }

        // Back to the parent. A node without one ends the walk.
        let parent = nav.parentOf(n);
        if (parent === null) {
            return null;
        }

        while (n !== root && n === nav.lastChild(parent)) {
            n = parent;
            const grandparent = nav.parentOf(n);
            if (grandparent === null) {
                break;
            }
            parent = grandparent;
        }

        if (n === root) {
            return null;
        }

        return nav.nextSibling(n);
    }
}

// Direct children of root only.
export class ChildrenWalker<N> extends BaseWalker<N> {
    readonly policy = "children";

    protected step(root: N, current: N | null): N | null {
        if (current === null) {
            return this.accessor.firstChild(root);
        }
        // root itself, or a node no longer directly under root, ends the walk.
        if (current === root || this.accessor.parentOf(current) !== root) {
            return null;
        }
        return this.accessor.nextSibling(current);
    }
}

export class NoneWalker<N> extends BaseWalker<N> {
    readonly policy = "none";

    protected step(_root: N, _current: N | null): N | null {
        return null;
    }
}

export type Walker<N> = DepthFirstWalker<N> | ChildrenWalker<N> | NoneWalker<N>;

export function createWalker<N>(policy: WalkerPolicy, accessor: NodeAccessor<N>): Walker<N> {
    switch (policy) {
        case "depthFirst":
            return new DepthFirstWalker(accessor);
        case "children":
            return new ChildrenWalker(accessor);
        case "none":
            return new NoneWalker(accessor);
        default: {
            const unknownPolicy: never = policy;
            throw new Error(`Unknown walker policy: ${String(unknownPolicy)}`);
        }
    }
}

/**
 * Runs a cursor to exhaustion and collects what it visits. Mostly useful for
 * tests and debugging; collections step one node at a time instead.
 */
export function collectWalk<N>(walker: Walker<N>, root: N, from: N | null = null, limit?: number): N[] {
    const visited: N[] = [];
    let current = walker.next(root, from);
    while (current !== null) {
        if (limit !== undefined && visited.length >= limit) {
            throw new TraversalError("step_limit_exceeded", `Walk exceeded ${limit} steps`);
        }
        visited.push(current);
        current = walker.next(root, current);
    }
    return visited;
}
