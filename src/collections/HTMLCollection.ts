import type { Element } from "../dom/Element.js";
import type { Node } from "../dom/Node.js";
import { domAccessor } from "../dom/NodeAccessor.js";
import { isElement } from "../dom/NodeType.js";
import { currentTreeGeneration } from "../dom/TreeGeneration.js";
import { TraversalConfig } from "../config/TraversalConfig.js";
import { TraversalError } from "../errors/DomErrors.js";
import { Walker, createWalker } from "../traversal/Walker.js";
import { metrics } from "../utils/MetricsCollector.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { Matcher, matchesElement, splitClassNames } from "./Matchers.js";
import { SequentialMapIterator } from "./SequentialMapIterator.js";

const logger = createLogger("HTMLCollection");

interface CursorCache {
    index: number;
    node: Node;
    // Walk steps taken from the start to reach `node`.
    steps: number;
    generation: number;
}

/**
 * Live list of the elements under `root` that satisfy a matcher, in the
 * order the walker visits them. Nothing is stored except a positional
 * cursor, dropped as soon as any tree in the process changes.
 *
 * https://dom.spec.whatwg.org/#htmlcollection
 */
export class HTMLCollection implements Iterable<Element> {
    private cursor: CursorCache | null = null;

    constructor(
        private readonly root: Node | null,
        private readonly walker: Walker<Node>,
        private readonly matcher: Matcher,
        // Document-level collections also consider the root itself.
        private readonly includeRoot: boolean = false
    ) {}

    static byTagName(root: Node | null, tagName: string, includeRoot = false): HTMLCollection {
        return new HTMLCollection(root, createWalker("depthFirst", domAccessor), { kind: "tagName", tag: tagName }, includeRoot);
    }

    static byClassName(root: Node | null, classNames: string, includeRoot = false): HTMLCollection {
        return new HTMLCollection(
            root,
            createWalker("depthFirst", domAccessor),
            { kind: "className", classNames: splitClassNames(classNames) },
            includeRoot
        );
    }

    static byName(root: Node | null, name: string, includeRoot = false): HTMLCollection {
        return new HTMLCollection(root, createWalker("depthFirst", domAccessor), { kind: "name", name }, includeRoot);
    }

    static all(root: Node | null, includeRoot = false): HTMLCollection {
        return new HTMLCollection(root, createWalker("depthFirst", domAccessor), { kind: "all" }, includeRoot);
    }

    static children(root: Node | null): HTMLCollection {
        return new HTMLCollection(root, createWalker("children", domAccessor), { kind: "all" });
    }

    static links(root: Node | null, includeRoot = false): HTMLCollection {
        return new HTMLCollection(root, createWalker("depthFirst", domAccessor), { kind: "links" }, includeRoot);
    }

    static anchors(root: Node | null, includeRoot = false): HTMLCollection {
        return new HTMLCollection(root, createWalker("depthFirst", domAccessor), { kind: "anchors" }, includeRoot);
    }

    static empty(): HTMLCollection {
        return new HTMLCollection(null, createWalker("none", domAccessor), { kind: "none" });
    }

    public get length(): number {
        if (this.root === null) return 0;

        let count = 0;
        let steps = 0;
        let node = this.start(this.root);
        while (node !== null) {
            if (this.matches(node)) {
                count++;
            }
            node = this.advance(this.root, node, ++steps);
        }
        return count;
    }

    public item(index: number): Element | null {
        if (this.root === null || !Number.isInteger(index) || index < 0) return null;

        let position = 0;
        let steps = 0;
        let node: Node | null;

        const cached = this.reusableCursor(index);
        if (cached) {
            position = cached.index;
            steps = cached.steps;
            node = cached.node;
        } else {
            node = this.start(this.root);
        }

        while (node !== null) {
            if (this.matches(node)) {
                if (position === index) {
                    this.rememberCursor(index, node, steps);
                    return node;
                }
                position++;
            }
            node = this.advance(this.root, node, ++steps);
        }
        return null;
    }

    /** First matching element whose `id`, then `name`, equals `name`. */
    public namedItem(name: string): Element | null {
        if (this.root === null || name.length === 0) return null;

        let steps = 0;
        let node = this.start(this.root);
        while (node !== null) {
            if (this.matches(node)) {
                if (node.getAttribute("id") === name || node.getAttribute("name") === name) {
                    return node;
                }
            }
            node = this.advance(this.root, node, ++steps);
        }
        return null;
    }

    [Symbol.iterator](): SequentialMapIterator<Element> {
        return new SequentialMapIterator(this);
    }

    private start(root: Node): Node | null {
        return this.includeRoot ? root : this.walker.next(root, null);
    }

    /** `steps` counts from the start of the walk, so a resumed cursor keeps its count. */
    private advance(root: Node, node: Node, steps: number): Node | null {
        const limit = TraversalConfig.get().maxWalkSteps;
        if (limit !== null && steps > limit) {
            throw new TraversalError("step_limit_exceeded", `Collection walk exceeded ${limit} steps`);
        }
        return this.walker.next(root, node);
    }

    private matches(node: Node | null): node is Element {
        return isElement(node) && matchesElement(this.matcher, node);
    }

    private reusableCursor(index: number): CursorCache | null {
        const cursor = this.cursor;
        if (cursor === null || !TraversalConfig.get().collectionCache) {
            return null;
        }
        if (cursor.generation !== currentTreeGeneration()) {
            logger.debug("Dropping stale collection cursor", {
                matcher: this.matcher.kind,
                cachedIndex: cursor.index,
                cachedGeneration: cursor.generation
            });
            this.cursor = null;
            metrics.inc("collection_cursor", { result: "stale" });
            return null;
        }
        if (index < cursor.index) {
            metrics.inc("collection_cursor", { result: "miss" });
            return null;
        }
        metrics.inc("collection_cursor", { result: "hit" });
        return cursor;
    }

    private rememberCursor(index: number, node: Node, steps: number): void {
        if (!TraversalConfig.get().collectionCache) return;
        this.cursor = { index, node, steps, generation: currentTreeGeneration() };
    }
}
