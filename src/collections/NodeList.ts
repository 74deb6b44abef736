import type { Node } from "../dom/Node.js";
import { domAccessor } from "../dom/NodeAccessor.js";
import { ChildrenWalker } from "../traversal/Walker.js";
import { SequentialMapIterator } from "./SequentialMapIterator.js";

const children = new ChildrenWalker<Node>(domAccessor);

/** Live view of a node's children; every read walks the current child list. */
export class NodeList implements Iterable<Node> {
    constructor(private readonly parent: Node) {}

    public get length(): number {
        let count = 0;
        let node = children.next(this.parent, null);
        while (node !== null) {
            count++;
            node = children.next(this.parent, node);
        }
        return count;
    }

    public item(index: number): Node | null {
        if (!Number.isInteger(index) || index < 0) {
            return null;
        }
        let position = 0;
        let node = children.next(this.parent, null);
        while (node !== null) {
            if (position === index) {
                return node;
            }
            position++;
            node = children.next(this.parent, node);
        }
        return null;
    }

    public forEach(callback: (node: Node, index: number, list: NodeList) => void): void {
        let index = 0;
        for (const node of this) {
            callback(node, index++, this);
        }
    }

    public values(): SequentialMapIterator<Node> {
        return new SequentialMapIterator(this);
    }

    public *keys(): IterableIterator<number> {
        let index = 0;
        for (const _node of this.values()) {
            yield index++;
        }
    }

    public *entries(): IterableIterator<[number, Node]> {
        let index = 0;
        for (const node of this.values()) {
            yield [index++, node];
        }
    }

    [Symbol.iterator](): SequentialMapIterator<Node> {
        return this.values();
    }
}
