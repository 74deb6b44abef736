import type { Node } from "../dom/Node.js";
import { domAccessor } from "../dom/NodeAccessor.js";
import { ChildrenWalker } from "../traversal/Walker.js";

const children = new ChildrenWalker<Node>(domAccessor);

/**
 * Structural equality: same kind, same identifying fields (see each kind's
 * `hasSameValue`), and pairwise-equal children. Identity is sufficient but
 * never necessary.
 *
 * https://dom.spec.whatwg.org/#concept-node-equals
 */
export function isEqualNode(a: Node, b: Node): boolean {
    if (a === b) {
        return true;
    }
    if (a.nodeType !== b.nodeType) {
        return false;
    }
    if (!a.hasSameValue(b)) {
        return false;
    }
    return haveEqualChildren(a, b);
}

function haveEqualChildren(a: Node, b: Node): boolean {
    let left = children.next(a, null);
    let right = children.next(b, null);

    while (left !== null && right !== null) {
        if (!isEqualNode(left, right)) {
            return false;
        }
        left = children.next(a, left);
        right = children.next(b, right);
    }

    // Equal only if both ran out together.
    return left === null && right === null;
}
