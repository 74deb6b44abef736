import type { Node } from "./Node.js";
import type { Element } from "./Element.js";

/** Numeric node kinds, as exposed by `Node.nodeType`. */
export enum NodeType {
    ELEMENT_NODE = 1,
    ATTRIBUTE_NODE = 2,
    TEXT_NODE = 3,
    CDATA_SECTION_NODE = 4,
    ENTITY_REFERENCE_NODE = 5,
    ENTITY_NODE = 6,
    PROCESSING_INSTRUCTION_NODE = 7,
    COMMENT_NODE = 8,
    DOCUMENT_NODE = 9,
    DOCUMENT_TYPE_NODE = 10,
    DOCUMENT_FRAGMENT_NODE = 11,
    NOTATION_NODE = 12
}

export const HTML_NAMESPACE = "http://www.w3.org/1999/xhtml";

export function isElement(node: Node | null): node is Element {
    return node !== null && node.nodeType === NodeType.ELEMENT_NODE;
}
