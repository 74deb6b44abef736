export { Node } from "./dom/Node.js";
export { Document } from "./dom/Document.js";
export { DocumentFragment } from "./dom/DocumentFragment.js";
export { DocumentType } from "./dom/DocumentType.js";
export { Element } from "./dom/Element.js";
export { Attr } from "./dom/Attr.js";
export { CharacterData, Text, Comment, CDATASection, ProcessingInstruction } from "./dom/CharacterData.js";
export { NodeType, HTML_NAMESPACE, isElement } from "./dom/NodeType.js";
export { linkedNodeAccessor, domAccessor } from "./dom/NodeAccessor.js";
export type { NodeAccessor, LinkedNode } from "./dom/NodeAccessor.js";
export { currentTreeGeneration } from "./dom/TreeGeneration.js";

export type { Walker, WalkerPolicy, WalkStep } from "./traversal/Walker.js";
export {
    DepthFirstWalker,
    ChildrenWalker,
    NoneWalker,
    createWalker,
    collectWalk
} from "./traversal/Walker.js";
export { NodeFilter, FilterRunner } from "./traversal/NodeFilter.js";
export type { NodeFilterCallback, NodeFilterInput, FilterVerdict } from "./traversal/NodeFilter.js";
export { TreeWalker } from "./traversal/TreeWalker.js";
export { NodeIterator } from "./traversal/NodeIterator.js";

export { SequentialMapIterator } from "./collections/SequentialMapIterator.js";
export type { IndexedSource } from "./collections/SequentialMapIterator.js";
export { HTMLCollection } from "./collections/HTMLCollection.js";
export { NodeList } from "./collections/NodeList.js";
export { NamedNodeMap } from "./collections/NamedNodeMap.js";
export { matchesElement } from "./collections/Matchers.js";
export type { Matcher } from "./collections/Matchers.js";

export { isEqualNode } from "./equality/NodeEquality.js";

export {
    DomError,
    HierarchyRequestError,
    NotFoundError,
    InUseAttributeError,
    InvalidCharacterError,
    InvalidStateError,
    TraversalError
} from "./errors/DomErrors.js";
export type { DomErrorName, TraversalFailureReason } from "./errors/DomErrors.js";
export { TraversalConfig } from "./config/TraversalConfig.js";
export type { TraversalSettings, LogLevel } from "./config/TraversalConfig.js";
export { createLogger } from "./utils/StructuredLogger.js";
export type { Logger } from "./utils/StructuredLogger.js";
export { metrics, MetricsCollector } from "./utils/MetricsCollector.js";
