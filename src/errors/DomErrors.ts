export type DomErrorName =
    | "HierarchyRequestError"
    | "NotFoundError"
    | "InUseAttributeError"
    | "InvalidCharacterError"
    | "InvalidStateError";

/**
 * Tree mutation failures. `name` carries the DOMException name a browser
 * would report for the same condition.
 */
export class DomError extends Error {
    constructor(
        public readonly name: DomErrorName,
        message: string
    ) {
        super(message);
    }
}

export class HierarchyRequestError extends DomError {
    constructor(message: string) {
        super("HierarchyRequestError", message);
    }
}

export class NotFoundError extends DomError {
    constructor(message: string) {
        super("NotFoundError", message);
    }
}

export class InUseAttributeError extends DomError {
    constructor(message: string) {
        super("InUseAttributeError", message);
    }
}

export class InvalidCharacterError extends DomError {
    constructor(message: string) {
        super("InvalidCharacterError", message);
    }
}

export class InvalidStateError extends DomError {
    constructor(message: string) {
        super("InvalidStateError", message);
    }
}

export type TraversalFailureReason = "accessor_failed" | "step_limit_exceeded";

/**
 * A traversal step could not be computed. Running out of nodes is never
 * reported this way; walkers return null for that.
 */
export class TraversalError extends Error {
    constructor(
        public readonly reason: TraversalFailureReason,
        message?: string,
        options?: { cause?: unknown }
    ) {
        super(message ?? reason, options);
        this.name = "TraversalError";
    }
}
