import type { Element } from "../dom/Element.js";

/**
 * Element predicates behind the HTMLCollection factories.
 * Tag comparison is ASCII case-insensitive; `*` matches every element.
 */
export type Matcher =
    | { kind: "all" }
    | { kind: "none" }
    | { kind: "tagName"; tag: string }
    | { kind: "className"; classNames: string[] }
    | { kind: "name"; name: string }
    | { kind: "links" }
    | { kind: "anchors" };

export function splitClassNames(value: string): string[] {
    return value.split(/[\t\n\f\r ]+/).filter(Boolean);
}

export function matchesElement(matcher: Matcher, element: Element): boolean {
    switch (matcher.kind) {
        case "all":
            return true;
        case "none":
            return false;
        case "tagName":
            return matcher.tag === "*" || matcher.tag.toLowerCase() === element.tagName.toLowerCase();
        case "className":
            // An empty class list matches nothing.
            return matcher.classNames.length > 0
                && matcher.classNames.every(className => element.hasClass(className));
        case "name":
            return element.getAttribute("name") === matcher.name;
        case "links": {
            // https://html.spec.whatwg.org/#dom-document-links
            const tag = element.localName.toLowerCase();
            return (tag === "a" || tag === "area") && element.hasAttribute("href");
        }
        case "anchors":
            // https://html.spec.whatwg.org/#dom-document-anchors
            return element.localName.toLowerCase() === "a" && element.hasAttribute("name");
        default: {
            const unknown: never = matcher;
            throw new Error(`Unknown matcher: ${JSON.stringify(unknown)}`);
        }
    }
}
