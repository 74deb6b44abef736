import { InvalidCharacterError } from "../errors/DomErrors.js";

// Loose form of the XML Name production: no whitespace, quotes or markup delimiters.
const NAME_PATTERN = /^[^\s"'<>/=]+$/;

export function assertValidName(name: string): void {
    if (!NAME_PATTERN.test(name)) {
        throw new InvalidCharacterError(`'${name}' is not a valid name.`);
    }
}

export function splitQualifiedName(qualifiedName: string): { prefix: string | null; localName: string } {
    assertValidName(qualifiedName);
    const colon = qualifiedName.indexOf(":");
    if (colon === -1) {
        return { prefix: null, localName: qualifiedName };
    }
    const prefix = qualifiedName.slice(0, colon);
    const localName = qualifiedName.slice(colon + 1);
    if (prefix.length === 0 || localName.length === 0 || localName.includes(":")) {
        throw new InvalidCharacterError(`'${qualifiedName}' is not a valid qualified name.`);
    }
    return { prefix, localName };
}
