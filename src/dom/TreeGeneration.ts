let treeGeneration = 0;

/** Bumped on every child-list or attribute change anywhere in any graph. */
export function bumpTreeGeneration(): void {
    treeGeneration++;
}

export function currentTreeGeneration(): number {
    return treeGeneration;
}
