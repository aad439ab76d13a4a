/**
 * Graph node view of a provider element, as seen by the scheduler and by
 * other elements. Kept non-generic so elements of different value types
 * can link to each other.
 */
export interface ElementNode {
  readonly label: string;
  readonly depth: number;
  readonly isDisposed: boolean;
  readonly isDirty: boolean;
  /** Listened to, or depended upon. */
  isInUse(): boolean;
  canAutoDispose(): boolean;
  /** Rebuild if dirty. */
  flush(): void;
  markDirty(): void;
  /** Keep this element alive on behalf of `node` without rebuilding it on changes. */
  mountDependent(node: ElementNode): void;
  /** Rebuild `node` on every change of this element. */
  watchDependent(node: ElementNode): void;
  removeDependent(node: ElementNode): void;
  trackDependency(node: ElementNode): void;
  dispose(): void;
}

// Shared by every container so cross-container dependencies settle in one pass.
let depth = 0;
let flushing = false;
const dirty = new Set<ElementNode>();
const candidates = new Set<ElementNode>();
const building: ElementNode[] = [];

/**
 * Run `fn`, deferring rebuilds of dirty elements and auto-disposal until
 * the outermost batch returns.
 */
export function batch<R>(fn: () => R): R {
  depth++;
  try {
    return fn();
  } finally {
    depth--;
    if (depth === 0) flush();
  }
}

export function schedule(node: ElementNode): void {
  dirty.add(node);
  if (depth === 0) flush();
}

export function considerDisposal(node: ElementNode): void {
  candidates.add(node);
  if (depth === 0) flush();
}

export function enterBuild(node: ElementNode): void {
  building.push(node);
}

export function exitBuild(node: ElementNode): void {
  const i = building.lastIndexOf(node);
  if (i >= 0) building.splice(i, 1);
}

/** Labels from the first build of `node` on the stack to the top, closed by `node` again. */
export function buildPath(node: ElementNode): string[] {
  const i = building.indexOf(node);
  const path = (i >= 0 ? building.slice(i) : building).map(n => n.label);
  return [...path, node.label];
}

function shallowest(nodes: Set<ElementNode>): ElementNode | null {
  let best: ElementNode | null = null;
  for (const n of nodes) if (!best || n.depth < best.depth) best = n;
  return best;
}

function flush(): void {
  if (flushing) return;
  flushing = true;
  try {
    while (dirty.size || candidates.size) {
      // Rebuild closest-to-source first so a node sees settled dependencies.
      for (let next = shallowest(dirty); next; next = shallowest(dirty)) {
        dirty.delete(next);
        if (!next.isDisposed && next.isDirty && next.isInUse()) next.flush();
      }
      for (const node of Array.from(candidates)) {
        candidates.delete(node);
        if (node.canAutoDispose()) node.dispose();
      }
    }
  } finally {
    flushing = false;
  }
}
