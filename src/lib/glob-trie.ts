import { TrieInvariantError } from '../errors/app-error.js';

// Reserved child key for `*`. Never produced by an ASCII pattern character
// because patterns are printable URL characters.
const GLOB_KEY = '\u0001';
const GLOB_CHAR = '*';

function foldAscii(char: string, icase: boolean): string {
  if (!icase) return char;
  const code = char.charCodeAt(0);
  return code >= 65 && code <= 90 ? String.fromCharCode(code + 32) : char;
}

/**
 * One character position across every inserted pattern.
 */
export class GlobPathNode {
  // null until the node gets its first child; leaves never allocate a map
  private children: Map<string, GlobPathNode> | null;
  // the only child, when there is exactly one; skips the map lookup
  private oneShot: GlobPathNode | null = null;
  // true when some pattern ends here, even if longer patterns continue on
  private canMatch = false;
  private isGlob = false;
  private hasGlobChild = false;
  private key = '';

  constructor(
    readonly icase: boolean,
    withChildren = true
  ) {
    this.children = withChildren ? new Map() : null;
  }

  addPath(pattern: string): void {
    if (this.children === null) {
      throw new TrieInvariantError(
        'addPath called on a node without a child table'
      );
    }

    let current: GlobPathNode = this;
    let previousWasGlob = false;

    for (const raw of pattern) {
      const part = foldAscii(raw, this.icase);
      const isGlob = part === GLOB_CHAR;
      // `**` is the same run as `*`
      if (isGlob && previousWasGlob) continue;
      previousWasGlob = isGlob;

      const key = isGlob ? GLOB_KEY : part;
      const parent: GlobPathNode = current;
      current = parent.childFor(key);
      if (isGlob) {
        parent.hasGlobChild = true;
        current.isGlob = true;
      }
    }

    current.canMatch = true;
  }

  checkPath(candidate: string, start = 0): boolean {
    let current: GlobPathNode = this;

    for (let i = start; i < candidate.length; i += 1) {
      const part = foldAscii(candidate.charAt(i), this.icase);

      // a glob matches zero characters too, so try it before advancing
      if (current.hasGlobChild) {
        const glob = current.children?.get(GLOB_KEY);
        if (glob?.globConsume(candidate, i)) return true;
      }

      const oneShot = current.oneShot;
      if (oneShot !== null) {
        if (oneShot.isGlob) return false;
        if (oneShot.key !== part) return false;
        current = oneShot;
        continue;
      }

      if (part === GLOB_KEY) return false;
      const next = current.children?.get(part);
      if (next === undefined) return false;
      current = next;
    }

    if (current.canMatch || current.isGlob) return true;
    // trailing `*` that was never entered still matches the empty rest
    if (current.hasGlobChild) {
      return current.children?.get(GLOB_KEY)?.canMatch === true;
    }
    return false;
  }

  /**
   * Consume a run of characters for this glob node, resuming a normal walk
   * at every position where a follow-on character lines up.
   *
   * Linear for a single `*` with a discriminating suffix; long ambiguous
   * runs against several continuations retry once per position.
   */
  private globConsume(candidate: string, start: number): boolean {
    // nothing after the glob in this pattern
    if (this.canMatch) return true;

    const oneShot = this.oneShot;
    for (let i = start; i < candidate.length; i += 1) {
      const part = foldAscii(candidate.charAt(i), this.icase);

      // single follow-on char: skip everything until it shows up
      if (oneShot !== null && oneShot.key !== part) continue;

      const next = oneShot ?? this.children?.get(part);
      if (next !== undefined && next.checkPath(candidate, i + 1)) {
        return true;
      }
    }

    return false;
  }

  private childFor(key: string): GlobPathNode {
    if (this.children === null) this.children = new Map();

    let child = this.children.get(key);
    if (child === undefined) {
      child = new GlobPathNode(this.icase, false);
      child.key = key;
      this.children.set(key, child);
    }

    this.oneShot = this.children.size === 1 ? child : null;
    return child;
  }
}

export interface GlobTrieOptions {
  caseInsensitive?: boolean;
}

/**
 * Matches ASCII strings against a set of `*` glob patterns.
 *
 * Patterns are added during startup; `freeze()` ends the build phase and
 * later `addPath` calls throw. Lookups never mutate the tree.
 */
export class GlobTrie {
  readonly caseInsensitive: boolean;
  private readonly root: GlobPathNode;
  private frozen = false;
  private count = 0;

  constructor(options: GlobTrieOptions = {}) {
    this.caseInsensitive = options.caseInsensitive ?? false;
    this.root = new GlobPathNode(this.caseInsensitive);
  }

  get size(): number {
    return this.count;
  }

  addPath(pattern: string): this {
    if (this.frozen) {
      throw new TrieInvariantError('Cannot add patterns to a frozen trie');
    }
    this.root.addPath(pattern);
    this.count += 1;
    return this;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  checkPath(candidate: string): boolean {
    if (this.count === 0) return false;
    return this.root.checkPath(candidate);
  }
}
