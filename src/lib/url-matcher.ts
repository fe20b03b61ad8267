import { ConfigError } from '../errors/app-error.js';
import { GlobTrie } from './glob-trie.js';

export interface ParsedRule {
  host: string;
  path: string | null;
}

interface PathRuleSet {
  host: GlobTrie;
  paths: GlobTrie;
}

export function parseRule(rule: string): ParsedRule {
  const trimmed = rule.trim();
  if (!trimmed) {
    throw new ConfigError('Empty URL rule');
  }

  const slash = trimmed.indexOf('/');
  const host = slash === -1 ? trimmed : trimmed.slice(0, slash);
  if (!host) {
    throw new ConfigError(`URL rule has no host: ${trimmed}`);
  }

  return {
    host: host.toLowerCase(),
    path: slash === -1 ? null : trimmed.slice(slash),
  };
}

/**
 * Host + path rule list backing the allow and deny lists.
 *
 * A rule is `hostGlob` or `hostGlob/pathGlob`. Hosts compare without case,
 * paths with case. Host-only rules share one trie; rules with a path are
 * grouped per host glob, each group owning its own path trie.
 */
export class URLMatcher {
  private readonly hostOnly = new GlobTrie({ caseInsensitive: true });
  private readonly pathRules = new Map<string, PathRuleSet>();

  constructor(rules: Iterable<string> = []) {
    for (const rule of rules) this.addRule(rule);

    this.hostOnly.freeze();
    for (const set of this.pathRules.values()) {
      set.host.freeze();
      set.paths.freeze();
    }
  }

  get isEmpty(): boolean {
    return this.hostOnly.size === 0 && this.pathRules.size === 0;
  }

  checkURL(url: URL): boolean {
    const hostname = url.hostname;
    if (this.hostOnly.checkPath(hostname)) return true;
    if (this.pathRules.size === 0) return false;

    const path = url.pathname;
    for (const set of this.pathRules.values()) {
      if (set.host.checkPath(hostname) && set.paths.checkPath(path)) {
        return true;
      }
    }
    return false;
  }

  private addRule(rule: string): void {
    const { host, path } = parseRule(rule);
    if (path === null) {
      this.hostOnly.addPath(host);
      return;
    }

    let set = this.pathRules.get(host);
    if (set === undefined) {
      set = {
        host: new GlobTrie({ caseInsensitive: true }).addPath(host),
        paths: new GlobTrie(),
      };
      this.pathRules.set(host, set);
    }
    set.paths.addPath(path);
  }
}
