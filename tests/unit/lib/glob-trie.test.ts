import { describe, expect, it } from 'vitest';

import { TrieInvariantError } from '../../../src/errors/app-error.js';
import { GlobPathNode, GlobTrie } from '../../../src/lib/glob-trie.js';

function trieOf(patterns: string[], caseInsensitive = false): GlobTrie {
  const trie = new GlobTrie({ caseInsensitive });
  for (const pattern of patterns) trie.addPath(pattern);
  return trie.freeze();
}

describe('GlobTrie', () => {
  it('matches exact patterns only', () => {
    const trie = trieOf(['example.com']);

    expect(trie.checkPath('example.com')).toBe(true);
    expect(trie.checkPath('example.co')).toBe(false);
    expect(trie.checkPath('example.comx')).toBe(false);
  });

  it('matches a pattern that is a prefix of another', () => {
    const trie = trieOf(['a', 'ab', 'abc', 'abd']);

    expect(trie.checkPath('a')).toBe(true);
    expect(trie.checkPath('ab')).toBe(true);
    expect(trie.checkPath('abd')).toBe(true);
    expect(trie.checkPath('abe')).toBe(false);
  });

  it('matches subdomains with a leading wildcard', () => {
    const trie = trieOf(['*.example.com'], true);

    expect(trie.checkPath('img.example.com')).toBe(true);
    expect(trie.checkPath('a.b.example.com')).toBe(true);
    expect(trie.checkPath('IMG.EXAMPLE.COM')).toBe(true);
    expect(trie.checkPath('example.com')).toBe(false);
    expect(trie.checkPath('img.example.com.evil.org')).toBe(false);
  });

  it('lets a trailing wildcard match the empty rest', () => {
    const trie = trieOf(['foo*']);

    expect(trie.checkPath('foo')).toBe(true);
    expect(trie.checkPath('foobar')).toBe(true);
    expect(trie.checkPath('fo')).toBe(false);
  });

  it('lets a wildcard in the middle match zero or more characters', () => {
    const trie = trieOf(['a*b']);

    expect(trie.checkPath('ab')).toBe(true);
    expect(trie.checkPath('axxb')).toBe(true);
    expect(trie.checkPath('axxc')).toBe(false);
    expect(trie.checkPath('abx')).toBe(false);
  });

  it('treats a run of wildcards as one', () => {
    const trie = trieOf(['a**b']);

    expect(trie.checkPath('ab')).toBe(true);
    expect(trie.checkPath('a-b')).toBe(true);
  });

  it('matches everything with a lone wildcard', () => {
    const trie = trieOf(['*']);

    expect(trie.checkPath('')).toBe(true);
    expect(trie.checkPath('anything/at/all')).toBe(true);
  });

  it('tries each continuation after a wildcard', () => {
    const trie = trieOf(['*.jpg', '*.png']);

    expect(trie.checkPath('photo.png')).toBe(true);
    expect(trie.checkPath('photo.v2.jpg')).toBe(true);
    expect(trie.checkPath('photo.gif')).toBe(false);
    expect(trie.checkPath('photo.PNG')).toBe(false);
  });

  it('compares case only when asked to', () => {
    const sensitive = trieOf(['/Images/*']);
    const insensitive = trieOf(['/Images/*'], true);

    expect(sensitive.checkPath('/Images/a')).toBe(true);
    expect(sensitive.checkPath('/images/a')).toBe(false);
    expect(insensitive.checkPath('/images/a')).toBe(true);
  });

  it('never matches when empty', () => {
    const trie = new GlobTrie();

    expect(trie.size).toBe(0);
    expect(trie.checkPath('')).toBe(false);
    expect(trie.checkPath('x')).toBe(false);
  });

  it('never treats the wildcard key as a literal character', () => {
    const trie = trieOf(['a*b', 'ac']);

    expect(trie.checkPath('a\u0001')).toBe(false);
    expect(trie.checkPath('a\u0001b')).toBe(true);
  });

  it('counts added patterns', () => {
    expect(trieOf(['a', 'b*', 'c']).size).toBe(3);
  });

  it('rejects patterns once frozen', () => {
    const trie = trieOf(['a']);

    expect(() => trie.addPath('b')).toThrow(TrieInvariantError);
    expect(trie.checkPath('b')).toBe(false);
  });
});

describe('GlobPathNode', () => {
  it('refuses to build from a node created without children', () => {
    const node = new GlobPathNode(false, false);

    expect(() => node.addPath('x')).toThrow(TrieInvariantError);
  });

  it('resumes matching from an offset', () => {
    const node = new GlobPathNode(false);
    node.addPath('bar');

    expect(node.checkPath('foobar', 3)).toBe(true);
    expect(node.checkPath('foobar', 2)).toBe(false);
  });
});
