import { describe, expect, test } from 'vitest';
import { addWikiLinks, parseKeywords } from '../wikilinks';

describe('addWikiLinks', () => {
  test('prefers the longest keyword and matches whole words only', () => {
    const text = 'Neural networks and a neural network. The network is deep.';

    expect(addWikiLinks(text, ['network', 'neural network'])).toBe(
      'Neural networks and a [[neural network]]. The [[network]] is deep.',
    );
  });

  test('matches case-insensitively and links the keyword as given', () => {
    expect(addWikiLinks('Python and PYTHON', ['Python'])).toBe('[[Python]] and [[Python]]');
  });

  test('does not touch text inside existing links', () => {
    const text = 'See [[Deep Learning]] and deep learning.';

    expect(addWikiLinks(text, ['deep learning', 'learning'])).toBe(
      'See [[Deep Learning]] and [[deep learning]].',
    );
  });

  test('is idempotent', () => {
    const keywords = ['neural network', 'network', 'attention'];
    const once = addWikiLinks('A neural network with attention. Each network learns.', keywords);

    expect(addWikiLinks(once, keywords)).toBe(once);
  });

  test('escapes regex characters in keywords', () => {
    expect(addWikiLinks('I like C++ a lot', ['C++'])).toBe('I like [[C++]] a lot');
  });

  test('returns the text unchanged without keywords', () => {
    expect(addWikiLinks('nothing to link', [])).toBe('nothing to link');
  });
});

describe('parseKeywords', () => {
  test('trims, drops short terms and case-insensitive duplicates', () => {
    expect(parseKeywords(' AI, machine learning, ML , , Machine Learning, neural nets')).toEqual([
      'machine learning',
      'neural nets',
    ]);
  });

  test('keeps three-character terms', () => {
    expect(parseKeywords('NLP, GPU')).toEqual(['NLP', 'GPU']);
  });
});
