import { describe, it, expect } from 'vitest';

import { EMPTY_CHAT_NAME, SELF_LABEL, conversationName } from '../services/naming.js';

describe('conversationName', () => {
  it('should return the display name verbatim when one is set', () => {
    const name = conversationName({
      displayName: 'Family 🏡',
      participants: { a: 'Alice', b: 'Bob' },
    });
    expect(name).toBe('Family 🏡');
  });

  it('should return a whitespace-only display name verbatim', () => {
    const name = conversationName({ displayName: '   ', participants: { a: 'Alice' } });
    expect(name).toBe('   ');
  });

  it('should build the name from participants when the display name is empty', () => {
    expect(conversationName({ displayName: '', participants: { a: 'Alice' } })).toBe('Alice');
  });

  it('should name a one-to-one chat after the other participant', () => {
    const name = conversationName({
      displayName: null,
      participants: { a: 'Alice', me: SELF_LABEL },
    });
    expect(name).toBe('Alice');
  });

  it('should join two or three participants with commas', () => {
    expect(conversationName({
      displayName: null,
      participants: { a: 'Alice', b: 'Bob' },
    })).toBe('Alice, Bob');

    expect(conversationName({
      displayName: null,
      participants: { a: 'Alice', b: 'Bob', c: 'Carol' },
    })).toBe('Alice, Bob, Carol');
  });

  it('should summarise groups larger than three', () => {
    const name = conversationName({
      displayName: null,
      participants: { 1: 'Alice', 2: 'Bob', 3: 'Carol', 4: 'Dave' },
    });
    expect(name).toBe('Alice, Bob, Carol ... (4 people)');
  });

  it('should not count the self label towards the group size', () => {
    const name = conversationName({
      displayName: null,
      participants: { me: SELF_LABEL, a: 'Alice', b: 'Bob', c: 'Carol', d: 'Dave', e: 'Erin' },
    });
    expect(name).toBe('Alice, Bob, Carol ... (5 people)');
  });

  it('should remove only one self label', () => {
    const name = conversationName({
      displayName: null,
      participants: { me: SELF_LABEL, a: 'Alice', other: 'Me', b: 'Bob', c: 'Carol' },
    });
    expect(name).toBe('Alice, Me, Bob ... (4 people)');
  });

  it('should fall back to "Empty Chat" when only the owner is left', () => {
    expect(conversationName({ displayName: null, participants: { 1: 'Me' } })).toBe(EMPTY_CHAT_NAME);
    expect(conversationName({ displayName: null, participants: {} })).toBe('Empty Chat');
  });
});
