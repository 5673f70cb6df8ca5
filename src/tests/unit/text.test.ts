import { extractMentions, truncate } from '../../utils/text';
import { passwordProblems } from '../../utils/password';

describe('truncate', () => {
  it('keeps text of at most 50 characters', () => {
    const text = 'a'.repeat(50);
    expect(truncate(text)).toBe(text);
  });

  it('cuts longer text to 50 characters and marks the cut', () => {
    expect(truncate('b'.repeat(51))).toBe(`${'b'.repeat(50)}...`);
  });
});

describe('extractMentions', () => {
  it('returns each mentioned name once in order of appearance', () => {
    expect(extractMentions('@bob hi @carol_2, also @bob again')).toEqual(['bob', 'carol_2']);
  });

  it('returns nothing without mentions', () => {
    expect(extractMentions('no mentions here, mail me at x @ y')).toEqual([]);
  });
});

describe('passwordProblems', () => {
  it('accepts a long mixed password', () => {
    expect(passwordProblems('S3cure-pass', 'alice')).toEqual([]);
  });

  it('lists every broken rule', () => {
    expect(passwordProblems('1234567')).toEqual([
      'This password is too short. It must contain at least 8 characters.',
      'This password is entirely numeric.',
    ]);
  });

  it('rejects passwords containing the username', () => {
    expect(passwordProblems('xxAlice2024', 'alice')).toEqual(['The password is too similar to the username.']);
  });
});
