import { describe, expect, it } from 'vitest';
import { InvalidSubmissionError } from '../../errors';
import { resolveSubmission } from '../submission';

describe('resolveSubmission', () => {
  it('resolves plain text with its metadata', () => {
    expect(
      resolveSubmission({ text: 'Some article body', title: '  A title ', author: '', categoriesUser: ['later'] }),
    ).toEqual({
      kind: 'text',
      text: 'Some article body',
      metadata: {
        title: 'A title',
        source: undefined,
        author: undefined,
        language: undefined,
        categoriesUser: ['later'],
      },
    });
  });

  it('resolves a url submission', () => {
    const resolved = resolveSubmission({ url: ' https://example.com/post ' });
    expect(resolved).toMatchObject({ kind: 'url', url: 'https://example.com/post' });
  });

  it('treats text that is only a link as a url', () => {
    expect(resolveSubmission({ text: '  https://example.com/post  ' })).toMatchObject({
      kind: 'url',
      url: 'https://example.com/post',
    });
  });

  it('keeps a link as text when forceText is set', () => {
    expect(resolveSubmission({ text: 'https://example.com/post', forceText: true })).toMatchObject({
      kind: 'text',
      text: 'https://example.com/post',
    });
  });

  it('requires forceText to accept both text and url', () => {
    expect(() => resolveSubmission({ text: 'body', url: 'https://example.com' })).toThrow(InvalidSubmissionError);
    expect(resolveSubmission({ text: 'body', url: 'https://example.com', forceText: true })).toMatchObject({
      kind: 'text',
      text: 'body',
    });
  });

  it('requires text or url', () => {
    expect(() => resolveSubmission({ title: 'Only a title' })).toThrow('Submission needs text or url');
  });

  it('passes whitespace-only text through for the fingerprint step to reject', () => {
    expect(resolveSubmission({ text: '   ' })).toMatchObject({ kind: 'text', text: '   ' });
  });

  it('lists schema issues', () => {
    try {
      resolveSubmission({ text: 42, extra: true });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSubmissionError);
      if (!(error instanceof InvalidSubmissionError)) return;
      expect(error.code).toBe('invalid_submission');
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^text: /);
    }
  });

  it('rejects non-object input', () => {
    expect(() => resolveSubmission('just a string')).toThrow(InvalidSubmissionError);
  });

  it('normalizes the language override', () => {
    expect(resolveSubmission({ text: 'body', language: ' EN ' }).metadata.language).toBe('en');
  });

  it('accepts an author up to 200 characters', () => {
    expect(resolveSubmission({ text: 'body', author: 'a'.repeat(200) }).metadata.author).toHaveLength(200);
    expect(() => resolveSubmission({ text: 'body', author: 'a'.repeat(201) })).toThrow(InvalidSubmissionError);
  });

  it('accepts language codes up to 10 characters', () => {
    expect(resolveSubmission({ text: 'body', language: 'abc-abcdef' }).metadata.language).toBe('abc-abcdef');
    expect(() => resolveSubmission({ text: 'body', language: 'abc-abcdefg' })).toThrow(InvalidSubmissionError);
  });
});
