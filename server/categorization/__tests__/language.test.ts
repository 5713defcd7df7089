import { describe, expect, it } from 'vitest';
import { detectLanguage } from '../language';

describe('detectLanguage', () => {
  it.each([
    ['Python just released version 4.0 with major performance improvements', 'en'],
    ['The cat sat on the mat and looked at this', 'en'],
    ['Привет мир, это тестовая статья', 'ru'],
    ['Le chat est dans la maison avec les enfants', 'fr'],
    ['Der Hund ist nicht mit dem Ball auf der Wiese', 'de'],
    ['El perro está con los niños para jugar', 'es'],
  ])('detects %s as %s', (text, expected) => {
    expect(detectLanguage(text)).toBe(expected);
  });

  it('returns unknown without letters or enough evidence', () => {
    expect(detectLanguage('12345 !!!')).toBe('unknown');
    expect(detectLanguage('Hello')).toBe('unknown');
    expect(detectLanguage('')).toBe('unknown');
  });
});
