import { describe, it, expect } from 'vitest';
import {
  createLineLocator,
  isLineLocationStrategy,
  locateLine,
} from '../src/extraction/LineLocator.js';

const lines = ['fn main() {', '    let mut x = 5;', '    let y = x + 1;', '}'];

describe('locateLine', () => {
  it('should match a trimmed line exactly', () => {
    expect(locateLine(lines, 'let y = x + 1;')).toBe(3);
  });

  it('should fall back to containment', () => {
    expect(locateLine(lines, 'mut x')).toBe(2);
  });

  it('should fall back to a short prefix', () => {
    expect(locateLine(lines, 'let y = x + 100000')).toBe(3);
  });

  it('should only search for the first line of multi-line text', () => {
    expect(locateLine(lines, 'fn main() {\n    let mut x = 5;\n}')).toBe(1);
  });

  it('should resolve repeated text to its first occurrence', () => {
    expect(locateLine(['let a = 1;', 'let a = 1;'], 'let a = 1;')).toBe(1);
  });

  it('should return line 1 when nothing matches', () => {
    expect(locateLine(lines, 'nothing here')).toBe(1);
    expect(locateLine(lines, '   ')).toBe(1);
  });
});

describe('createLineLocator', () => {
  it('should create the requested strategy', () => {
    expect(createLineLocator('span', lines).strategy).toBe('span');
    expect(createLineLocator('text', lines).strategy).toBe('text');
  });

  it('should validate strategy names', () => {
    expect(isLineLocationStrategy('text')).toBe(true);
    expect(isLineLocationStrategy('column')).toBe(false);
  });
});
