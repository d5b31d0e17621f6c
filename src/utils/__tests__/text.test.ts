import { describe, it, expect } from 'vitest';
import { truncateChars } from '../text';

describe('truncateChars', () => {
  it('returns short text unchanged', () => {
    expect(truncateChars('ARO 1 bed', 200)).toBe('ARO 1 bed');
  });

  it('counts an emoji as a single character', () => {
    expect(truncateChars('ab🏠cd', 3)).toBe('ab🏠');
    expect(truncateChars('ab🏠cd', 2)).toBe('ab');
  });
});
