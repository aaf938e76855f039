import { describe, it, expect } from 'vitest';
import { isAffirmative } from '../../src/prompt.js';

describe('isAffirmative', () => {
  it('should accept y and yes in any case, ignoring surrounding spaces', () => {
    expect(isAffirmative('y')).toBe(true);
    expect(isAffirmative('yes')).toBe(true);
    expect(isAffirmative(' YES ')).toBe(true);
    expect(isAffirmative('Y\n')).toBe(true);
  });

  it('should treat everything else as no', () => {
    expect(isAffirmative('')).toBe(false);
    expect(isAffirmative('no')).toBe(false);
    expect(isAffirmative('yep')).toBe(false);
    expect(isAffirmative('yes please')).toBe(false);
  });
});
