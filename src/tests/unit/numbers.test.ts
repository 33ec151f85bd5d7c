import { describe, it, expect } from 'vitest';
import { toFixed2 } from '../../utils/numbers.js';

describe('toFixed2', () => {
  it('rounds exact ties to the even hundredth', () => {
    expect(toFixed2(20.125)).toBe('20.12');
    expect(toFixed2(20.375)).toBe('20.38');
    expect(toFixed2(0.625)).toBe('0.62');
    expect(toFixed2(-0.125)).toBe('-0.12');
  });

  it('rounds other values to the nearest hundredth', () => {
    expect(toFixed2(9.21)).toBe('9.21');
    expect(toFixed2(2.675)).toBe('2.67');
    expect(toFixed2(-3.456)).toBe('-3.46');
    expect(toFixed2(51.5)).toBe('51.50');
    expect(toFixed2(0.25)).toBe('0.25');
  });
});
