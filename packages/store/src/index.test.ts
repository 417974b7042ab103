import { describe, it, expect } from 'vitest';
import { name } from './index';

describe('store package', () => {
  it('exports name', () => {
    expect(name).toBe('@docvault/store');
  });
});
