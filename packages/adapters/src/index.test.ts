import { describe, it, expect } from 'vitest';
import { name } from './index';

describe('adapters package', () => {
  it('exports name', () => {
    expect(name).toBe('@docvault/adapters');
  });
});
