import { describe, it, expect } from 'vitest';
import { InMemorySurrogateKeyAllocator } from './surrogate-key-allocator.js';
import { customerDefinition, geographyDefinition } from '../testing/fixtures.js';

describe('InMemorySurrogateKeyAllocator', () => {
  it('should issue increasing keys per dimension starting at 1', async () => {
    const allocator = new InMemorySurrogateKeyAllocator();

    expect(await allocator.next(customerDefinition)).toBe(1);
    expect(await allocator.next(customerDefinition)).toBe(2);
    expect(await allocator.next(geographyDefinition)).toBe(1);
  });

  it('should continue above the high-water mark after advancePast', async () => {
    const allocator = new InMemorySurrogateKeyAllocator();
    await allocator.advancePast(customerDefinition, 500);

    expect(await allocator.next(customerDefinition)).toBe(501);
  });

  it('should never lower the counter', async () => {
    const allocator = new InMemorySurrogateKeyAllocator();
    await allocator.advancePast(customerDefinition, 500);
    await allocator.advancePast(customerDefinition, 20);

    expect(allocator.peek(customerDefinition)).toBe(500);
    expect(await allocator.next(customerDefinition)).toBe(501);
  });
});
