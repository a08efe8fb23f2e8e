import { describe, it, expect } from 'vitest';
import { resolveRequestId } from './requestId';

describe('resolveRequestId', () => {
  it('mints a uuid when the header is missing', () => {
    const id = resolveRequestId({});
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('respects an existing x-request-id header', () => {
    expect(resolveRequestId({ 'x-request-id': 'abc-123' })).toBe('abc-123');
  });

  it('takes the first value of a repeated header', () => {
    expect(resolveRequestId({ 'x-request-id': ['first', 'second'] })).toBe('first');
  });

  it('replaces blank or oversized ids', () => {
    expect(resolveRequestId({ 'x-request-id': '   ' })).not.toBe('   ');
    const huge = 'x'.repeat(200);
    expect(resolveRequestId({ 'x-request-id': huge })).not.toBe(huge);
  });
});
