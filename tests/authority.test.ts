/**
 * SingleAuthority 单元测试
 */

import { describe, it, expect, vi } from 'vitest';

// Mock logger
vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { SingleAuthority } from '../src/core/authority.js';
import { InvalidParameterError } from '../src/core/errors.js';

describe('SingleAuthority', () => {
  it('只认可当前管理者', () => {
    const authority = new SingleAuthority('operator-a');

    expect(authority.isAuthority('operator-a')).toBe(true);
    expect(authority.isAuthority('operator-b')).toBe(false);
  });

  it('应该去除身份两端空白', () => {
    const authority = new SingleAuthority('  operator-a ');
    expect(authority.currentAuthority()).toBe('operator-a');
  });

  it('移交后旧管理者失效', () => {
    const authority = new SingleAuthority('operator-a');

    authority.transferTo('operator-b');

    expect(authority.isAuthority('operator-a')).toBe(false);
    expect(authority.isAuthority('operator-b')).toBe(true);
  });

  it('应该拒绝空身份', () => {
    expect(() => new SingleAuthority('')).toThrow(InvalidParameterError);

    const authority = new SingleAuthority('operator-a');
    expect(() => authority.transferTo('   ')).toThrow(InvalidParameterError);
    expect(authority.currentAuthority()).toBe('operator-a');
  });
});
