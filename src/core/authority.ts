/**
 * 管理者权限
 * 通过身份比较判断调用者是否具备管理能力，由外部注入 RoundManager
 */

import { logger } from '../utils/logger.js';
import { InvalidParameterError } from './errors.js';
import type { AuthorityPolicy } from '../types/index.js';

export class SingleAuthority implements AuthorityPolicy {
  private authority: string;

  constructor(authority: string) {
    this.authority = SingleAuthority.validate(authority);
  }

  isAuthority(caller: string): boolean {
    return caller === this.authority;
  }

  currentAuthority(): string {
    return this.authority;
  }

  transferTo(newAuthority: string): void {
    const previous = this.authority;
    this.authority = SingleAuthority.validate(newAuthority);
    logger.info('Authority transferred', { previous, authority: this.authority });
  }

  private static validate(identity: string): string {
    const trimmed = identity.trim();
    if (trimmed.length === 0) {
      throw new InvalidParameterError('authority', identity);
    }
    return trimmed;
  }
}
