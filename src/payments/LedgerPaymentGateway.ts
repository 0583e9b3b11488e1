/**
 * 进程内账本付款网关
 * 将一批转账记入收款方账户；任一笔非法则整批拒绝，不产生部分入账
 */

import { logger } from '../utils/logger.js';
import type { PaymentGateway, Transfer } from '../types/index.js';

export class LedgerPaymentGateway implements PaymentGateway {
  private accounts: Map<string, number> = new Map();
  private settled: Transfer[] = [];
  private references: Set<string> = new Set();

  execute(transfers: readonly Transfer[]): void {
    // 先整体校验，再统一入账
    const batchReferences = new Set<string>();
    for (const transfer of transfers) {
      if (!Number.isSafeInteger(transfer.amount) || transfer.amount <= 0) {
        throw new Error(`Transfer ${transfer.reference} has invalid amount ${transfer.amount}`);
      }
      if (transfer.recipient.length === 0) {
        throw new Error(`Transfer ${transfer.reference} has no recipient`);
      }
      if (this.references.has(transfer.reference) || batchReferences.has(transfer.reference)) {
        throw new Error(`Duplicate transfer reference ${transfer.reference}`);
      }
      batchReferences.add(transfer.reference);
    }

    for (const transfer of transfers) {
      const current = this.accounts.get(transfer.recipient) ?? 0;
      this.accounts.set(transfer.recipient, current + transfer.amount);
      this.references.add(transfer.reference);
      this.settled.push({ ...transfer });
    }

    logger.debug(`Settled ${transfers.length} transfers`, {
      total: transfers.reduce((sum, t) => sum + t.amount, 0),
    });
  }

  /**
   * 获取账户累计收款
   */
  getAccountBalance(recipient: string): number {
    return this.accounts.get(recipient) ?? 0;
  }

  /**
   * 获取已入账的转账记录
   */
  getSettledTransfers(): Transfer[] {
    return this.settled.map((transfer) => ({ ...transfer }));
  }
}

export default LedgerPaymentGateway;
