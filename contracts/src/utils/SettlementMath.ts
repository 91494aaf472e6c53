/**
 * SettlementMath.ts - Parimutuel payout calculation
 *
 * Every bet in a market stakes the same tier amount, so:
 *   totalPool       = tierAmount * totalBets
 *   payoutPerWinner = floor(totalPool / winnerCount), or 0 without winners
 *
 * Stakes of unrevealed bets stay in totalPool and go to the revealed winners.
 * The division remainder and, without winners, the whole pool remain in the
 * market's balance.
 */

import { Field, UInt64, Provable } from 'o1js';
import { OUTCOME } from '../types/Constants.js';

export interface SettlementSummary {
  totalPool: UInt64;
  winnerCount: UInt64;
  payoutPerWinner: UInt64;
  /** payoutPerWinner * winnerCount */
  distributable: UInt64;
  /** totalPool - distributable */
  undistributed: UInt64;
}

export class SettlementMath {
  static totalPool(tierAmount: UInt64, totalBets: UInt64): UInt64 {
    return tierAmount.mul(totalBets);
  }

  /**
   * Revealed bets on the resolved side; 0 while the outcome is PENDING
   */
  static winnerCount(resolvedOutcome: Field, yesCount: UInt64, noCount: UInt64): UInt64 {
    const onNo = Provable.if(resolvedOutcome.equals(OUTCOME.NO), noCount, UInt64.zero);
    return Provable.if(resolvedOutcome.equals(OUTCOME.YES), yesCount, onNo);
  }

  static payoutPerWinner(totalPool: UInt64, winnerCount: UInt64): UInt64 {
    const noWinners = winnerCount.equals(UInt64.zero);
    const divisor = Provable.if(noWinners, UInt64.one, winnerCount);
    return Provable.if(noWinners, UInt64.zero, totalPool.div(divisor));
  }

  static summarize(
    tierAmount: UInt64,
    totalBets: UInt64,
    resolvedOutcome: Field,
    yesCount: UInt64,
    noCount: UInt64
  ): SettlementSummary {
    const totalPool = SettlementMath.totalPool(tierAmount, totalBets);
    const winnerCount = SettlementMath.winnerCount(resolvedOutcome, yesCount, noCount);
    const payoutPerWinner = SettlementMath.payoutPerWinner(totalPool, winnerCount);
    const distributable = payoutPerWinner.mul(winnerCount);

    return {
      totalPool,
      winnerCount,
      payoutPerWinner,
      distributable,
      undistributed: totalPool.sub(distributable),
    };
  }
}
