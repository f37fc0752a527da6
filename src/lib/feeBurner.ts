/**
 * In-process swap-and-burn sink for the platform's fee share.
 *
 * Collateral is "swapped" at a fixed rate into burn units and moved to a
 * burn account. Any failure is reported through the result, never thrown.
 */

import { Decimal } from "decimal.js";
import type { FeeBurner, SwapResult, TokenLedger } from "./collaborators";
import { PPT, mulDiv } from "./fixedPoint";

export interface LedgerFeeBurnerOptions {
  burnAccount: string;
  /** Burn units received per 1000 units of collateral */
  swapRatePpt?: number;
  /** Swaps below this size are rejected by the venue */
  minimumSwap?: Decimal;
  enabled?: boolean;
}

export class LedgerFeeBurner implements FeeBurner {
  private readonly ledger: TokenLedger;
  private readonly burnAccount: string;
  private readonly swapRatePpt: number;
  private readonly minimumSwap: Decimal;
  private enabled: boolean;
  private burned = new Decimal(0);

  constructor(ledger: TokenLedger, options: LedgerFeeBurnerOptions) {
    this.ledger = ledger;
    this.burnAccount = options.burnAccount;
    this.swapRatePpt = options.swapRatePpt ?? 1000;
    this.minimumSwap = options.minimumSwap ?? new Decimal(1);
    this.enabled = options.enabled ?? true;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  totalBurned(): Decimal {
    return this.burned;
  }

  swapAndBurn(from: string, amount: Decimal): SwapResult {
    if (!this.enabled) {
      return { ok: false, reason: "swap venue unavailable" };
    }
    if (amount.lt(this.minimumSwap)) {
      return { ok: false, reason: `amount ${amount.toString()} below minimum swap ${this.minimumSwap.toString()}` };
    }
    if (this.ledger.balanceOf(from).lt(amount)) {
      return { ok: false, reason: `${from} cannot cover ${amount.toString()}` };
    }

    this.ledger.transfer(from, this.burnAccount, amount);
    const amountBurned = mulDiv(amount, new Decimal(this.swapRatePpt), PPT);
    this.burned = this.burned.plus(amountBurned);
    return { ok: true, amountBurned };
  }
}
