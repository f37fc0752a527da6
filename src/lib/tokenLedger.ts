/**
 * In-process fungible token ledger.
 */

import { Decimal } from "decimal.js";
import type { TokenLedger } from "./collaborators";
import { ZERO } from "./fixedPoint";

export interface TransferRecord {
  from: string;
  to: string;
  amount: Decimal;
}

export type TransferHook = (record: TransferRecord) => void;

export class InMemoryTokenLedger implements TokenLedger {
  private balances = new Map<string, Decimal>();
  private hooks: TransferHook[] = [];
  private history: TransferRecord[] = [];

  balanceOf(account: string): Decimal {
    return this.balances.get(account) ?? ZERO;
  }

  mint(account: string, amount: number | string | Decimal): void {
    const amountD = new Decimal(amount);
    if (amountD.lt(0)) {
      throw new Error("Mint amount must be non-negative");
    }
    this.balances.set(account, this.balanceOf(account).plus(amountD));
  }

  transfer(from: string, to: string, amount: Decimal): void {
    if (amount.lt(0)) {
      throw new Error("Transfer amount must be non-negative");
    }
    const fromBalance = this.balanceOf(from);
    if (fromBalance.lt(amount)) {
      throw new Error(
        `Insufficient balance: ${from} has ${fromBalance.toString()}, needs ${amount.toString()}`
      );
    }
    this.balances.set(from, fromBalance.minus(amount));
    this.balances.set(to, this.balanceOf(to).plus(amount));

    const record: TransferRecord = { from, to, amount };
    this.history.push(record);
    for (const hook of this.hooks) hook(record);
  }

  /** Called after every completed transfer. */
  onTransfer(hook: TransferHook): () => void {
    this.hooks.push(hook);
    return () => {
      this.hooks = this.hooks.filter(h => h !== hook);
    };
  }

  getHistory(): readonly TransferRecord[] {
    return this.history;
  }

  totalSupply(): Decimal {
    let total = ZERO;
    for (const balance of this.balances.values()) total = total.plus(balance);
    return total;
  }
}
