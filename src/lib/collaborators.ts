/**
 * Interfaces of the collaborators a pool talks to.
 *
 * The pool never holds collateral outside the ledger, never pushes data to an
 * oracle beyond its spawn parameters, and treats the fee burner as a call
 * that reports success or failure instead of throwing.
 */

import type { Decimal } from "decimal.js";

/** Fungible-unit balances the pool debits and credits. */
export interface TokenLedger {
  balanceOf(account: string): Decimal;
  /** Throws when `from` cannot cover `amount`. */
  transfer(from: string, to: string, amount: Decimal): void;
}

/** Parameters a pool passes when it spawns a resolution oracle. */
export interface ExternalSourceRequest {
  requestor: string;
  oracleCount: number;
  reward: Decimal;
  fixedFee: Decimal;
  creator: string;
  endTime: number;
  optionCount: number;
  metadataURI: string;
}

export interface ExternalSourceInfo extends ExternalSourceRequest {
  address: string;
  startTime: number;
  rewardPerOracle: Decimal;
}

/** Read-only views of a spawned oracle, plus the escrow refund. */
export interface ExternalSource {
  readonly address: string;
  winnerOption(): number;
  winnerFinalized(): boolean;
  timeExtended(): number;
  getExternalSource(): ExternalSourceInfo;
  /** Return the unspent reward escrow to the requestor; yields the amount moved. */
  refund(): Decimal;
}

/**
 * Spawning is two-phase so a caller can back out: `createExternalSource`
 * builds the oracle at a reserved address, and it is only registered and
 * announced once the caller calls `launch`. `discard` drops an unlaunched one.
 */
export interface OracleFactory {
  /** The requestor funds `reward` afterwards by transferring it to `address`. */
  createExternalSource(request: ExternalSourceRequest): ExternalSource;
  launch(address: string): void;
  discard(address: string): void;
}

export type SwapResult =
  | { ok: true; amountBurned: Decimal }
  | { ok: false; reason: string };

/**
 * Disposes of the platform's fee share. On failure it must leave balances untouched.
 */
export interface FeeBurner {
  swapAndBurn(from: string, amount: Decimal): SwapResult;
}
