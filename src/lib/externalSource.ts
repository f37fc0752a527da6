/**
 * In-process resolution oracle.
 *
 * A spawned source holds its reward escrow on the ledger, seats up to
 * `oracleCount` voters, and after its end time either finalizes a strict
 * plurality winner or extends itself by another voting period.
 */

import { Decimal } from "decimal.js";
import type { Clock } from "./clock";
import type {
  ExternalSource,
  ExternalSourceInfo,
  ExternalSourceRequest,
  OracleFactory,
  TokenLedger,
} from "./collaborators";
import { ZERO } from "./fixedPoint";
import type { PoolEvent, PoolLogger } from "./poolLogger";

export class VotingExternalSource implements ExternalSource {
  readonly address: string;

  private readonly ledger: TokenLedger;
  private readonly logger: PoolLogger;
  private readonly clock: Clock;
  private readonly info: ExternalSourceInfo;
  private readonly duration: number;

  private votes = new Map<string, number>();
  private rewarded = new Set<string>();
  private winner = 0;
  private finalized = false;
  private extensions = 0;
  private refunded = false;

  constructor(
    address: string,
    request: ExternalSourceRequest,
    deps: { ledger: TokenLedger; logger: PoolLogger; clock: Clock }
  ) {
    this.address = address;
    this.ledger = deps.ledger;
    this.logger = deps.logger;
    this.clock = deps.clock;

    const startTime = this.clock.now();
    this.duration = Math.max(1, request.endTime - startTime);
    this.info = {
      ...request,
      address,
      startTime,
      rewardPerOracle: request.oracleCount > 0 ? request.reward.divToInt(request.oracleCount) : ZERO,
    };

  }

  /** Publish the launch record; called once by the factory on launch. */
  announce(): void {
    const { info } = this;
    this.emit({
      type: "EXTERNAL_SOURCE_LAUNCHED",
      data: {
        noOfOracles: info.oracleCount,
        rewardPerOracle: info.rewardPerOracle,
        fixedFee: info.fixedFee,
        totalReward: info.reward,
        startTime: info.startTime,
        endTime: info.endTime,
        numberOfOptions: info.optionCount,
        externalSourceURI: info.metadataURI,
        creator: info.creator,
      },
    });
  }

  // -------------------------------------------------------------------------
  // Views
  // -------------------------------------------------------------------------

  winnerOption(): number {
    return this.winner;
  }

  winnerFinalized(): boolean {
    return this.finalized;
  }

  timeExtended(): number {
    return this.extensions;
  }

  getExternalSource(): ExternalSourceInfo {
    return { ...this.info };
  }

  voteOf(voter: string): number | undefined {
    return this.votes.get(voter);
  }

  // -------------------------------------------------------------------------
  // Oracle actions
  // -------------------------------------------------------------------------

  vote(voter: string, option: number): void {
    const now = this.clock.now();
    if (this.finalized) {
      throw new Error("Oracle already finalized");
    }
    if (now >= this.info.endTime) {
      throw new Error("Voting period has ended");
    }
    if (!Number.isInteger(option) || option < 1 || option > this.info.optionCount) {
      throw new Error(`Option ${option} is outside 1..${this.info.optionCount}`);
    }
    if (this.votes.has(voter)) {
      throw new Error(`${voter} has already voted`);
    }
    if (this.votes.size >= this.info.oracleCount) {
      throw new Error("All oracle seats are taken");
    }
    this.votes.set(voter, option);
    this.emit({ type: "VOTE_CAST", data: { voter, option } });
  }

  /**
   * Tally once voting has ended. A strict plurality finalizes the source;
   * a tie or an empty ballot extends voting by another period.
   */
  calculateWinner(caller: string): number {
    const now = this.clock.now();
    if (this.finalized) return this.winner;
    if (now < this.info.endTime) {
      throw new Error("Voting is still open");
    }

    const tally = new Array<number>(this.info.optionCount + 1).fill(0);
    for (const option of this.votes.values()) tally[option]++;

    let best = 0;
    let bestCount = 0;
    let tied = false;
    for (let option = 1; option <= this.info.optionCount; option++) {
      if (tally[option] > bestCount) {
        best = option;
        bestCount = tally[option];
        tied = false;
      } else if (tally[option] === bestCount && bestCount > 0) {
        tied = true;
      }
    }

    if (bestCount === 0 || tied) {
      const oldEndTime = this.info.endTime;
      this.info.endTime = now + this.duration;
      this.extensions++;
      this.votes.clear();
      this.emit({ type: "TIME_EXTENDED", data: { oldEndTime, newEndTime: this.info.endTime } });
      return 0;
    }

    this.winner = best;
    this.finalized = true;
    this.emit({ type: "WINNER_CALCULATED", data: { caller, option: best } });
    return best;
  }

  claimReward(voter: string): Decimal {
    if (!this.finalized) {
      throw new Error("Oracle has not finalized");
    }
    if (this.votes.get(voter) !== this.winner) {
      throw new Error(`${voter} did not vote for the winning option`);
    }
    if (this.rewarded.has(voter)) {
      throw new Error(`${voter} already claimed`);
    }
    let winningVoters = 0;
    for (const option of this.votes.values()) if (option === this.winner) winningVoters++;

    const reward = this.info.reward.divToInt(winningVoters);
    this.rewarded.add(voter);
    this.ledger.transfer(this.address, voter, reward);
    this.emit({ type: "REWARD_CLAIMED", data: { claimer: voter, reward } });
    return reward;
  }

  refund(): Decimal {
    if (this.finalized) {
      throw new Error("Finalized oracles pay their voters instead of refunding");
    }
    if (this.refunded) return ZERO;
    const amount = this.ledger.balanceOf(this.address);
    this.refunded = true;
    if (amount.gt(0)) {
      this.ledger.transfer(this.address, this.info.requestor, amount);
    }
    this.emit({ type: "REFUND_CLAIMED", data: { claimer: this.info.requestor, refundAmount: amount } });
    return amount;
  }

  private emit(event: PoolEvent): void {
    this.logger.record(this.address, this.clock.now(), [event]);
  }
}

export class VotingExternalSourceFactory implements OracleFactory {
  private readonly deps: { ledger: TokenLedger; logger: PoolLogger; clock: Clock };
  private sources = new Map<string, VotingExternalSource>();
  private pending = new Map<string, VotingExternalSource>();

  constructor(deps: { ledger: TokenLedger; logger: PoolLogger; clock: Clock }) {
    this.deps = deps;
  }

  createExternalSource(request: ExternalSourceRequest): VotingExternalSource {
    const index = this.sources.size + this.pending.size + 1;
    const address = `oracle-${index.toString().padStart(4, "0")}`;
    const source = new VotingExternalSource(address, request, this.deps);
    this.pending.set(address, source);
    return source;
  }

  launch(address: string): void {
    const source = this.pending.get(address);
    if (!source) {
      throw new Error(`No pending oracle at ${address}`);
    }
    this.pending.delete(address);
    this.sources.set(address, source);
    source.announce();
  }

  discard(address: string): void {
    this.pending.delete(address);
  }

  getSource(address: string): VotingExternalSource | undefined {
    return this.sources.get(address);
  }

  listSources(): VotingExternalSource[] {
    return Array.from(this.sources.values());
  }
}
