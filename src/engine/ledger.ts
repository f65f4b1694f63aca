import type { Asset, Owner } from "./types.js";

/**
 * Custody collaborator. The engine computes every amount; a ledger only
 * moves balances it already holds.
 *
 * Implementations throw (preferably a LedgerError) to reject a movement.
 * `runAtomic` must apply all movements made inside `work` or none of them.
 */
export interface Ledger {
  transfer(asset: Asset, from: Owner, to: Owner, amount: bigint): void;
  /** Moves `amount` out of the book's custody account into the fee account `to`. */
  transferFee(asset: Asset, to: Owner, amount: bigint): void;
  runAtomic<T>(work: () => T): T;
}

export type LedgerErrorCode = "INSUFFICIENT_BALANCE" | "INVALID_AMOUNT";

export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "LedgerError";
  }
}

export interface LedgerEntry {
  kind: "transfer" | "fee";
  asset: Asset;
  from: Owner;
  to: Owner;
  amount: bigint;
}

/**
 * Balance map ledger for tests and hosts that keep custody in process.
 * Atomic sections snapshot the balances and journal and restore them when
 * the work throws.
 */
export class InMemoryLedger implements Ledger {
  private balances = new Map<Asset, Map<Owner, bigint>>();
  private journal: LedgerEntry[] = [];
  private depth = 0;

  constructor(readonly custody: Owner) {}

  deposit(asset: Asset, owner: Owner, amount: bigint): void {
    if (amount <= 0n) throw new LedgerError("INVALID_AMOUNT", `Deposit must be positive, got ${amount}`);
    this.credit(asset, owner, amount);
  }

  balanceOf(asset: Asset, owner: Owner): bigint {
    return this.balances.get(asset)?.get(owner) ?? 0n;
  }

  /** Movements applied so far, oldest first. */
  entries(): readonly LedgerEntry[] {
    return this.journal;
  }

  transfer(asset: Asset, from: Owner, to: Owner, amount: bigint): void {
    this.move("transfer", asset, from, to, amount);
  }

  transferFee(asset: Asset, to: Owner, amount: bigint): void {
    this.move("fee", asset, this.custody, to, amount);
  }

  runAtomic<T>(work: () => T): T {
    if (this.depth > 0) {
      return this.nested(work);
    }

    const balances = new Map([...this.balances].map(([asset, owners]) => [asset, new Map(owners)] as const));
    const journalLength = this.journal.length;
    this.depth++;
    try {
      return work();
    } catch (err) {
      this.balances = balances;
      this.journal = this.journal.slice(0, journalLength);
      throw err;
    } finally {
      this.depth--;
    }
  }

  // ── Internal ─────────────────────────────────────────────────

  private nested<T>(work: () => T): T {
    this.depth++;
    try {
      return work();
    } finally {
      this.depth--;
    }
  }

  private move(kind: LedgerEntry["kind"], asset: Asset, from: Owner, to: Owner, amount: bigint): void {
    if (amount < 0n) throw new LedgerError("INVALID_AMOUNT", `Negative ${kind} amount ${amount}`);
    const available = this.balanceOf(asset, from);
    if (available < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${available} ${asset}, needs ${amount}`,
      );
    }
    this.credit(asset, from, -amount);
    this.credit(asset, to, amount);
    this.journal.push({ kind, asset, from, to, amount });
  }

  private credit(asset: Asset, owner: Owner, amount: bigint): void {
    let owners = this.balances.get(asset);
    if (!owners) {
      owners = new Map();
      this.balances.set(asset, owners);
    }
    owners.set(owner, (owners.get(owner) ?? 0n) + amount);
  }
}
