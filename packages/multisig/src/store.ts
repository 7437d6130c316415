/**
 * Approval Store
 *
 * Account-scoped state of the Approval Engine. Every account is either
 * `uninitialized` (no ledger) or `active` (one ledger). Ledgers are never
 * shared: checkpoints clone them and restores swap the clones in.
 */

import { getAddress } from "viem";
import { AlreadyInStateError, NotFoundError } from "@tessera/types";
import type { Address, Checkpointable, Hex, Restore } from "@tessera/types";
import type { ApprovalEvent, ApprovalLifecycle, TransactionRecord } from "./types.js";

// =============================================================================
// Ledger
// =============================================================================

interface TransactionEntry {
  readonly target: Address;
  readonly value: bigint;
  readonly data: Hex;
  readonly contentHash: Hex;
  readonly createdAt: string;
  executed: boolean;
}

/**
 * Owners, threshold, transactions and confirmations of one active account.
 */
export class ApprovalLedger {
  private constructor(
    private readonly owners: Address[],
    private readonly members: Set<Address>,
    private thresholdValue: number,
    private readonly transactions: TransactionEntry[],
    private readonly confirmations: Map<number, Set<Address>>,
    private readonly confirmedBy: Map<Address, Set<number>>,
  ) {}

  static create(owners: readonly Address[], threshold: number): ApprovalLedger {
    return new ApprovalLedger([...owners], new Set(owners), threshold, [], new Map(), new Map());
  }

  // ─── Owners ────────────────────────────────────────────────────────────

  get threshold(): number {
    return this.thresholdValue;
  }

  set threshold(value: number) {
    this.thresholdValue = value;
  }

  get ownerList(): readonly Address[] {
    return [...this.owners];
  }

  get ownerCount(): number {
    return this.owners.length;
  }

  isOwner(address: Address): boolean {
    return this.members.has(address);
  }

  addOwner(owner: Address): void {
    this.owners.push(owner);
    this.members.add(owner);
  }

  /**
   * Drop `owner` and withdraw its confirmations from unexecuted
   * transactions. Returns the ids it was withdrawn from.
   */
  removeOwner(owner: Address): number[] {
    this.owners.splice(this.owners.indexOf(owner), 1);
    this.members.delete(owner);

    const withdrawn: number[] = [];
    for (const id of this.confirmedBy.get(owner) ?? []) {
      if (this.transactions[id]?.executed === false) {
        withdrawn.push(id);
      }
    }
    for (const id of withdrawn) {
      this.revoke(id, owner);
    }
    return withdrawn;
  }

  // ─── Transactions ──────────────────────────────────────────────────────

  get transactionCount(): number {
    return this.transactions.length;
  }

  addTransaction(entry: Omit<TransactionEntry, "executed">): number {
    const id = this.transactions.length;
    this.transactions.push({ ...entry, executed: false });
    this.confirmations.set(id, new Set());
    return id;
  }

  hasTransaction(id: number): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.transactions.length;
  }

  /**
   * @throws NotFoundError if there is no transaction `id`
   */
  transaction(id: number): TransactionRecord {
    return this.project(id, this.entry(id));
  }

  isExecuted(id: number): boolean {
    return this.entry(id).executed;
  }

  setExecuted(id: number, executed: boolean): void {
    this.entry(id).executed = executed;
  }

  ids(): number[] {
    return this.transactions.map((_, id) => id);
  }

  // ─── Confirmations ─────────────────────────────────────────────────────

  confirmersOf(id: number): Address[] {
    return [...(this.confirmations.get(id) ?? [])];
  }

  confirmationCount(id: number): number {
    return this.confirmations.get(id)?.size ?? 0;
  }

  hasConfirmed(id: number, owner: Address): boolean {
    return this.confirmations.get(id)?.has(owner) ?? false;
  }

  confirmedIds(owner: Address): number[] {
    return [...(this.confirmedBy.get(owner) ?? [])];
  }

  confirm(id: number, owner: Address): void {
    const set = this.confirmations.get(id);
    if (set === undefined) {
      throw new NotFoundError(`Transaction ${id} not found`);
    }
    set.add(owner);
    const ids = this.confirmedBy.get(owner) ?? new Set<number>();
    ids.add(id);
    this.confirmedBy.set(owner, ids);
  }

  revoke(id: number, owner: Address): void {
    this.confirmations.get(id)?.delete(owner);
    const ids = this.confirmedBy.get(owner);
    ids?.delete(id);
    if (ids !== undefined && ids.size === 0) {
      this.confirmedBy.delete(owner);
    }
  }

  clone(): ApprovalLedger {
    return new ApprovalLedger(
      [...this.owners],
      new Set(this.members),
      this.thresholdValue,
      this.transactions.map((entry) => ({ ...entry })),
      new Map([...this.confirmations].map(([id, owners]) => [id, new Set(owners)])),
      new Map([...this.confirmedBy].map(([owner, ids]) => [owner, new Set(ids)])),
    );
  }

  private entry(id: number): TransactionEntry {
    const entry = this.hasTransaction(id) ? this.transactions[id] : undefined;
    if (entry === undefined) {
      throw new NotFoundError(`Transaction ${id} not found`);
    }
    return entry;
  }

  private project(id: number, entry: TransactionEntry): TransactionRecord {
    return {
      id,
      target: entry.target,
      value: entry.value,
      data: entry.data,
      contentHash: entry.contentHash,
      executed: entry.executed,
      confirmations: this.confirmationCount(id),
      createdAt: entry.createdAt,
    };
  }
}

// =============================================================================
// Store
// =============================================================================

export class ApprovalStore implements Checkpointable {
  private ledgers = new Map<Address, ApprovalLedger>();
  private events = new Map<Address, ApprovalEvent[]>();

  lifecycle(account: Address): ApprovalLifecycle {
    return this.ledgers.has(getAddress(account)) ? "active" : "uninitialized";
  }

  find(account: Address): ApprovalLedger | undefined {
    return this.ledgers.get(getAddress(account));
  }

  /**
   * @throws NotFoundError if the account has no active configuration
   */
  require(account: Address): ApprovalLedger {
    const ledger = this.find(account);
    if (ledger === undefined) {
      throw new NotFoundError(`No approval configuration for ${account}`);
    }
    return ledger;
  }

  /**
   * uninitialized → active
   */
  activate(account: Address, ledger: ApprovalLedger): void {
    const key = getAddress(account);
    if (this.ledgers.has(key)) {
      throw new AlreadyInStateError(`Approval configuration for ${key} is already initialized`);
    }
    this.ledgers.set(key, ledger);
  }

  /**
   * active → uninitialized. Drops owners, threshold, transactions,
   * confirmations and the event history of the ended installation.
   */
  clear(account: Address): void {
    const key = getAddress(account);
    if (!this.ledgers.delete(key)) {
      throw new NotFoundError(`No approval configuration for ${key}`);
    }
    this.events.delete(key);
  }

  accounts(): Address[] {
    return [...this.ledgers.keys()];
  }

  record(event: ApprovalEvent): void {
    const key = getAddress(event.account);
    const history = this.events.get(key) ?? [];
    history.push(event);
    this.events.set(key, history);
  }

  history(account: Address): readonly ApprovalEvent[] {
    return [...(this.events.get(getAddress(account)) ?? [])];
  }

  checkpoint(): Restore {
    const ledgers = new Map([...this.ledgers].map(([account, ledger]) => [account, ledger.clone()]));
    const events = new Map([...this.events].map(([account, history]) => [account, [...history]]));
    return () => {
      this.ledgers = ledgers;
      this.events = events;
    };
  }
}
