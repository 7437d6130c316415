/**
 * AccountService: Composition root for the authorization engine.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One service owns one in-process host with a single
 * trusted dispatcher, one shared Approval Engine and any number of
 * accounts.
 */

import { getAddress, isAddressEqual } from "viem";
import { NotFoundError } from "@tessera/types";
import type { Address, AuthorizationRequest, ChainId, Hex } from "@tessera/types";
import { InMemoryHost } from "@tessera/host";
import { AccountRouter, InProcessDispatcher } from "@tessera/account";
import type { RequestReceipt, RouterEvent } from "@tessera/account";
import { ApprovalEngine } from "@tessera/multisig";
import type {
  ApprovalEvent,
  ApprovalLifecycle,
  TransactionRecord,
  TransactionStatus,
} from "@tessera/multisig";

// =============================================================================
// Configuration
// =============================================================================

export type ActivityEntry =
  | { readonly source: "router"; readonly event: RouterEvent }
  | { readonly source: "engine"; readonly event: ApprovalEvent }
  | { readonly source: "dispatcher"; readonly receipt: RequestReceipt };

export interface AccountServiceConfig {
  readonly chainId: ChainId;
  readonly dispatcherAddress: Address;
  readonly engineAddress: Address;

  /** Receives every router event, engine event and request receipt */
  readonly onActivity?: (entry: ActivityEntry) => void;

  /** Default: () => new Date() */
  readonly clock?: () => Date;
}

// =============================================================================
// Projections
// =============================================================================

export interface ModuleView {
  readonly key: Hex;
  readonly module: Address;
  readonly installedAt: string;
}

export interface AccountSummary {
  readonly address: Address;
  readonly nonce: bigint;
  readonly balance: bigint;
  readonly deposit: bigint;
  readonly modules: readonly ModuleView[];
  readonly approval: ApprovalLifecycle;
}

export interface ApprovalView {
  readonly account: Address;
  readonly lifecycle: ApprovalLifecycle;
  readonly owners: readonly Address[];
  readonly threshold: number;
  readonly transactionCount: number;
  readonly pendingTransactionIds: readonly number[];
}

export interface ConfirmationsView {
  readonly transactionId: number;
  readonly confirmations: readonly Address[];
  readonly threshold: number;
  readonly approved: boolean;
}

export interface OwnerView {
  readonly owner: Address;
  readonly isOwner: boolean;
  readonly confirmedTransactionIds: readonly number[];
}

export interface AccountEvents {
  readonly router: readonly RouterEvent[];
  readonly approval: readonly ApprovalEvent[];
}

export type TransactionFilter = TransactionStatus | "all";

// =============================================================================
// Service
// =============================================================================

export class AccountService {
  readonly chainId: ChainId;
  readonly host: InMemoryHost;
  readonly dispatcher: InProcessDispatcher;
  readonly engine: ApprovalEngine;
  readonly startedAt: string;

  private readonly routers = new Map<Address, AccountRouter>();
  private readonly onActivity: ((entry: ActivityEntry) => void) | undefined;
  private readonly clock: () => Date;

  constructor(config: AccountServiceConfig) {
    this.chainId = config.chainId;
    this.onActivity = config.onActivity;
    this.clock = config.clock ?? (() => new Date());
    this.startedAt = this.clock().toISOString();

    this.host = new InMemoryHost();
    this.engine = this.host.deploy(
      new ApprovalEngine({
        address: config.engineAddress,
        resolveExecutor: (account) => this.routers.get(getAddress(account)),
        onEvent: (event) => this.onActivity?.({ source: "engine", event }),
        clock: this.clock,
      }),
    );
    this.dispatcher = this.host.deploy(
      new InProcessDispatcher({
        address: config.dispatcherAddress,
        chainId: config.chainId,
        host: this.host,
        onReceipt: (receipt) => this.onActivity?.({ source: "dispatcher", receipt }),
      }),
    );
  }

  // ─── Accounts ────────────────────────────────────────────────────

  /**
   * Deploy an account bound to this service's dispatcher, optionally
   * with a starting balance.
   *
   * @throws AlreadyInStateError if something is already deployed there
   */
  openAccount(address: Address, balance: bigint = 0n): AccountSummary {
    const router = this.host.deploy(
      new AccountRouter({
        address,
        dispatcher: this.dispatcher.address,
        chainId: this.chainId,
        host: this.host,
        resolveModule: (moduleAddress) =>
          isAddressEqual(moduleAddress, this.engine.address) ? this.engine : undefined,
        onEvent: (event) => this.onActivity?.({ source: "router", event }),
        clock: this.clock,
      }),
    );
    this.dispatcher.register(router);
    this.routers.set(router.address, router);
    if (balance > 0n) {
      this.host.fund(router.address, balance);
    }
    return this.summarize(router);
  }

  listAccounts(): readonly AccountSummary[] {
    return [...this.routers.values()].map((router) => this.summarize(router));
  }

  getAccount(account: Address): AccountSummary {
    return this.summarize(this.requireRouter(account));
  }

  /** Hand a batch of requests to the dispatcher. */
  async submitRequests(requests: readonly AuthorizationRequest[]): Promise<readonly RequestReceipt[]> {
    return this.dispatcher.handleRequests(requests);
  }

  // ─── Approval ────────────────────────────────────────────────────

  getApproval(account: Address): ApprovalView {
    const address = this.requireRouter(account).address;
    const config = this.engine.getConfig(address);
    return {
      account: address,
      lifecycle: this.engine.getLifecycle(address),
      owners: config.owners,
      threshold: config.threshold,
      transactionCount: this.engine.getTransactionCount(address),
      pendingTransactionIds: this.engine.getPendingTransactionIds(address),
    };
  }

  listTransactions(account: Address, filter: TransactionFilter = "all"): readonly TransactionRecord[] {
    const address = this.requireRouter(account).address;
    const transactions = this.engine.getTransactions(address);
    if (filter === "all") {
      return transactions;
    }
    const executed = filter === "executed";
    return transactions.filter((tx) => tx.executed === executed);
  }

  /**
   * @throws NotFoundError if the account or transaction does not exist
   */
  getTransaction(account: Address, transactionId: number): TransactionRecord {
    const address = this.requireRouter(account).address;
    const transaction = this.engine.getTransaction(address, transactionId);
    if (transaction === undefined) {
      throw new NotFoundError(`Transaction ${transactionId} not found for ${address}`);
    }
    return transaction;
  }

  getConfirmations(account: Address, transactionId: number): ConfirmationsView {
    const transaction = this.getTransaction(account, transactionId);
    const address = getAddress(account);
    const { threshold } = this.engine.getConfig(address);
    return {
      transactionId,
      confirmations: this.engine.getConfirmations(address, transactionId),
      threshold,
      approved: transaction.confirmations >= threshold,
    };
  }

  getOwner(account: Address, owner: Address): OwnerView {
    const address = this.requireRouter(account).address;
    return {
      owner: getAddress(owner),
      isOwner: this.engine.isOwner(address, owner),
      confirmedTransactionIds: this.engine.getConfirmedTransactionIds(address, owner),
    };
  }

  getEvents(account: Address): AccountEvents {
    const router = this.requireRouter(account);
    return {
      router: router.getEventHistory(),
      approval: this.engine.getEventHistory(router.address),
    };
  }

  // ─── Private ─────────────────────────────────────────────────────

  private requireRouter(account: Address): AccountRouter {
    const router = this.routers.get(getAddress(account));
    if (router === undefined) {
      throw new NotFoundError(`No account registered at ${account}`);
    }
    return router;
  }

  private summarize(router: AccountRouter): AccountSummary {
    return {
      address: router.address,
      nonce: router.nonce,
      balance: this.host.balanceOf(router.address),
      deposit: this.dispatcher.getDeposit(router.address),
      modules: router.listModules().map((binding) => ({
        key: binding.key,
        module: binding.moduleAddress,
        installedAt: binding.installedAt,
      })),
      approval: this.engine.getLifecycle(router.address),
    };
  }
}
