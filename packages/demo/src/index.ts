#!/usr/bin/env node
/**
 * @tessera/demo: Interactive CLI walkthrough.
 *
 * Runs a smart account through its authorization pipeline in your terminal:
 * boot -> install engine -> submit -> reject -> confirm -> execute ->
 * owner management -> direct execution -> summary
 *
 * Uses the domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import { encodeFunctionData } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { Address, AuthorizationRequest, ChainId, Hex } from "@tessera/types";
import { InMemoryHost } from "@tessera/host";
import {
  AccountRouter,
  InProcessDispatcher,
  accountAbi,
  defaultAuthorizationDigest,
} from "@tessera/account";
import type { RequestReceipt } from "@tessera/account";
import {
  ApprovalEngine,
  MULTISIG_ROUTING_KEY,
  encodeApproval,
  encodeInstallData,
  encodeTransactionCall,
} from "@tessera/multisig";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                      TESSERA DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Pluggable smart-account authorization             ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function receiptLine(receipt: RequestReceipt | undefined): void {
  if (receipt === undefined) {
    warn("No receipt returned");
    return;
  }
  hashLine("request hash", receipt.requestHash);
  switch (receipt.status) {
    case "executed":
      ok(`Request ${receipt.nonce} executed`);
      return;
    case "rejected":
      warn(`Request ${receipt.nonce} rejected (code ${receipt.code})`);
      return;
    case "reverted":
      warn(`Request ${receipt.nonce} reverted: ${receipt.reason}`);
      return;
    case "invalid":
      warn(`Request ${receipt.nonce} invalid (${receipt.errorCode}): ${receipt.reason}`);
      return;
  }
}

const TOTAL_STEPS = 9;

// =============================================================================
// Cast
// =============================================================================

const CHAIN_ID: ChainId = 31337;

const DISPATCHER: Address = "0x5000000000000000000000000000000000000005";
const ACCOUNT: Address = "0x6000000000000000000000000000000000000006";
const ENGINE: Address = "0x7000000000000000000000000000000000000007";
const PAYEE: Address = "0x8000000000000000000000000000000000000008";

const ALICE: Address = "0x1111111111111111111111111111111111111111";
const BOB: Address = "0x2222222222222222222222222222222222222222";
const CAROL: Address = "0x3333333333333333333333333333333333333333";
const DAVE: Address = "0x4444444444444444444444444444444444444444";

const deviceKey = privateKeyToAccount(`0x${"44".repeat(32)}`);

function request(nonce: bigint, callData: Hex, signature: Hex = "0x"): AuthorizationRequest {
  return {
    sender: ACCOUNT,
    nonce,
    initCode: "0x",
    callData,
    callGasLimit: 0n,
    verificationGasLimit: 0n,
    preVerificationGas: 0n,
    maxFeePerGas: 0n,
    maxPriorityFeePerGas: 0n,
    paymasterAndData: "0x",
    signature,
  };
}

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of routed authorization with a multi-owner engine."));
  console.log(chalk.gray("  Every step uses the real packages on an in-process host.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const host = new InMemoryHost();
  ok("Host initialized (journaled balances and call targets)");

  const routers = new Map<Address, AccountRouter>();
  const engine = host.deploy(
    new ApprovalEngine({ address: ENGINE, resolveExecutor: (account) => routers.get(account) }),
  );
  ok(`Approval engine deployed at ${ENGINE}`);

  const dispatcher = host.deploy(new InProcessDispatcher({ address: DISPATCHER, chainId: CHAIN_ID, host }));
  ok(`Trusted dispatcher deployed at ${DISPATCHER}`);

  const router = host.deploy(
    new AccountRouter({
      address: ACCOUNT,
      dispatcher: DISPATCHER,
      chainId: CHAIN_ID,
      host,
      resolveModule: (address) => (address === ENGINE ? engine : undefined),
    }),
  );
  routers.set(router.address, router);
  dispatcher.register(router);
  host.fund(ACCOUNT, 1_000n);
  ok(`Account opened at ${ACCOUNT} with 1000 wei`);

  await sleep(DELAY_MS);

  // ─── Step 2: Install Engine ─────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Install Engine (default arm)");

  const installData = encodeFunctionData({
    abi: accountAbi,
    functionName: "installModule",
    args: [MULTISIG_ROUTING_KEY, ENGINE, encodeInstallData([ALICE, BOB, CAROL], 2)],
  });
  const unsigned = request(0n, installData);
  const signature = await deviceKey.signMessage({
    message: {
      raw: defaultAuthorizationDigest(dispatcher.getRequestHash(unsigned), ACCOUNT, CHAIN_ID),
    },
  });
  info("signer", deviceKey.address);
  const [installReceipt] = await dispatcher.handleRequests([{ ...unsigned, signature }]);
  receiptLine(installReceipt);
  info("routing key", MULTISIG_ROUTING_KEY);
  info("owners", "alice, bob, carol");
  info("threshold", `${engine.getConfig(ACCOUNT).threshold} of ${engine.getConfig(ACCOUNT).owners.length}`);

  await sleep(DELAY_MS);

  // ─── Step 3: Submit Transaction ─────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Submit Transaction");

  const payId = engine.submitTransaction({ caller: ALICE }, ACCOUNT, PAYEE, 250n, "0x");
  const pay = engine.getTransaction(ACCOUNT, payId);
  ok(`Alice proposed transaction ${payId}: pay 250 wei to ${PAYEE}`);
  if (pay !== undefined) {
    hashLine("content hash", pay.contentHash);
    info("confirmations", `${pay.confirmations} (auto-confirmed by submitter)`);
  }

  await sleep(DELAY_MS);

  // ─── Step 4: Premature Request ──────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Premature Request");

  const routedPay = encodeTransactionCall(PAYEE, 250n, "0x");
  const [earlyReceipt] = await dispatcher.handleRequests([
    request(router.nonce, routedPay, encodeApproval(payId, [ALICE])),
  ]);
  receiptLine(earlyReceipt);
  info("payee balance", `${host.balanceOf(PAYEE)} wei`);

  await sleep(DELAY_MS);

  // ─── Step 5: Confirm ────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Confirm");

  engine.confirmTransaction({ caller: BOB }, ACCOUNT, payId);
  ok(`Bob confirmed transaction ${payId}`);
  info("confirmed by", engine.getConfirmations(ACCOUNT, payId).join(", "));

  await sleep(DELAY_MS);

  // ─── Step 6: Routed Execution ───────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Routed Execution");

  const [payReceipt] = await dispatcher.handleRequests([
    request(router.nonce, routedPay, encodeApproval(payId, [ALICE, BOB])),
  ]);
  receiptLine(payReceipt);
  info("payee balance", `${host.balanceOf(PAYEE)} wei`);
  info("account", `${host.balanceOf(ACCOUNT)} wei`);
  info("nonce", router.nonce.toString());

  await sleep(DELAY_MS);

  // ─── Step 7: Owner Management ───────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Owner Management");

  const refundId = engine.submitTransaction({ caller: CAROL }, ACCOUNT, PAYEE, 10n, "0x");
  ok(`Carol proposed transaction ${refundId}`);

  engine.addOwner({ caller: ALICE }, ACCOUNT, DAVE);
  ok("Alice added dave");

  engine.removeOwner({ caller: BOB }, ACCOUNT, CAROL);
  ok("Bob removed carol");
  info("withdrawn", `transaction ${refundId} now has ${engine.getConfirmations(ACCOUNT, refundId).length} confirmations`);

  engine.changeThreshold({ caller: DAVE }, ACCOUNT, 3);
  info("owners", engine.getConfig(ACCOUNT).owners.join(", "));
  info("threshold", `${engine.getConfig(ACCOUNT).threshold} of ${engine.getConfig(ACCOUNT).owners.length}`);

  await sleep(DELAY_MS);

  // ─── Step 8: Direct Execution ───────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Direct Execution");

  for (const owner of [ALICE, BOB, DAVE]) {
    engine.confirmTransaction({ caller: owner }, ACCOUNT, refundId);
  }
  const outcome = engine.executeTransaction({ caller: DAVE }, ACCOUNT, refundId);
  if (outcome.status === "executed") {
    ok(`Dave executed transaction ${refundId} through the account`);
  } else {
    warn(`Transaction ${refundId} failed: ${outcome.revertData}`);
  }
  info("payee balance", `${host.balanceOf(PAYEE)} wei`);

  await sleep(DELAY_MS);

  // ─── Step 9: Summary ────────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Summary");

  const approvalEvents = engine.getEventHistory(ACCOUNT);
  const routerEvents = router.getEventHistory();

  console.log();
  console.log(chalk.white("    Router events:       ") + chalk.cyan.bold(String(routerEvents.length)));
  console.log(chalk.white("    Approval events:     ") + chalk.cyan.bold(String(approvalEvents.length)));
  console.log(chalk.white("    Transactions:        ") + chalk.cyan.bold(String(engine.getTransactionCount(ACCOUNT))));
  console.log(chalk.white("    Pending:             ") + chalk.cyan.bold(String(engine.getPendingTransactionIds(ACCOUNT).length)));
  console.log(chalk.white("    Account nonce:       ") + chalk.cyan.bold(router.nonce.toString()));
  console.log(chalk.white("    Account balance:     ") + chalk.cyan.bold(`${host.balanceOf(ACCOUNT)} wei`));
  console.log();
  for (const event of approvalEvents) {
    console.log(chalk.gray("    ") + chalk.dim(`${event.timestamp}  ${event.type}`));
  }
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
