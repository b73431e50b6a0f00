#!/usr/bin/env npx tsx
// ─── Initiative Ledger SDK Quick-Start ───────────────────────────────────
// Full flow: guardian creates an initiative, participants signal, status, terminate
//
// Usage:
//   npx tsx examples/quickstart.ts                       # uses localhost:8787, guardian "guardian"
//   API_URL=http://host:8787 GUARDIAN_ID=ops npx tsx examples/quickstart.ts
// ────────────────────────────────────────────────────────────────────────────

import { LedgerAPIClient, LedgerAPIError } from '../src/sdk/index.js';

const API_URL = process.env.API_URL ?? 'http://localhost:8787';
const GUARDIAN_ID = process.env.GUARDIAN_ID ?? 'guardian';

async function main(): Promise<void> {
  console.log(`\nInitiative Ledger SDK Quick-Start`);
  console.log(`   API: ${API_URL}\n`);

  const guardian = new LedgerAPIClient(API_URL, GUARDIAN_ID);

  const health = await guardian.health();
  console.log(`Health: ${health.status} | guardian=${health.guardian} | initiatives=${health.totalInitiatives}`);

  const ledgerConfig = await guardian.getConfiguration();
  console.log(`Default span: ${ledgerConfig.standardDeliberationSpan}s (bounds ${ledgerConfig.minSpan}-${ledgerConfig.maxSpan})`);

  // ── 1. Create an initiative ───────────────────────────────────────────
  const id = await guardian.createInitiative({
    title: 'Upgrade',
    summary: 'Add feature',
    span: ledgerConfig.minSpan,
  });
  console.log(`\nCreated initiative #${id}`);

  // ── 2. Participants signal ────────────────────────────────────────────
  for (const participant of ['alice', 'bob']) {
    const receipt = await guardian.as(participant).signal(id);
    console.log(`   ${participant} signaled at ${receipt.participationSequence} (tally=${receipt.consensusTally})`);
  }

  // A second signal from the same participant is refused.
  try {
    await guardian.as('alice').signal(id);
  } catch (err) {
    if (err instanceof LedgerAPIError) {
      console.log(`   alice again → ${err.code}`);
    } else {
      throw err;
    }
  }

  // ── 3. Status ─────────────────────────────────────────────────────────
  const status = await guardian.getStatus(id);
  if (status) {
    console.log(`\nStatus: active=${status.isActive} remaining=${status.remaining}s tally=${status.initiative.consensusTally}`);
  }

  // ── 4. Terminate ──────────────────────────────────────────────────────
  await guardian.terminate(id);
  const closed = await guardian.getStatus(id);
  console.log(`Terminated: active=${closed?.isActive}`);
}

main().catch((err) => {
  console.error('Quick-start failed:', err);
  process.exit(1);
});
