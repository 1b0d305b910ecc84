/*
  Plan standard, low-dose and fast PET protocols for a request stored as JSON.
  Usage:
    npx tsx scripts/plan-protocol.ts --request request.json [--store storage/k_store.json] [--record-k]
*/
import 'dotenv/config';
import * as fs from 'fs';
import { protocolRequestSchema } from '../shared/schema';
import { loadConfig } from '../server/config';
import { KFactorStore, PetPhysicsModel, ProtocolPlanner } from '../server/pet-protocol';

function main(): number {
  const args = process.argv.slice(2);
  const getArg = (k: string) => { const i = args.indexOf(k); return i > -1 ? args[i + 1] : undefined; };

  const requestPath = getArg('--request');
  if (!requestPath || !fs.existsSync(requestPath)) {
    console.error('Usage: --request <request.json> [--store <k_store.json>] [--record-k]');
    return 1;
  }

  let body: unknown;
  try {
    body = JSON.parse(fs.readFileSync(requestPath, 'utf-8'));
  } catch (e) {
    console.error(`Could not read ${requestPath}: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const parsed = protocolRequestSchema.safeParse(body);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return 1;
  }

  const store = new KFactorStore(getArg('--store') ?? loadConfig().kStorePath);
  const planner = new ProtocolPlanner(new PetPhysicsModel(), store);
  const request = args.includes('--record-k') ? { ...parsed.data, recordK: true } : parsed.data;
  const plan = planner.plan(request);

  console.log(JSON.stringify({ ok: true, plan }, null, 2));
  return 0;
}

process.exitCode = main();
