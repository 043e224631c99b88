// Writes the synthetic CSV set to a directory without touching a database.
// Usage: npm run generate -- --out ./data [--seed 42] [--hospital HOSP1] [--patients 5000]
import { promises as fsp } from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { DEFAULT_SEED } from '../src/config.js';
import { DEFAULT_PLAN, generateAll } from '../src/services/generator.js';

const count = z.coerce.number().int().min(0);

const argsSchema = z.object({
  out: z.string().min(1).default('.'),
  seed: z.coerce.number().int().default(DEFAULT_SEED),
  hospitals: count.default(DEFAULT_PLAN.hospitals),
  hospital: z.string().min(1).default(DEFAULT_PLAN.hospitalId),
  providers: count.default(DEFAULT_PLAN.providers),
  patients: count.default(DEFAULT_PLAN.patients),
  encounters: count.default(DEFAULT_PLAN.encounters),
  transactions: count.default(DEFAULT_PLAN.transactions),
});

const { values } = parseArgs({
  options: {
    out: { type: 'string' },
    seed: { type: 'string' },
    hospitals: { type: 'string' },
    hospital: { type: 'string' },
    providers: { type: 'string' },
    patients: { type: 'string' },
    encounters: { type: 'string' },
    transactions: { type: 'string' },
  },
});

async function main(): Promise<void> {
  const args = argsSchema.parse(values);
  const outputDir = path.resolve(args.out);
  await fsp.mkdir(outputDir, { recursive: true });

  const summary = await generateAll(
    {
      hospitals: args.hospitals,
      hospitalId: args.hospital,
      providers: args.providers,
      patients: args.patients,
      encounters: args.encounters,
      transactions: args.transactions,
    },
    { outputDir, seed: args.seed }
  );

  for (const file of summary.files) {
    console.log(`[generate] ${path.join(outputDir, file)}`);
  }
}

main().catch((error: unknown) => {
  console.error('[generate] failed:', error);
  process.exitCode = 1;
});
