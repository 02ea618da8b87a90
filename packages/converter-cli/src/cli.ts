#!/usr/bin/env node
import { stdin, stdout } from 'node:process';
import { loadStaticRateSource } from '@fxconvert/adapters';
import { loadConverterCliEnv, loadRuntimeConfig } from '@fxconvert/config';
import { createConversionStack } from '@fxconvert/conversion';
import { closeDb } from '@fxconvert/db';
import { createServiceLogger } from '@fxconvert/observability';
import { parseCliArgs, usage } from './parser.js';
import { runConsoleSession } from './session.js';
import { createLineIO } from './terminal.js';

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(usage());
    return;
  }

  const env = loadConverterCliEnv();
  const runtime = loadRuntimeConfig();
  const logger = createServiceLogger({ service: 'converter-cli', minLevel: runtime.LOG_LEVEL ?? 'info' });
  const source = args.ratesFile ? await loadStaticRateSource(args.ratesFile) : undefined;

  const stack = createConversionStack({
    env,
    logger,
    ...(source ? { source } : {}),
    ...(args.history ? {} : { store: null })
  });

  const io = createLineIO(stdin, stdout);
  try {
    const summary = await runConsoleSession(io, stack.service, { currencies: env.CONVERTER_CLI_CURRENCIES });
    io.print(`Goodbye. ${summary.conversions} converted, ${summary.failures} failed.`);
  } finally {
    io.close();
    await stack.activityLog.idle();
    await closeDb();
  }
}

main().catch((error: unknown) => {
  console.error(`converter-cli error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
