import type { ConversionService } from '@fxconvert/conversion';
import { InvalidAmountError, describeFailure, formatConversion, parseAmount } from '@fxconvert/domain';
import type { SessionIO, SessionOptions, SessionSummary } from './types.js';

export const SEPARATOR = '-'.repeat(40);

function isExitSentinel(raw: string): boolean {
  return raw.length > 0 && Number(raw) === 0;
}

/**
 * Prompt for amount, source and target until the amount is `0` or input ends.
 * Invalid amounts are reported before any currency is asked for. Each
 * successful conversion is printed first and recorded afterwards.
 */
export async function runConsoleSession(
  io: SessionIO,
  service: ConversionService,
  options: SessionOptions
): Promise<SessionSummary> {
  const summary: SessionSummary = { conversions: 0, failures: 0 };

  io.print('Currency converter. Enter 0 as the amount to exit.');
  if (options.currencies.length > 0) {
    io.print(`Currencies: ${options.currencies.join(', ')}`);
  }

  for (;;) {
    const rawAmount = await io.ask('Amount: ');
    if (rawAmount === null) {
      break;
    }

    const amountText = rawAmount.trim();
    if (isExitSentinel(amountText)) {
      break;
    }

    let amount: number;
    try {
      amount = parseAmount(amountText);
    } catch (error) {
      if (error instanceof InvalidAmountError) {
        io.print(error.message);
        summary.failures += 1;
        continue;
      }
      throw error;
    }

    const from = await io.ask('From currency: ');
    if (from === null) {
      break;
    }
    const to = await io.ask('To currency: ');
    if (to === null) {
      break;
    }

    const outcome = await service.convert({ amount, from, to });
    if (outcome.isErr()) {
      io.print(describeFailure(outcome.error));
      summary.failures += 1;
      continue;
    }

    io.print(SEPARATOR);
    io.print(formatConversion(outcome.value));
    io.print(SEPARATOR);
    summary.conversions += 1;

    // A failed save is already logged by the service.
    await service.record(outcome.value);
  }

  return summary;
}
