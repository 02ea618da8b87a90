import type { CliArgs } from './types.js';

export function parseCliArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = { help: false, history: true };

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];

    if (current === '--help' || current === '-h') {
      parsed.help = true;
      continue;
    }

    if (current === '--no-history') {
      parsed.history = false;
      continue;
    }

    if (current === '--rates-file') {
      const next = argv[i + 1];
      if (!next || next.startsWith('--')) {
        throw new Error('Missing value for --rates-file.');
      }
      parsed.ratesFile = next;
      i += 1;
      continue;
    }

    throw new Error(`Unknown option: ${current ?? ''}`);
  }

  return parsed;
}

export function usage(): string {
  return [
    'Usage:',
    '  converter-cli [--rates-file <path>] [--no-history]',
    '',
    'Options:',
    '  --rates-file <path>  Convert against a JSON rate table ({ "base": "USD", "rates": {...} }) instead of live rates',
    '  --no-history         Do not write conversions to the conversion_history table',
    '  -h, --help           Show this message'
  ].join('\n');
}
