export type CliArgs = {
  help: boolean;
  /** Persist conversions to `conversion_history`; `--no-history` turns it off. */
  history: boolean;
  ratesFile?: string;
};

export interface SessionIO {
  /** Resolves to `null` once input has ended. */
  ask(prompt: string): Promise<string | null>;
  print(line: string): void;
}

export type SessionOptions = {
  /** Codes listed in the greeting; any three-letter code is still accepted. */
  currencies: readonly string[];
};

export type SessionSummary = {
  conversions: number;
  failures: number;
};
