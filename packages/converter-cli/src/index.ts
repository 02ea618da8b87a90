export { parseCliArgs, usage } from './parser.js';
export { SEPARATOR, runConsoleSession } from './session.js';
export type { CliArgs, SessionIO, SessionOptions, SessionSummary } from './types.js';
export { createLineIO, type LineIO } from './terminal.js';
