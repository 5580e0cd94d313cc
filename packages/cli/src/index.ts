#!/usr/bin/env tsx
/**
 * faultline CLI
 *
 * Command-line interface and terminal wizard for fault-injection experiments.
 * @module @faultline/cli
 */

import { createProgram } from './program.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof Error) {
      console.error('Error:', err.message);
    }
    process.exit(1);
  }
}

// Run the CLI
main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
