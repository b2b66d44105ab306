/**
 * Vitest Configuration
 *
 * One run covers every workspace package:
 * - packages/core/tests: spans, lexer, parser, printer, errors
 * - packages/queries/tests: query engine and source-file queries
 * - packages/cli/tests: argument parsing, config, output formatting
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
  },
});
