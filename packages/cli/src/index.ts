/**
 * Bozon CLI
 * Programmatic access to the bozon-parse command
 */

export {
  type CliIO,
  type ParseCommand,
  type ParsedCliArgs,
  parseCliArgs,
  runParse,
} from './cli-run.js';
export {
  extractSnippet,
  formatDiagnostic,
  renderCaret,
  type SnippetLine,
} from './cli-error-formatter.js';
export {
  detectHelpVersionFlag,
  type FileReport,
  formatJsonReport,
  readVersion,
} from './cli-shared.js';
export {
  CONFIG_FILE_NAME,
  type CliConfig,
  isOutputFormat,
  loadConfig,
  type OutputFormat,
  parseConfig,
} from './config.js';
