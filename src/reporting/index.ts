/**
 * Reporting module: text blocks and JSON reports.
 */

export { formatMatch, formatMatches, BLOCK_SEPARATOR } from './text-formatter.js';

export {
  buildCorrelationReport,
  generateJsonReport,
  type CorrelationReport,
} from './json-reporter.js';
