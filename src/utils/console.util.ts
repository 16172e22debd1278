import chalk from 'chalk';
import { ContentType, OperationMode, PendingOperation } from '../types/media.types';
import { SearchRow } from '../services/search.service';

const MODE_STYLES: Record<OperationMode, { label: string; color: chalk.Chalk }> = {
  [OperationMode.Copy]: { label: 'Copy', color: chalk.blue },
  [OperationMode.Move]: { label: 'Move', color: chalk.red },
  [OperationMode.Link]: { label: 'Link', color: chalk.green },
};

export function formatOperation(mode: OperationMode, operation: PendingOperation): string {
  const { label, color } = MODE_STYLES[mode];
  return `${label}: ${color(operation.source)}\n↪ To: ${color(operation.destination)}`;
}

export function printOperations(mode: OperationMode, operations: PendingOperation[]): void {
  for (const operation of operations) {
    console.log(formatOperation(mode, operation));
  }
}

const SEARCH_COLUMNS: Array<{ header: string; value: (row: SearchRow) => string }> = [
  { header: 'ID', value: (row) => String(row.id) },
  { header: '', value: (row) => (row.type === ContentType.Show ? '📺' : '🎬') },
  { header: 'Name', value: (row) => row.name },
  { header: '🌐', value: (row) => row.language ?? 'N/A' },
  { header: '⭐', value: (row) => (row.popularity === undefined ? 'N/A' : row.popularity.toFixed(1)) },
  { header: 'Year', value: (row) => row.year },
  { header: 'TMDB Link', value: (row) => row.link },
];

/**
 * Plain-text table of search results, one row per line, columns separated by " | ".
 */
export function formatSearchTable(rows: SearchRow[]): string {
  const cells = [SEARCH_COLUMNS.map((c) => c.header), ...rows.map((row) => SEARCH_COLUMNS.map((c) => c.value(row)))];
  const widths = SEARCH_COLUMNS.map((_, col) => Math.max(...cells.map((line) => line[col].length)));

  const lines = cells.map((line) => line.map((cell, col) => cell.padEnd(widths[col])).join(' | ').trimEnd());
  lines.splice(1, 0, widths.map((w) => '-'.repeat(w)).join('-+-'));
  return lines.join('\n');
}
