/**
 * Listing of the terminal commands below a node of the command tree, as
 * printed by `-c/--commands`.
 */
import type { CommandTree } from '../tree/command-tree.js';

export const LINE_WIDTH = 80;

const LEFT_PADDING = '  ... ';
const MID_PADDING = '  ';

export type SummaryMode = 'whole' | 'ellipted' | 'omitted';

/**
 * Shorten text to a width, marking the cut with a trailing ellipsis.
 */
export function rellipt(text: string, width: number): string {
  if (text.length <= width) return text;
  if (width <= 3) return '.'.repeat(Math.max(width, 0));
  return `${text.slice(0, width - 3)}...`;
}

export function chooseSummaryMode(summaryWidths: readonly number[], space: number): SummaryMode {
  if (summaryWidths.length === 0 || space >= Math.max(...summaryWidths)) return 'whole';
  if (space >= Math.min(...summaryWidths)) return 'ellipted';
  return 'omitted';
}

/**
 * Format the listing for the node at `prefix`.
 *
 * @example
 * formatCommandListing('prog', tree, ['foo'])
 * // terminal commands:
 * //
 * //   prog foo ...
 * //
 * //   ... bar  Convert records.
 */
export function formatCommandListing(programName: string, tree: CommandTree, prefix: readonly string[] = []): string {
  const rows = tree.leaves(prefix).map((spec) => ({
    command: spec.commandPath.slice(prefix.length).join(' '),
    summary: spec.summary,
  }));

  const commandWidth = Math.max(0, ...rows.map((row) => row.command.length));
  const summarySpace = LINE_WIDTH - (LEFT_PADDING.length + commandWidth + MID_PADDING.length);
  const mode = chooseSummaryMode(
    rows.map((row) => row.summary.length),
    summarySpace
  );

  const lines = rows.map((row) => {
    if (mode === 'omitted') {
      return `${LEFT_PADDING}${row.command}`;
    }
    const summary = mode === 'ellipted' ? rellipt(row.summary, summarySpace) : row.summary;
    return `${LEFT_PADDING}${row.command.padEnd(commandWidth)}${MID_PADDING}${summary}`;
  });

  return ['terminal commands:', '', `  ${[programName, ...prefix].join(' ')} ...`, '', ...lines, ''].join('\n');
}
