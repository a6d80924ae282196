import type { ParsedElement } from '../types';

function escapeCell(cell: string): string {
  return cell.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|').trim();
}

/**
 * Render rows as a markdown table; the first row is the header. Short rows
 * are padded to the widest row.
 */
export function renderMarkdownTable(rows: readonly (readonly string[])[]): string {
  const width = Math.max(...rows.map((row) => row.length));
  const line = (cells: readonly string[]): string => {
    const padded = Array.from({ length: width }, (_, i) =>
      escapeCell(cells[i] ?? ''),
    );
    return `| ${padded.join(' | ')} |`;
  };

  const [header, ...body] = rows;
  const separator = `| ${Array.from({ length: width }, () => '---').join(' | ')} |`;
  return [line(header), separator, ...body.map(line)].join('\n');
}

/**
 * Full text of a table element: caption, blank line, then the table
 * (markdown from tableData, else the parser's content)
 */
export function renderTable(element: ParsedElement): string {
  const rows = element.metadata?.tableData;
  const body =
    rows && rows.length > 0 && rows.some((row) => row.length > 0)
      ? renderMarkdownTable(rows)
      : element.content.trim();
  const caption = element.metadata?.caption?.trim();
  return caption ? `${caption}\n\n${body}` : body;
}
