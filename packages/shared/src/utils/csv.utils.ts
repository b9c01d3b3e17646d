// ============================================================================
// CSV — Parsing and Rendering Utilities
// ============================================================================

/**
 * Auto-detect CSV delimiter from the header line. Tries comma, tab, semicolon.
 */
export function detectDelimiter(headerLine: string): string {
  const candidates: Array<{ delim: string; count: number }> = [
    { delim: ',', count: headerLine.split(',').length },
    { delim: '\t', count: headerLine.split('\t').length },
    { delim: ';', count: headerLine.split(';').length },
  ];

  candidates.sort((a, b) => b.count - a.count);
  return candidates[0].count >= 2 ? candidates[0].delim : ',';
}

/**
 * Parse CSV content into rows of cells. Quoted fields may contain the
 * delimiter, doubled quotes and line breaks. Blank lines are dropped.
 */
export function parseCsvContent(content: string, delimiter = ','): string[][] {
  const rows: string[][] = [];
  let cells: string[] = [];
  let current = '';
  let inQuotes = false;

  const text = content.startsWith('\uFEFF') ? content.slice(1) : content;

  const endRow = () => {
    cells.push(current);
    current = '';
    if (!(cells.length === 1 && cells[0].trim() === '')) {
      rows.push(cells);
    }
    cells = [];
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++; // Skip escaped quote
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === delimiter) {
      cells.push(current);
      current = '';
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') i++;
      endRow();
    } else {
      current += char;
    }
  }

  if (current !== '' || cells.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Escape a value for CSV output. Wraps in quotes if it contains commas,
 * quotes or line breaks. Doubles internal quotes.
 */
export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render a header plus one line per record. Missing keys render blank.
 */
export function buildCsv<K extends string>(
  columns: readonly K[],
  records: ReadonlyArray<Readonly<Partial<Record<K, string>>>>,
): string {
  const lines = [columns.map(escapeCsvValue).join(',')];
  for (const record of records) {
    lines.push(columns.map((column) => escapeCsvValue(record[column] ?? '')).join(','));
  }
  return `${lines.join('\n')}\n`;
}
