/**
 * Splits nvidia-smi `--format=csv` output into rows of raw fields.
 *
 * Fields are returned untrimmed. Quoted fields may contain commas and `""`
 * escapes. Lines holding only whitespace produce no row.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];

  for (const line of text.split(/\r?\n/)) {
    if (line.trim().length === 0) {
      continue;
    }
    rows.push(parseCsvLine(line));
  }

  return rows;
}

export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];

    if (quoted) {
      if (char === '"') {
        if (line[index + 1] === '"') {
          current += '"';
          index += 1;
        } else {
          quoted = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' && current.trim().length === 0) {
      current = '';
      quoted = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  fields.push(current);
  return fields;
}
