/**
 * CSV codec
 *
 * Minimal RFC 4180 reader and writer: comma separated, double-quote
 * quoting with `""` escapes, quoted fields may span lines, CRLF or LF row
 * endings. Values are kept as strings; typing happens in the callers.
 *
 * @module utils/csv
 */

/**
 * A parsed CSV document
 */
export interface CsvDocument {
  /** Header row */
  headers: string[]
  /** Data rows keyed by header; missing trailing cells become '' */
  records: Record<string, string>[]
}

/**
 * Split CSV text into rows of raw cell values
 */
export function parseCsvRows(text: string): string[][] {
  // Strip a UTF-8 byte order mark
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text

  const rows: string[][] = []
  let row: string[] = []
  let current = ''
  let inQuotes = false
  let fieldStarted = false

  for (let i = 0; i < input.length; i++) {
    const char = input.charAt(i)

    if (inQuotes) {
      if (char === '"') {
        if (input.charAt(i + 1) === '"') {
          // Escaped quote
          current += '"'
          i++
        } else {
          inQuotes = false
        }
      } else {
        current += char
      }
      continue
    }

    if (char === '"') {
      inQuotes = true
      fieldStarted = true
    } else if (char === ',') {
      row.push(current)
      current = ''
      fieldStarted = true
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && input.charAt(i + 1) === '\n') i++
      if (fieldStarted || current !== '' || row.length > 0) {
        row.push(current)
        rows.push(row)
      }
      row = []
      current = ''
      fieldStarted = false
    } else {
      current += char
      fieldStarted = true
    }
  }

  if (inQuotes) {
    throw new SyntaxError('Unterminated quoted field in CSV input')
  }

  if (fieldStarted || current !== '' || row.length > 0) {
    row.push(current)
    rows.push(row)
  }

  return rows
}

/**
 * Parse CSV text with a header row into records
 */
export function parseCsv(text: string): CsvDocument {
  const rows = parseCsvRows(text)
  const [headerRow, ...dataRows] = rows

  if (!headerRow) {
    return { headers: [], records: [] }
  }

  const headers = headerRow.map(h => h.trim())
  const records = dataRows.map(values => {
    const record: Record<string, string> = {}
    headers.forEach((header, j) => {
      record[header] = values[j] ?? ''
    })
    return record
  })

  return { headers, records }
}

/**
 * Escape a value for CSV (quote if contains comma, quote, or newline)
 */
export function escapeCsvValue(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"'
  }
  return value
}

/**
 * Format a header row and data rows as CSV text, one trailing newline
 */
export function formatCsv(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [headers.map(escapeCsvValue).join(',')]
  for (const row of rows) {
    lines.push(row.map(escapeCsvValue).join(','))
  }
  return lines.join('\n') + '\n'
}
