/**
 * Parquet export of the combined analysis table
 *
 * Uses hyparquet-writer to build the file and hyparquet to read it back.
 * Columns carry the same names as the CSV export. Numeric columns are typed
 * explicitly and hold nulls for undefined values; string columns are left
 * to the writer's type detection and hold '' for undefined, which reads
 * back as undefined like an empty CSV cell.
 *
 * @module export/parquet
 */

import { parquetReadObjects } from 'hyparquet'
import { parquetWriteBuffer } from 'hyparquet-writer'
import { assertValid } from '../errors'
import type { CombinedAnalysisRow, CombinedTable } from '../types/tables'
import { COMBINED_COLUMNS, assertCombinedHeaders, readCombinedRow } from './columns'

/**
 * Read-only view over a byte range, in the shape hyparquet expects
 */
interface AsyncBuffer {
  byteLength: number
  slice(start: number, end?: number): Promise<ArrayBuffer>
}

function toAsyncBuffer(bytes: Uint8Array): AsyncBuffer {
  return {
    byteLength: bytes.byteLength,
    slice: async (start: number, end?: number) => {
      const sliced = bytes.subarray(start, end ?? bytes.byteLength)
      const copy = new ArrayBuffer(sliced.byteLength)
      new Uint8Array(copy).set(sliced)
      return copy
    },
  }
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  return undefined
}

/**
 * Serialize combined rows to a Parquet file held in memory
 */
export function toParquet(rows: CombinedTable): ArrayBuffer {
  assertValid(rows.length > 0, 'Cannot write an empty table to Parquet', {
    field: 'rows',
    operation: 'toParquet',
  })

  const columnData = COMBINED_COLUMNS.map(column => {
    const values = rows.map(row => row[column.key])
    switch (column.kind) {
      case 'string':
        return { name: column.header, data: values.map(v => v ?? '') }
      case 'integer':
        return { name: column.header, data: values.map(v => v ?? null), type: 'INT32' as const }
      default:
        return { name: column.header, data: values.map(v => v ?? null), type: 'DOUBLE' as const }
    }
  })

  return parquetWriteBuffer({ columnData })
}

/**
 * Read combined rows from a Parquet file written by `toParquet`
 */
export async function fromParquet(data: ArrayBuffer | Uint8Array): Promise<CombinedAnalysisRow[]> {
  const bytes = data instanceof Uint8Array ? data : new Uint8Array(data)
  const records: Record<string, unknown>[] = await parquetReadObjects({ file: toAsyncBuffer(bytes) })

  const first = records[0]
  if (first) assertCombinedHeaders(Object.keys(first))

  return records.map((record, i) =>
    readCombinedRow(
      {
        string: header => {
          const value = record[header]
          return typeof value === 'string' && value !== '' ? value : undefined
        },
        number: header => {
          const value = record[header]
          if (value === null || value === undefined) return undefined
          return toNumber(value) ?? Number.NaN
        },
      },
      i + 1
    )
  )
}
