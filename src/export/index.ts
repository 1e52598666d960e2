export { toCsv, fromCsv } from './csv'
export { toParquet, fromParquet } from './parquet'
export {
  COMBINED_COLUMNS,
  COMBINED_HEADERS,
  type ColumnKind,
  type CombinedColumn,
} from './columns'
