export {
  normalizeRow,
  normalizeRows,
  type RowNormalizerOptions,
  type NormalizedRows,
} from './row-normalizer.js'
