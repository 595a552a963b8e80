export {
  mergeFaxNumbers,
  mergeFaxKeywords,
  defaultFaxKeywords,
  type FaxMergeOptions,
  type KeywordMergeOptions,
} from './fax-consolidator.js'
export { parseFaxKeywords, serializeFaxKeywords } from './keyword-codec.js'
