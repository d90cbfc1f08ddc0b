export {
  extractStructuredResult,
  extractFirstMatching,
  extractFencedJsonBlocks,
  parseEventTexts,
  unescapeText,
} from './result-extractor.js'
export type { StructuredPayload, ExtractionMatch, EventTextScan } from './result-extractor.js'
