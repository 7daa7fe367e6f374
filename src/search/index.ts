export {
  RetrievalEngine,
  MAX_RESULTS,
  clampLimit,
  compareResults,
  type RetrievalSettings,
  type SearchOptions,
} from './retriever';
