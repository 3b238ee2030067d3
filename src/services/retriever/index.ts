export { Retriever, normalizeTopK } from './retriever.service';
export type { Evidence, RetrievalResult, RetrieverOptions } from './retriever.types';
