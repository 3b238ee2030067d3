export { createReranker } from './factory';
export { HttpRerankerProvider } from './providers/http.provider';
export type { RerankerProvider } from './provider.interface';
