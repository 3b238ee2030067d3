import type { Evidence } from '../services/retriever';
import type { JudgedEvidence, StanceVerdict } from '../services/stance';
import type { DocumentSummary } from '../services/vectorIndex';

export function serializeEvidence(item: Evidence) {
  const { chunk } = item;
  return {
    chunk_id: chunk.id,
    document_id: chunk.documentId,
    ordinal: chunk.ordinal,
    text: chunk.text,
    page_start: chunk.pageStart,
    page_end: chunk.pageEnd,
    author: chunk.author,
    region: chunk.region,
    date: chunk.date,
    language: chunk.language,
    similarity: item.similarity,
    rerank_score: item.rerankScore ?? null,
  };
}

function serializeJudged(item: JudgedEvidence) {
  return {
    ...serializeEvidence(item),
    stance: item.stance,
    rationale: item.rationale,
  };
}

export function serializeVerdict(verdict: StanceVerdict) {
  return {
    score: verdict.score,
    label: verdict.label,
    confidence: verdict.confidence,
    valid_count: verdict.validCount,
    excluded_count: verdict.excludedCount,
    weighting: verdict.weighting,
    diagnostics: verdict.diagnostics.map((diagnostic) => ({
      position: diagnostic.position,
      chunk_id: diagnostic.chunkId,
      document_id: diagnostic.documentId,
      kind: diagnostic.kind,
      message: diagnostic.message,
    })),
    evidence: verdict.evidence.map(serializeJudged),
  };
}

export function serializeDocument(summary: DocumentSummary, fileServerUrl?: string) {
  return {
    document_id: summary.documentId,
    author: summary.author,
    region: summary.region,
    date: summary.date,
    language: summary.language,
    size_mb: summary.sizeMb,
    upload_time: summary.uploadTime,
    num_chunks: summary.chunkCount,
    url: fileServerUrl
      ? `${fileServerUrl.replace(/\/+$/, '')}/${encodeURIComponent(summary.documentId)}`
      : null,
  };
}
