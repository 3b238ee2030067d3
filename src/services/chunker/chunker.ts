/**
 * Semantic greedy chunking.
 *
 * Segments are split until each piece fits the token budget, embedded once,
 * and walked in document order. A piece joins the running chunk while the
 * joined text stays within budget and the piece is similar enough to the
 * chunk's centroid. An optional sweep then merges adjacent chunks that only
 * split on token pressure.
 */

import { MAX_MERGE_PASSES, SIMILARITY_EPSILON } from '../../config/constants';
import { ChunkingError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { throwIfAborted } from '../../utils/retry';
import type { EmbeddingProvider } from '../embeddings/provider.interface';
import { cosineSimilarity, weightedCentroid } from '../embeddings/similarity';
import type { Segment } from '../parser/parser.types';
import {
  computeContentHash,
  isUnspacedScript,
  joinText,
  splitIntoClauses,
  splitIntoSentences,
  splitIntoWords,
} from '../sentences';
import type { ChunkDraft, ChunkOptions, ChunkPiece, Tokenizer } from './chunker.types';

const SEGMENT_SEPARATOR = '\n\n';

/**
 * Deterministic chunk id, so re-ingesting a document overwrites rather than
 * duplicates.
 */
export function chunkId(documentId: string, ordinal: number): string {
  return computeContentHash(`${documentId}#${ordinal}`).slice(0, 32);
}

export function joinPieces(pieces: readonly ChunkPiece[]): string {
  let text = '';
  for (let i = 0; i < pieces.length; i++) {
    if (i === 0) {
      text = pieces[i].text;
    } else if (pieces[i].segmentOrder === pieces[i - 1].segmentOrder) {
      text = joinText(text, pieces[i].text);
    } else {
      text += SEGMENT_SEPARATOR + pieces[i].text;
    }
  }
  return text;
}

type SplitLevel = 'sentence' | 'clause' | 'word';

const SPLITTERS: Record<SplitLevel, (text: string) => string[]> = {
  sentence: (text) => splitIntoSentences(text).map((sentence) => sentence.text),
  clause: splitIntoClauses,
  word: splitIntoWords,
};

const NEXT_LEVEL: Record<SplitLevel, SplitLevel | null> = {
  sentence: 'clause',
  clause: 'word',
  word: null,
};

/**
 * Split oversized text into budget-sized pieces, cutting at the last sentence
 * boundary that fits, then clause, then whitespace. A run in a script written
 * without word spacing is cut by character as a last resort; any other single
 * word over budget is a ChunkingError.
 */
export function hardSplit(
  text: string,
  tokenBudget: number,
  tokenizer: Tokenizer,
  level: SplitLevel = 'sentence'
): string[] {
  const pieces: string[] = [];
  let current = '';

  const flush = () => {
    if (current) pieces.push(current);
    current = '';
  };

  for (const unit of SPLITTERS[level](text)) {
    if (tokenizer.count(unit) > tokenBudget) {
      flush();
      const next = NEXT_LEVEL[level];
      if (!next && isUnspacedScript(unit)) {
        pieces.push(...splitByCharacter(unit, tokenBudget, tokenizer));
        continue;
      }
      if (!next) {
        throw new ChunkingError(
          `A single word of ${tokenizer.count(unit)} tokens exceeds the budget of ${tokenBudget}`
        );
      }
      pieces.push(...hardSplit(unit, tokenBudget, tokenizer, next));
      continue;
    }

    const candidate = joinText(current, unit);
    if (tokenizer.count(candidate) <= tokenBudget) {
      current = candidate;
    } else {
      flush();
      current = unit;
    }
  }
  flush();

  return pieces;
}

function splitByCharacter(text: string, tokenBudget: number, tokenizer: Tokenizer): string[] {
  const pieces: string[] = [];
  let current = '';

  for (const character of text) {
    if (tokenizer.count(character) > tokenBudget) {
      throw new ChunkingError(
        `A single character of ${tokenizer.count(character)} tokens exceeds the budget of ${tokenBudget}`
      );
    }
    const candidate = current + character;
    if (tokenizer.count(candidate) <= tokenBudget) {
      current = candidate;
    } else {
      pieces.push(current);
      current = character;
    }
  }
  if (current) pieces.push(current);

  return pieces;
}

export function isCoherent(a: readonly number[], b: readonly number[], threshold: number): boolean {
  if (threshold <= 0) return true;
  return cosineSimilarity(a, b) >= threshold - SIMILARITY_EPSILON;
}

function centroidOf(pieces: readonly ChunkPiece[]): number[] {
  return weightedCentroid(
    pieces.map((piece) => piece.embedding),
    pieces.map((piece) => piece.tokenCount)
  );
}

export class SemanticChunker {
  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly tokenizer: Tokenizer,
    private readonly defaults: ChunkOptions
  ) {}

  async chunk(
    segments: readonly Segment[],
    options: Partial<ChunkOptions> = {},
    signal?: AbortSignal
  ): Promise<ChunkDraft[]> {
    const resolved: ChunkOptions = { ...this.defaults, ...options };
    validateOptions(resolved);
    if (segments.length === 0) return [];

    const pieces = await this.toPieces(segments, resolved.tokenBudget, signal);
    if (pieces.length === 0) return [];
    throwIfAborted(signal);

    let groups = this.greedyWalk(pieces, resolved);
    const firstPassCount = groups.length;
    if (resolved.doublePassMerge) {
      groups = this.mergeAdjacent(groups, resolved);
    }

    const drafts = groups.map((group, ordinal) => {
      const text = joinPieces(group);
      return {
        ordinal,
        text,
        tokenCount: this.tokenizer.count(text),
        pageStart: Math.min(...group.map((piece) => piece.page)),
        pageEnd: Math.max(...group.map((piece) => piece.page)),
        centroid: centroidOf(group),
      };
    });

    logger.debug(
      {
        segments: segments.length,
        pieces: pieces.length,
        firstPass: firstPassCount,
        chunks: drafts.length,
        tokenBudget: resolved.tokenBudget,
      },
      'Chunked segments'
    );

    return drafts;
  }

  private async toPieces(
    segments: readonly Segment[],
    tokenBudget: number,
    signal?: AbortSignal
  ): Promise<ChunkPiece[]> {
    const ordered = [...segments].sort((a, b) => a.order - b.order);
    const drafts: Array<Omit<ChunkPiece, 'embedding'>> = [];

    for (const segment of ordered) {
      const text = segment.text.trim();
      if (!text) continue;

      const tokenCount = this.tokenizer.count(text);
      const texts = tokenCount > tokenBudget ? hardSplit(text, tokenBudget, this.tokenizer) : [text];
      for (const pieceText of texts) {
        drafts.push({
          text: pieceText,
          tokenCount: this.tokenizer.count(pieceText),
          page: segment.page,
          segmentOrder: segment.order,
        });
      }
    }

    if (drafts.length === 0) return [];

    const embeddings = await this.embedder.embedBatch(
      drafts.map((draft) => draft.text),
      signal
    );
    if (embeddings.length !== drafts.length) {
      throw new ChunkingError(
        `Embedding count mismatch: ${embeddings.length} vectors for ${drafts.length} pieces`
      );
    }

    return drafts.map((draft, i) => ({ ...draft, embedding: embeddings[i] }));
  }

  private greedyWalk(pieces: ChunkPiece[], options: ChunkOptions): ChunkPiece[][] {
    const groups: ChunkPiece[][] = [];
    let current: ChunkPiece[] = [];

    for (const piece of pieces) {
      if (current.length === 0) {
        current = [piece];
        continue;
      }

      const fits = this.tokenizer.count(joinPieces([...current, piece])) <= options.tokenBudget;
      if (fits && isCoherent(centroidOf(current), piece.embedding, options.similarityThreshold)) {
        current.push(piece);
      } else {
        groups.push(current);
        current = [piece];
      }
    }
    if (current.length > 0) groups.push(current);

    return groups;
  }

  private mergeAdjacent(groups: ChunkPiece[][], options: ChunkOptions): ChunkPiece[][] {
    let result = groups;

    for (let pass = 0; pass < MAX_MERGE_PASSES; pass++) {
      const next: ChunkPiece[][] = [];
      let merged = false;

      for (const group of result) {
        const previous = next[next.length - 1];
        if (
          previous &&
          this.tokenizer.count(joinPieces([...previous, ...group])) <= options.tokenBudget &&
          isCoherent(centroidOf(previous), centroidOf(group), options.similarityThreshold)
        ) {
          next[next.length - 1] = [...previous, ...group];
          merged = true;
        } else {
          next.push(group);
        }
      }

      result = next;
      if (!merged) break;
    }

    return result;
  }
}

function validateOptions(options: ChunkOptions): void {
  if (!Number.isInteger(options.tokenBudget) || options.tokenBudget < 1) {
    throw new ChunkingError(`Token budget must be a positive integer, got ${options.tokenBudget}`);
  }
  if (!Number.isFinite(options.similarityThreshold)) {
    throw new ChunkingError(`Similarity threshold must be a number, got ${options.similarityThreshold}`);
  }
}
