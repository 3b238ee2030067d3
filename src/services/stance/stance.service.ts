import { mapWithConcurrency } from '../../lib/semaphore';
import { assessStancePrompt } from '../../prompts/stance';
import { JudgmentParseError, OperationCancelledError } from '../../utils/errors';
import { errorMessage, logger } from '../../utils/logger';
import { throwIfAborted } from '../../utils/retry';
import type { Evidence } from '../retriever/retriever.types';
import { aggregateScores, scoredItems } from './aggregate';
import type { JudgmentModel } from './judgment.interface';
import { parseJudgment } from './stance.schema';
import type {
  AssessOptions,
  Judgment,
  JudgedEvidence,
  StanceDiagnostic,
  StanceVerdict,
  StanceWeighting,
} from './stance.types';

export interface StanceAggregatorOptions {
  concurrency: number;
  weighting: StanceWeighting;
}

/**
 * Judges each evidence item independently and aggregates the valid scores.
 * A malformed or failed judgment excludes only that item.
 */
export class StanceAggregator {
  constructor(
    private readonly model: JudgmentModel,
    private readonly options: StanceAggregatorOptions
  ) {}

  /**
   * Judge one passage. Throws JudgmentParseError on malformed output.
   */
  async judgeOne(
    question: string,
    evidence: string,
    subject?: string,
    signal?: AbortSignal
  ): Promise<Judgment> {
    const prompt = assessStancePrompt.build({ question, evidence, subject });
    const raw = await this.model.judge(prompt, signal);
    return parseJudgment(raw);
  }

  async assess(
    evidence: readonly Evidence[],
    question: string,
    options: AssessOptions = {}
  ): Promise<StanceVerdict> {
    const { subject, signal } = options;
    throwIfAborted(signal);

    const diagnostics: StanceDiagnostic[] = [];
    const judged = await mapWithConcurrency(
      evidence,
      this.options.concurrency,
      async (item, position): Promise<JudgedEvidence> => {
        try {
          const judgment = await this.judgeOne(question, item.chunk.text, subject, signal);
          return { ...item, stance: judgment.score, rationale: judgment.reason };
        } catch (error) {
          if (error instanceof OperationCancelledError || signal?.aborted) {
            throw error;
          }
          diagnostics.push({
            position,
            chunkId: item.chunk.id,
            documentId: item.chunk.documentId,
            kind: error instanceof JudgmentParseError ? 'parse_error' : 'judge_error',
            message: errorMessage(error),
          });
          logger.warn(
            { position, chunkId: item.chunk.id, model: this.model.name, error: errorMessage(error) },
            'Evidence item excluded from stance'
          );
          return { ...item, stance: null, rationale: null };
        }
      },
      signal
    );

    diagnostics.sort((a, b) => a.position - b.position);
    const result = aggregateScores(scoredItems(judged), this.options.weighting);

    logger.info(
      {
        promptId: assessStancePrompt.id,
        promptVersion: assessStancePrompt.version,
        items: judged.length,
        valid: result.validCount,
        score: result.score,
        confidence: result.confidence,
      },
      'Stance assessed'
    );

    return {
      question,
      ...(subject !== undefined && { subject }),
      ...result,
      excludedCount: judged.length - result.validCount,
      weighting: this.options.weighting,
      diagnostics,
      evidence: judged,
    };
  }
}
