/**
 * Cluster pipeline.
 *
 * Step 1: Fetch transcripts, one source at a time, persisting after each
 * Step 2: Clean transcripts (LLM, only when requested; failures keep the original)
 * Step 3: Synthesize one report over every document (LLM, fatal on failure)
 * Step 4: Extract keywords and link them into the report
 *
 * Every mutation of the WorkUnit is persisted before the next step starts, so
 * a run can resume from the stored status.
 */

import { getErrorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { ArtifactService } from '../artifacts';
import { assertTransition, isTerminalStatus, type WorkUnit } from '../clusters/cluster.types';
import type { ClusterStore } from '../clusters/clusterStore';
import { type ProgressReporter, silentReporter } from '../progress/progress';
import type { DocumentSource } from '../sources/source.interface';
import type { StageRunner } from '../stages/stage.types';
import { pendingCleanIds, shouldRunStep } from './checkpoint';
import {
  ClusterNotFoundError,
  InvalidTransitionError,
  NoDocumentsError,
  StageFailedError,
  StorageUnavailableError,
} from './errors';
import { cleanLabel, fetchLabel, STEP_LABELS } from './stages';
import { addWikiLinks, parseKeywords } from './wikilinks';

export interface PipelineDeps {
  store: ClusterStore;
  source: DocumentSource;
  stages: StageRunner;
  artifacts: ArtifactService;
}

/** ISO timestamp strictly after `previous`, even when the clock has not moved. */
export function nextTimestamp(previous: string): string {
  const last = Date.parse(previous);
  const now = Date.now();
  return new Date(Number.isNaN(last) ? now : Math.max(now, last + 1)).toISOString();
}

/**
 * Fetch a document, treating every failure as "unavailable".
 */
export async function fetchSourceDocument(
  source: DocumentSource,
  documentId: string,
): Promise<string | null> {
  try {
    const content = await source.fetchDocument(documentId);
    if (!content) {
      logger.warn({ documentId, source: source.name }, 'Source has no content for document');
      return null;
    }
    return content;
  } catch (error) {
    logger.warn({ error, documentId, source: source.name }, 'Source unavailable, skipping document');
    return null;
  }
}

export class ClusterPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  /**
   * Drive a stored cluster to a terminal status. A completed unit is returned
   * unchanged; steps the stored status has already passed are skipped.
   */
  async run(sessionId: string, reporter: ProgressReporter = silentReporter): Promise<WorkUnit> {
    const stored = await this.deps.store.get(sessionId);
    if (!stored) throw new ClusterNotFoundError(sessionId);
    if (stored.status === 'completed') {
      logger.info({ sessionId }, 'Cluster already completed, nothing to do');
      return stored;
    }
    if (stored.status === 'failed') {
      throw new InvalidTransitionError(stored.status, 'processing');
    }

    let unit = stored;
    try {
      if (unit.status === 'pending') {
        unit = await this.commit(unit, { status: 'processing' });
      }

      if (shouldRunStep(unit, 'fetch')) {
        unit = await this.fetchDocuments(unit, reporter);
        unit = await this.commit(unit, { status: 'transcripts_ready' });
      } else {
        logger.info({ sessionId, status: unit.status }, 'Transcripts already fetched, skipping');
      }

      if (shouldRunStep(unit, 'clean')) {
        unit = await this.cleanDocuments(unit, reporter);
        unit = await this.commit(unit, { status: 'cleaned_ready' });
      }

      unit = await this.synthesize(unit, reporter);
    } catch (error) {
      if (!(error instanceof StorageUnavailableError)) {
        await this.markFailed(unit, error);
      }
      throw error;
    }

    await this.deps.artifacts.saveReport(unit);
    logger.info(
      { sessionId, documents: Object.keys(unit.rawDocuments).length, keywords: unit.keywords?.length ?? 0 },
      'Cluster pipeline completed',
    );
    return unit;
  }

  private async fetchDocuments(unit: WorkUnit, reporter: ProgressReporter): Promise<WorkUnit> {
    const total = unit.sourceRefs.length;
    await reporter.begin(total, STEP_LABELS.fetch);

    let current = unit;
    for (const [index, ref] of unit.sourceRefs.entries()) {
      const documentId = this.deps.source.resolveDocumentId(ref);

      if (!documentId) {
        logger.warn({ sessionId: unit.sessionId, ref }, 'Source reference did not resolve, skipping');
      } else if (Object.hasOwn(current.rawDocuments, documentId)) {
        logger.debug({ sessionId: unit.sessionId, documentId }, 'Document already fetched');
      } else {
        const content = await fetchSourceDocument(this.deps.source, documentId);
        if (content) {
          current = await this.commit(current, {
            rawDocuments: { ...current.rawDocuments, [documentId]: content },
          });
          await this.deps.artifacts.saveTranscript(documentId, content);
        }
      }

      await reporter.advance(fetchLabel(index + 1, total, documentId));
    }
    return current;
  }

  private async cleanDocuments(unit: WorkUnit, reporter: ProgressReporter): Promise<WorkUnit> {
    const pending = pendingCleanIds(unit);
    let current = unit;

    for (const [index, documentId] of pending.entries()) {
      await reporter.status(cleanLabel(index + 1, pending.length, documentId));
      const original = current.rawDocuments[documentId];
      const result = await this.deps.stages.runStage({
        kind: 'clean',
        document: { id: documentId, content: original },
      });

      if (!result.ok) {
        logger.warn(
          { sessionId: unit.sessionId, documentId, reason: result.reason, message: result.message },
          'Clean stage failed, keeping original transcript',
        );
      }

      current = await this.commit(current, {
        enrichedDocuments: {
          ...current.enrichedDocuments,
          [documentId]: result.ok ? result.content : original,
        },
      });
    }
    return current;
  }

  private async synthesize(unit: WorkUnit, reporter: ProgressReporter): Promise<WorkUnit> {
    const source =
      Object.keys(unit.enrichedDocuments).length > 0 ? unit.enrichedDocuments : unit.rawDocuments;
    const documents = Object.entries(source).map(([id, content]) => ({ id, content }));
    if (documents.length === 0) {
      throw new NoDocumentsError(unit.sessionId);
    }

    await reporter.status(STEP_LABELS.synthesize);
    const result = await this.deps.stages.runStage({
      kind: 'synthesize',
      topic: unit.name,
      documents,
    });
    if (!result.ok) {
      throw new StageFailedError('synthesize', result.reason, result.message);
    }

    const keywords = await this.extractKeywords(unit.sessionId, result.content);
    return this.commit(unit, {
      status: 'completed',
      synthesis: addWikiLinks(result.content, keywords),
      keywords,
    });
  }

  private async extractKeywords(sessionId: string, text: string): Promise<string[]> {
    const result = await this.deps.stages.runStage({ kind: 'extractKeywords', text });
    if (!result.ok) {
      logger.warn(
        { sessionId, reason: result.reason, message: result.message },
        'Keyword extraction failed, report will not be linked',
      );
      return [];
    }
    return parseKeywords(result.content);
  }

  /**
   * Steps commit as they go, so the stored record is newer than the caller's
   * copy whenever a step throws part way through.
   */
  private async markFailed(unit: WorkUnit, error: unknown): Promise<void> {
    try {
      const latest = (await this.deps.store.get(unit.sessionId)) ?? unit;
      if (isTerminalStatus(latest.status)) return;
      await this.commit(latest, { status: 'failed', error: getErrorMessage(error) });
    } catch (persistError) {
      logger.error({ error: persistError, sessionId: unit.sessionId }, 'Failed to persist failed status');
    }
  }

  private async commit(unit: WorkUnit, patch: Partial<WorkUnit>): Promise<WorkUnit> {
    const next: WorkUnit = { ...unit, ...patch, updatedAt: nextTimestamp(unit.updatedAt) };
    assertTransition(unit.status, next.status);
    await this.deps.store.put(next.sessionId, next);
    return next;
  }
}
