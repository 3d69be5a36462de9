import { countWords } from '../../utils/transcript';
import { logger } from '../../utils/logger';
import type { ArtifactService } from '../artifacts';
import { type ProgressReporter, silentReporter } from '../progress/progress';
import type { DocumentSource } from '../sources/source.interface';
import type { StageRunner } from '../stages/stage.types';
import type { DocumentTaskResult } from '../tasks/task.types';
import { InputInvalidError, SourceUnavailableError, StageFailedError } from './errors';

export interface DocumentPipelineDeps {
  source: DocumentSource;
  stages: StageRunner;
  artifacts: ArtifactService;
}

export interface DocumentRunOptions {
  sourceRef: string;
  cleanRequested: boolean;
}

/**
 * Single-document run: fetch, optional clean, summarize. Artifacts are
 * written for the transcript and the summary; nothing else is persisted.
 */
export class DocumentPipeline {
  constructor(private readonly deps: DocumentPipelineDeps) {}

  async run(
    { sourceRef, cleanRequested }: DocumentRunOptions,
    reporter: ProgressReporter = silentReporter,
  ): Promise<DocumentTaskResult> {
    const documentId = this.deps.source.resolveDocumentId(sourceRef);
    if (!documentId) throw new InputInvalidError(sourceRef);

    const total = cleanRequested ? 3 : 2;
    await reporter.begin(total, `Fetching transcript: ${documentId}`);

    let transcript: string | null;
    try {
      transcript = await this.deps.source.fetchDocument(documentId);
    } catch (error) {
      if (error instanceof SourceUnavailableError) throw error;
      throw new SourceUnavailableError(documentId, { cause: error });
    }
    if (!transcript) throw new SourceUnavailableError(documentId);
    await reporter.advance('Fetched transcript');

    let text = transcript;
    let cleaned = false;
    if (cleanRequested) {
      const result = await this.deps.stages.runStage({
        kind: 'clean',
        document: { id: documentId, content: transcript },
      });
      if (result.ok) {
        text = result.content;
        cleaned = true;
      } else {
        logger.warn(
          { documentId, reason: result.reason, message: result.message },
          'Clean stage failed, summarizing original transcript',
        );
      }
      await reporter.advance(cleaned ? 'Cleaned transcript' : 'Kept original transcript');
    }
    await this.deps.artifacts.saveTranscript(documentId, text);

    const summary = await this.deps.stages.runStage({
      kind: 'summarize',
      document: { id: documentId, content: text },
    });
    if (!summary.ok) {
      throw new StageFailedError('summarize', summary.reason, summary.message);
    }
    await this.deps.artifacts.saveSummary(documentId, summary.content);
    await reporter.advance('Summary ready');

    return {
      documentId,
      wordCount: countWords(text),
      characterCount: text.length,
      cleaned,
      summary: summary.content,
      model: summary.model,
    };
  }
}
