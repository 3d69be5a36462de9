import { logger } from '../utils/logger';
import type { WorkUnit } from './clusters/cluster.types';
import type { ArtifactStorage } from './storage/interface';

export type DocumentArtifactKind = 'transcript' | 'summary';

export function documentArtifactKey(documentId: string, kind: DocumentArtifactKind): string {
  return `${documentId}_${kind}.md`;
}

export function reportArtifactKey(sessionId: string): string {
  return `${sessionId}_report.md`;
}

export function formatTranscript(documentId: string, transcript: string, generatedAt: Date): string {
  return `# Transcript: ${documentId}

**Generated:** ${generatedAt.toISOString()}

---

${transcript}
`;
}

export function formatSummary(documentId: string, summary: string, generatedAt: Date): string {
  return `# Summary: ${documentId}

**Generated:** ${generatedAt.toISOString()}

---

${summary}
`;
}

export function formatReport(unit: WorkUnit, generatedAt: Date): string {
  const videoCount = Object.keys(unit.rawDocuments).length;
  const keywords = unit.keywords && unit.keywords.length > 0 ? unit.keywords.join(', ') : 'none';
  return `# ${unit.name}

**Generated:** ${generatedAt.toISOString()}
**Session:** ${unit.sessionId}
**Videos:** ${videoCount}
**Keywords:** ${keywords}

---

${unit.synthesis ?? ''}
`;
}

/**
 * Writes and reads Markdown artifacts. Write failures are logged and
 * reported as false; the pipeline result does not depend on them.
 */
export class ArtifactService {
  constructor(private readonly storage: ArtifactStorage) {}

  async saveTranscript(documentId: string, transcript: string): Promise<boolean> {
    return this.save(documentArtifactKey(documentId, 'transcript'), formatTranscript(documentId, transcript, new Date()));
  }

  async saveSummary(documentId: string, summary: string): Promise<boolean> {
    return this.save(documentArtifactKey(documentId, 'summary'), formatSummary(documentId, summary, new Date()));
  }

  async saveReport(unit: WorkUnit): Promise<boolean> {
    return this.save(reportArtifactKey(unit.sessionId), formatReport(unit, new Date()));
  }

  async readDocumentArtifact(documentId: string, kind: DocumentArtifactKind): Promise<string | null> {
    return this.storage.read(documentArtifactKey(documentId, kind));
  }

  async readReport(sessionId: string): Promise<string | null> {
    return this.storage.read(reportArtifactKey(sessionId));
  }

  async isHealthy(): Promise<boolean> {
    return this.storage.healthCheck();
  }

  private async save(key: string, content: string): Promise<boolean> {
    try {
      await this.storage.write(key, content);
      logger.debug({ key }, 'Artifact written');
      return true;
    } catch (error) {
      logger.error({ error, key }, 'Failed to write artifact');
      return false;
    }
  }
}
