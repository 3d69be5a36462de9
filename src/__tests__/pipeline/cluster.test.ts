import { beforeEach, describe, expect, test } from 'vitest';
import {
  ClusterNotFoundError,
  InvalidTransitionError,
  NoDocumentsError,
  StageFailedError,
  StorageUnavailableError,
} from '../../services/pipeline/errors';
import { ProgressChannel, TaskProgressReporter } from '../../services/progress/progress';
import { makeWorkUnit } from '../helpers/factories';
import { createPipelineFixture } from './helpers';

describe('ClusterPipeline', () => {
  let fixture: ReturnType<typeof createPipelineFixture>;

  beforeEach(() => {
    fixture = createPipelineFixture();
    fixture.source.set('vid-1', 'first transcript');
    fixture.source.set('vid-2', 'second transcript');
    fixture.source.set('vid-3', 'third transcript');
  });

  test('skips an unavailable source and keeps the rest', async () => {
    fixture.source.set('vid-2', new Error('HTTP 404'));
    const unit = makeWorkUnit({ sourceRefs: ['vid-1', 'vid-2', 'vid-3'] });
    await fixture.store.put(unit.sessionId, unit);

    const result = await fixture.clusterPipeline.run(unit.sessionId);

    expect(Object.keys(result.rawDocuments)).toEqual(['vid-1', 'vid-3']);
    expect(result.status).toBe('completed');
    expect(fixture.statusHistory(unit.sessionId)).toEqual([
      'pending',
      'processing',
      'processing',
      'processing',
      'transcripts_ready',
      'completed',
    ]);
  });

  test('skips a reference that does not resolve', async () => {
    const unit = makeWorkUnit({ sourceRefs: ['vid-1', 'not a video'] });
    await fixture.store.put(unit.sessionId, unit);

    const result = await fixture.clusterPipeline.run(unit.sessionId);

    expect(Object.keys(result.rawDocuments)).toEqual(['vid-1']);
    expect(fixture.source.fetched).toEqual(['vid-1']);
  });

  test('fetches and cleans a document whose id matches an Object.prototype member', async () => {
    fixture.source.set('constructor', 'prototype-named transcript');
    const unit = makeWorkUnit({ sourceRefs: ['vid-1', 'constructor'], cleanRequested: true });
    await fixture.store.put(unit.sessionId, unit);

    const result = await fixture.clusterPipeline.run(unit.sessionId);

    expect(fixture.source.fetched).toEqual(['vid-1', 'constructor']);
    expect(Object.keys(result.rawDocuments)).toEqual(['vid-1', 'constructor']);
    expect(Object.keys(result.enrichedDocuments)).toEqual(['vid-1', 'constructor']);
  });

  test('keeps documents committed before a step throws when marking the unit failed', async () => {
    const unit = makeWorkUnit({ sourceRefs: ['vid-1', 'vid-2', 'vid-3'] });
    await fixture.store.put(unit.sessionId, unit);
    let advances = 0;
    const reporter = {
      begin: async () => {},
      status: async () => {},
      advance: async () => {
        advances += 1;
        if (advances === 2) throw new Error('reporter offline');
      },
    };

    await expect(fixture.clusterPipeline.run(unit.sessionId, reporter)).rejects.toThrow('reporter offline');

    const stored = await fixture.store.get(unit.sessionId);
    expect(stored?.status).toBe('failed');
    expect(stored?.error).toBe('reporter offline');
    expect(stored?.rawDocuments).toEqual({ 'vid-1': 'first transcript', 'vid-2': 'second transcript' });
  });

  test('advances updatedAt on every persisted mutation', async () => {
    const unit = makeWorkUnit({ sourceRefs: ['vid-1', 'vid-2'], cleanRequested: true });
    await fixture.store.put(unit.sessionId, unit);

    await fixture.clusterPipeline.run(unit.sessionId);

    const stamps = fixture.updatedAtHistory(unit.sessionId);
    for (let i = 1; i < stamps.length; i++) {
      expect(Date.parse(stamps[i])).toBeGreaterThan(Date.parse(stamps[i - 1]));
    }
  });

  test('emits progress after every source attempt', async () => {
    fixture.source.set('vid-2', null);
    const unit = makeWorkUnit({ sourceRefs: ['vid-1', 'vid-2', 'vid-3'] });
    await fixture.store.put(unit.sessionId, unit);
    const channel = new ProgressChannel();
    const seen: Array<[number, number, string]> = [];
    channel.subscribe((event) => {
      if (event.type === 'progress') {
        seen.push([event.progress.current, event.progress.total, event.progress.label]);
      }
    });

    await fixture.clusterPipeline.run(unit.sessionId, new TaskProgressReporter(channel, 'task-1'));

    expect(seen).toEqual([
      [0, 3, 'Fetching transcripts'],
      [1, 3, 'Fetching transcripts (1/3): vid-1'],
      [2, 3, 'Fetching transcripts (2/3): vid-2'],
      [3, 3, 'Fetching transcripts (3/3): vid-3'],
      [3, 3, 'Synthesizing report'],
    ]);
  });

  test('falls back to the original transcript when cleaning fails', async () => {
    fixture.source.set('vid-1', 'alpha transcript');
    fixture.source.set('vid-2', 'beta transcript');
    fixture.provider.respond('clean', async (prompt) => {
      if (prompt.includes('alpha transcript')) return 'Alpha cleaned.';
      throw new Error('model overloaded');
    });
    const unit = makeWorkUnit({ sourceRefs: ['vid-1', 'vid-2'], cleanRequested: true });
    await fixture.store.put(unit.sessionId, unit);

    const result = await fixture.clusterPipeline.run(unit.sessionId);

    expect(result.enrichedDocuments).toEqual({ 'vid-1': 'Alpha cleaned.', 'vid-2': 'beta transcript' });
    expect(Object.keys(result.enrichedDocuments)).toEqual(Object.keys(result.rawDocuments));
    expect(fixture.statusHistory(unit.sessionId)).toContain('cleaned_ready');

    const synthesisPrompt = fixture.provider.callsFor('synthesize')[0].prompt;
    expect(synthesisPrompt).toContain('Alpha cleaned.');
    expect(synthesisPrompt).toContain('beta transcript');
  });

  test('marks the unit failed when synthesis fails and keeps fetched documents', async () => {
    fixture.provider.respond('synthesize', new Error('upstream 500'));
    const unit = makeWorkUnit({ sourceRefs: ['vid-1', 'vid-2'] });
    await fixture.store.put(unit.sessionId, unit);

    await expect(fixture.clusterPipeline.run(unit.sessionId)).rejects.toBeInstanceOf(StageFailedError);

    const stored = await fixture.store.get(unit.sessionId);
    expect(stored?.status).toBe('failed');
    expect(stored?.error).toBe('synthesize stage failed (provider_error): upstream 500');
    expect(stored?.synthesis).toBeUndefined();
    expect(stored?.rawDocuments).toEqual({ 'vid-1': 'first transcript', 'vid-2': 'second transcript' });
  });

  test('fails with NoDocumentsError when nothing could be fetched', async () => {
    fixture.source.set('vid-1', null);
    fixture.source.set('vid-2', new Error('timeout'));
    const unit = makeWorkUnit({ sourceRefs: ['vid-1', 'vid-2'] });
    await fixture.store.put(unit.sessionId, unit);

    await expect(fixture.clusterPipeline.run(unit.sessionId)).rejects.toBeInstanceOf(NoDocumentsError);

    const stored = await fixture.store.get(unit.sessionId);
    expect(stored?.status).toBe('failed');
    expect(stored?.error).toBe(`Cluster ${unit.sessionId} has no documents to synthesize`);
    expect(fixture.provider.callsFor('synthesize')).toHaveLength(0);
  });

  test('links extracted keywords into the synthesis', async () => {
    fixture.provider.respond('synthesize', 'Transformers changed NLP. A transformer model uses attention.');
    fixture.provider.respond('extractKeywords', 'attention, transformer model, NLP, ai');
    const unit = makeWorkUnit({ sourceRefs: ['vid-1'] });
    await fixture.store.put(unit.sessionId, unit);

    const result = await fixture.clusterPipeline.run(unit.sessionId);

    expect(result.keywords).toEqual(['attention', 'transformer model', 'NLP']);
    expect(result.synthesis).toBe(
      'Transformers changed [[NLP]]. A [[transformer model]] uses [[attention]].',
    );
  });

  test('completes without links when keyword extraction fails', async () => {
    fixture.provider.respond('synthesize', 'Plain report.');
    fixture.provider.respond('extractKeywords', new Error('rate limited'));
    const unit = makeWorkUnit({ sourceRefs: ['vid-1'] });
    await fixture.store.put(unit.sessionId, unit);

    const result = await fixture.clusterPipeline.run(unit.sessionId);

    expect(result.status).toBe('completed');
    expect(result.synthesis).toBe('Plain report.');
    expect(result.keywords).toEqual([]);
  });

  test('writes the report and transcript artifacts', async () => {
    const unit = makeWorkUnit({ name: 'Topic A', sourceRefs: ['vid-1', 'vid-2'] });
    await fixture.store.put(unit.sessionId, unit);

    await fixture.clusterPipeline.run(unit.sessionId);

    const report = fixture.storage.files.get(`${unit.sessionId}_report.md`);
    expect(report?.startsWith('# Topic A\n')).toBe(true);
    expect(report).toContain(`**Session:** ${unit.sessionId}\n**Videos:** 2\n`);
    expect(report?.endsWith('synthesis text\n')).toBe(true);
    expect(fixture.storage.files.has('vid-1_transcript.md')).toBe(true);
  });

  test('completes even when artifacts cannot be written', async () => {
    fixture.storage.failWrites = true;
    const unit = makeWorkUnit({ sourceRefs: ['vid-1'] });
    await fixture.store.put(unit.sessionId, unit);

    const result = await fixture.clusterPipeline.run(unit.sessionId);

    expect(result.status).toBe('completed');
  });

  test('stops without marking failure when storage goes away', async () => {
    const unit = makeWorkUnit({ sourceRefs: ['vid-1'] });
    await fixture.store.put(unit.sessionId, unit);
    fixture.kv.failWrites = true;

    await expect(fixture.clusterPipeline.run(unit.sessionId)).rejects.toBeInstanceOf(StorageUnavailableError);

    expect(fixture.statusHistory(unit.sessionId)).toEqual(['pending']);
  });

  test('rejects an unknown session', async () => {
    await expect(fixture.clusterPipeline.run('00000000-0000-4000-8000-000000000000')).rejects.toBeInstanceOf(
      ClusterNotFoundError,
    );
  });

  describe('resumption', () => {
    test('returns a completed unit untouched', async () => {
      const unit = makeWorkUnit({ status: 'completed', rawDocuments: { 'vid-1': 'x' }, synthesis: 'done' });
      await fixture.store.put(unit.sessionId, unit);

      const result = await fixture.clusterPipeline.run(unit.sessionId);

      expect(result).toEqual(unit);
      expect(fixture.provider.calls).toHaveLength(0);
      expect(fixture.statusHistory(unit.sessionId)).toEqual(['completed']);
    });

    test('refuses to rerun a failed unit', async () => {
      const unit = makeWorkUnit({ status: 'failed', error: 'earlier failure' });
      await fixture.store.put(unit.sessionId, unit);

      await expect(fixture.clusterPipeline.run(unit.sessionId)).rejects.toBeInstanceOf(InvalidTransitionError);
    });

    test('fetches only the documents still missing', async () => {
      const unit = makeWorkUnit({
        status: 'processing',
        sourceRefs: ['vid-1', 'vid-2'],
        rawDocuments: { 'vid-1': 'stored transcript' },
      });
      await fixture.store.put(unit.sessionId, unit);

      const result = await fixture.clusterPipeline.run(unit.sessionId);

      expect(fixture.source.fetched).toEqual(['vid-2']);
      expect(result.rawDocuments).toEqual({ 'vid-1': 'stored transcript', 'vid-2': 'second transcript' });
    });

    test('skips fetching once transcripts are ready', async () => {
      const unit = makeWorkUnit({
        status: 'transcripts_ready',
        sourceRefs: ['vid-1', 'vid-2'],
        rawDocuments: { 'vid-1': 'stored transcript' },
      });
      await fixture.store.put(unit.sessionId, unit);

      const result = await fixture.clusterPipeline.run(unit.sessionId);

      expect(fixture.source.fetched).toEqual([]);
      expect(result.status).toBe('completed');
    });

    test('cleans only documents without an enriched version', async () => {
      const unit = makeWorkUnit({
        status: 'transcripts_ready',
        cleanRequested: true,
        sourceRefs: ['vid-1', 'vid-2'],
        rawDocuments: { 'vid-1': 'one', 'vid-2': 'two' },
        enrichedDocuments: { 'vid-1': 'One.' },
      });
      await fixture.store.put(unit.sessionId, unit);

      const result = await fixture.clusterPipeline.run(unit.sessionId);

      expect(fixture.provider.callsFor('clean')).toHaveLength(1);
      expect(result.enrichedDocuments).toEqual({ 'vid-1': 'One.', 'vid-2': 'cleaned text' });
    });
  });
});
