export interface StageDocument {
  id: string;
  content: string;
}

export type StageRequest =
  | { kind: 'clean'; document: StageDocument }
  | { kind: 'summarize'; document: StageDocument }
  | { kind: 'synthesize'; topic: string; documents: StageDocument[] }
  | { kind: 'extractKeywords'; text: string };

export type StageKind = StageRequest['kind'];

export type StageFailureReason = 'budget_exceeded' | 'provider_error' | 'timeout' | 'empty_output';

export type StageResult =
  | { ok: true; content: string; model: string }
  | { ok: false; reason: StageFailureReason; message: string };

export interface StageRunner {
  runStage(request: StageRequest): Promise<StageResult>;
}
