import { z } from 'zod';

export const taskProgressSchema = z.object({
  current: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  label: z.string(),
});

export const clusterTaskResultSchema = z.object({
  sessionId: z.string(),
  status: z.string(),
  processedCount: z.number().int(),
  totalCount: z.number().int(),
  keywords: z.array(z.string()),
});

export const documentTaskResultSchema = z.object({
  documentId: z.string(),
  wordCount: z.number().int(),
  characterCount: z.number().int(),
  cleaned: z.boolean(),
  summary: z.string(),
  model: z.string(),
});

export const taskResultSchema = z.union([clusterTaskResultSchema, documentTaskResultSchema]);

export const taskErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
});

const taskBase = {
  taskId: z.string().uuid(),
  kind: z.enum(['cluster', 'document']),
  sessionId: z.string().optional(),
  progress: taskProgressSchema.optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
};

export const taskHandleSchema = z.discriminatedUnion('state', [
  z.object({ ...taskBase, state: z.literal('pending') }),
  z.object({ ...taskBase, state: z.literal('running') }),
  z.object({ ...taskBase, state: z.literal('succeeded'), result: taskResultSchema }),
  z.object({ ...taskBase, state: z.literal('failed'), error: taskErrorSchema }),
]);

export type TaskProgress = z.infer<typeof taskProgressSchema>;
export type ClusterTaskResult = z.infer<typeof clusterTaskResultSchema>;
export type DocumentTaskResult = z.infer<typeof documentTaskResultSchema>;
export type TaskResult = z.infer<typeof taskResultSchema>;
export type TaskError = z.infer<typeof taskErrorSchema>;
export type TaskHandle = z.infer<typeof taskHandleSchema>;
export type TaskKind = TaskHandle['kind'];
export type TaskState = TaskHandle['state'];

export function isTerminalTask(task: TaskHandle): boolean {
  return task.state === 'succeeded' || task.state === 'failed';
}

/** Work item carried on the pipeline stream. */
export type TaskMessage =
  | { kind: 'cluster'; taskId: string; sessionId: string }
  | { kind: 'document'; taskId: string; sourceRef: string; cleanRequested: boolean };

const taskMessageSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('cluster'), taskId: z.string(), sessionId: z.string() }),
  z.object({
    kind: z.literal('document'),
    taskId: z.string(),
    sourceRef: z.string(),
    cleanRequested: z.enum(['true', 'false']).transform((value) => value === 'true'),
  }),
]);

export function serializeTaskMessage(message: TaskMessage): Record<string, string> {
  if (message.kind === 'cluster') {
    return { kind: message.kind, taskId: message.taskId, sessionId: message.sessionId };
  }
  return {
    kind: message.kind,
    taskId: message.taskId,
    sourceRef: message.sourceRef,
    cleanRequested: String(message.cleanRequested),
  };
}

export function parseTaskMessage(fields: Record<string, string>): TaskMessage | null {
  const parsed = taskMessageSchema.safeParse(fields);
  return parsed.success ? parsed.data : null;
}
