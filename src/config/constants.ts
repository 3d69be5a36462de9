// Redis key layout
export const CLUSTER_KEY_PREFIX = 'cluster:';
export const TASK_KEY_PREFIX = 'task:';
export const SESSION_LOCK_PREFIX = 'lock:cluster:';

// Advisory lock held while a run owns a cluster session
export const SESSION_LOCK_TTL_SECONDS = 6 * 3600;

// Task queue
export const PIPELINE_STREAM = 'pipeline:stream';
export const PIPELINE_GROUP = 'pipeline-workers';

// Cluster request limits
export const MAX_CLUSTER_NAME_LENGTH = 100;
export const MAX_SOURCES_PER_CLUSTER = 50;

// Keyword linking
export const MIN_KEYWORD_LENGTH = 3;
