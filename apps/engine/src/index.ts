// public api for @plotline/engine
// usage:
//   import { createEngine } from '@plotline/engine';
//   const engine = await createEngine(capability);
//   engine.registerTemplate(article);
//   const runId = await engine.startRun('article', { topic: 'tide pools' });

export { Engine, createEngine, resolveInputs } from './engine';
export type { EngineOptions, StartRunOptions, BranchOptions, SubscribeOptions } from './engine';
export { loadConfig } from './config';
export type { EngineConfig } from './config';
export { installShutdownHooks } from './lifecycle';
export * from './errors';

export type {
    RunEvent,
    RunEventPayload,
    RunEventType,
    Candidate,
    FeedbackSelection,
    OutputSource,
    StageErrorRecord,
    StagePlan,
} from './events/types';
export { isTerminalEvent } from './events/types';
export type { ChunkNotice } from './events/event-bus';
export type { RunState, RunStatus, StageExecution, StageStatus } from './state/run-state';
export { foldEvent, replay } from './state/fold';

export { ResponseCache } from './cache/response-cache';
export { RedisCacheBackend, InMemoryCacheBackend } from './cache/redis-backend';
export type { RedisClient } from './cache/redis-backend';
export { deriveCacheKey, normalizePrompt } from './cache/cache-key';
export type { CacheBackend, CacheEntry, CacheStats, CachedGeneration } from './cache/types';

export { DependencyResolver } from './resolver/dependency-resolver';
export type { Decision } from './resolver/dependency-resolver';
export { validateTemplate, collectTemplateIssues } from './resolver/validate';

export { EventRepository } from './repositories/event.repository';
export { RunRepository } from './repositories/run.repository';
export { InMemoryEventSink, InMemoryRunCatalog } from './repositories/in-memory';
export type { EventSink, RunCatalog, RunRecord, StoredEvent } from './repositories/types';
export { createPool, createRedis, applySchema } from './db';
export type { SqlClient } from './db';
