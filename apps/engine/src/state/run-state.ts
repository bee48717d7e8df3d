import { InputValues, StageKind, TokenUsage } from '@plotline/sdk';
import { ErrorObject } from '../errors';
import { Candidate, OutputSource, StageErrorRecord } from '../events/types';

export type RunStatus = 'pending' | 'running' | 'paused' | 'completed' | 'failed' | 'cancelled';

export type StageStatus = 'waiting' | 'running' | 'completed' | 'failed' | 'skipped' | 'cancelled';

export interface StageExecution {
    stageId: string;
    kind: StageKind;
    dependsOn: string[];
    optional: boolean;
    maxAttempts: number;
    status: StageStatus;
    attempt: number;
    /** Set while a failed attempt waits out its backoff. */
    willRetry: boolean;
    awaitingFeedback: boolean;
    bypassCache: boolean;
    errors: StageErrorRecord[];
    startedAt?: string;
    completedAt?: string;
    output?: string;
    source?: OutputSource;
    model?: string;
    tokens?: TokenUsage;
    cacheKey?: string;
    prompt?: string;
    candidates?: Candidate[];
    feedback?: string;
    lastError?: ErrorObject;
    skippedBecause?: string;
}

export interface RunFailure {
    reason: string;
    failedStage?: string;
    errors: StageErrorRecord[];
}

export interface RunState {
    runId: string;
    templateId: string;
    templateVersion: number;
    scope: string;
    inputs: InputValues;
    status: RunStatus;
    createdAt: string;
    startedAt?: string;
    completedAt?: string;
    parentRunId?: string;
    branchSequence?: number;
    stageOrder: string[];
    stages: Record<string, StageExecution>;
    outputs: Record<string, string>;
    tokenUsage: { fresh: TokenUsage; cached: TokenUsage };
    failure?: RunFailure;
    cancelledInFlight?: string[];
    lastSequence: number;
    eventsSinceSnapshot: number;
}

const TERMINAL_RUN: ReadonlySet<RunStatus> = new Set<RunStatus>(['completed', 'failed', 'cancelled']);

export function isTerminalRun(status: RunStatus): boolean {
    return TERMINAL_RUN.has(status);
}

export function isSettledStage(stage: Pick<StageExecution, 'status' | 'willRetry'>): boolean {
    switch (stage.status) {
        case 'completed':
        case 'skipped':
        case 'cancelled':
            return true;
        case 'failed':
            return !stage.willRetry;
        default:
            return false;
    }
}

/** Stages whose final failure decides the run: failed, out of retries, not optional. */
export function requiredFailures(state: RunState): StageExecution[] {
    return state.stageOrder
        .map(id => state.stages[id])
        .filter(stage => stage.status === 'failed' && !stage.willRetry && !stage.optional);
}
