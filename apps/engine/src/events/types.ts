import { InputValues, StageKind, TokenUsage } from '@plotline/sdk';
import { ErrorObject } from '../errors';
import type { RunState } from '../state/run-state';

export type OutputSource = 'fresh' | 'cache' | 'user' | 'transform';

export interface StagePlan {
    id: string;
    kind: StageKind;
    dependsOn: string[];
    optional: boolean;
    maxAttempts: number;
}

export interface Candidate {
    text: string;
    model: string;
    tokens: TokenUsage;
}

export type FeedbackSelection = { index: number } | { text: string };

export interface StageErrorRecord {
    stageId: string;
    attempt: number;
    name: string;
    message: string;
}

export type RunEventPayload =
    | {
        type: 'RunCreated';
        templateId: string;
        templateVersion: number;
        inputs: InputValues;
        scope: string;
        stages: StagePlan[];
    }
    | { type: 'RunStarted' }
    | { type: 'RunPaused' }
    | { type: 'RunResumed' }
    | {
        type: 'RunBranched';
        parentRunId: string;
        branchSequence: number;
        resetStages: string[];
        regenerate: boolean;
    }
    | { type: 'StageStarted'; stageId: string; attempt: number }
    | {
        type: 'StageAwaitingFeedback';
        stageId: string;
        attempt: number;
        prompt: string;
        candidates: Candidate[];
    }
    | {
        type: 'UserFeedbackRecorded';
        stageId: string;
        attempt: number;
        selection: FeedbackSelection;
        feedback?: string;
    }
    | {
        type: 'StageCompleted';
        stageId: string;
        attempt: number;
        output: string;
        source: OutputSource;
        model?: string;
        tokens?: TokenUsage;
        cacheKey?: string;
        durationMs: number;
    }
    | { type: 'StageRetried'; stageId: string; attempt: number; nextAttempt: number; delayMs: number; error: ErrorObject }
    | { type: 'StageFailed'; stageId: string; attempt: number; error: ErrorObject; cancelled: boolean }
    | { type: 'StageSkipped'; stageId: string; reason: 'dependency-failed'; cause: string }
    | { type: 'RunCompleted'; outputs: Record<string, string> }
    | { type: 'RunFailed'; reason: string; failedStage?: string; errors: StageErrorRecord[] }
    | { type: 'RunCancelled'; inFlight: string[] }
    | { type: 'StateSnapshot'; state: RunState };

export type RunEventType = RunEventPayload['type'];

export interface EventEnvelope {
    id: string;
    runId: string;
    sequence: number;
    timestamp: string;
}

export type RunEvent = RunEventPayload & EventEnvelope;

export type EventOf<T extends RunEventType> = Extract<RunEventPayload, { type: T }> & EventEnvelope;

export const RUN_EVENT_TYPES: readonly RunEventType[] = [
    'RunCreated',
    'RunStarted',
    'RunPaused',
    'RunResumed',
    'RunBranched',
    'StageStarted',
    'StageAwaitingFeedback',
    'UserFeedbackRecorded',
    'StageCompleted',
    'StageRetried',
    'StageFailed',
    'StageSkipped',
    'RunCompleted',
    'RunFailed',
    'RunCancelled',
    'StateSnapshot',
];

const TERMINAL_EVENTS: ReadonlySet<RunEventType> = new Set<RunEventType>(['RunCompleted', 'RunFailed', 'RunCancelled']);

export function isTerminalEvent(event: Pick<RunEvent, 'type'>): boolean {
    return TERMINAL_EVENTS.has(event.type);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

// Shape check for decoded log records; payload fields are trusted once the envelope is sound.
export function isRunEvent(value: unknown): value is RunEvent {
    if (!isRecord(value)) return false;
    const type = value.type;
    return (
        typeof type === 'string' &&
        RUN_EVENT_TYPES.some(t => t === type) &&
        typeof value.id === 'string' &&
        typeof value.runId === 'string' &&
        typeof value.sequence === 'number' &&
        typeof value.timestamp === 'string'
    );
}
