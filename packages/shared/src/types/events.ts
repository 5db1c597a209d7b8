/**
 * Base interface for all patchfix events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the reconciliation run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when reconciliation of a single patch begins.
 */
export interface ReconcileStarted extends BaseEvent {
  type: 'ReconcileStarted';
  payload: {
    /** Patch being reconciled (file name or label) */
    patchName: string;
    /** Number of file entries in the patch */
    fileCount: number;
    maxAttempts: number;
  };
}

/**
 * Emitted after every pass of the apply facility, for the original patch
 * (attempt 0) and for every candidate.
 */
export interface PatchApplyAttempted extends BaseEvent {
  type: 'PatchApplyAttempted';
  payload: {
    attempt: number;
    clean: string[];
    offset: string[];
    rejected: string[];
  };
}

/** Emitted when a fresh reconciliation context has been built */
export interface ContextBuilt extends BaseEvent {
  type: 'ContextBuilt';
  payload: {
    attempt: number;
    /** Number of files described in the context */
    fileCount: number;
    /** Number of rejected hunks with expected-vs-actual detail */
    rejectedHunkCount: number;
    /** Whether the context carries a failure signal from the previous attempt */
    hasFailureSignal: boolean;
  };
}

/** Emitted right before the fix generator is invoked */
export interface CandidateRequested extends BaseEvent {
  type: 'CandidateRequested';
  payload: {
    attempt: number;
    maxTokens?: number;
  };
}

/** Emitted when a candidate patch has been applied to the pristine tree */
export interface CandidateApplied extends BaseEvent {
  type: 'CandidateApplied';
  payload: {
    attempt: number;
    clean: boolean;
    rejected: string[];
  };
}

/** Emitted when validation of an applied candidate completes */
export interface ValidationFinished extends BaseEvent {
  type: 'ValidationFinished';
  payload: {
    attempt: number;
    passed: boolean;
    validator?: string;
    diagnostic?: string;
  };
}

/** Emitted at the end of every attempt */
export interface AttemptFinished extends BaseEvent {
  type: 'AttemptFinished';
  payload: {
    attempt: number;
    outcome: 'success' | 'rejected' | 'validation-failed' | 'generation-failed';
  };
}

/** Emitted when the working tree has been reverted to its pristine state */
export interface RollbackPerformed extends BaseEvent {
  type: 'RollbackPerformed';
  payload: {
    reason: string;
    restoredFiles: number;
    removedFiles: number;
  };
}

/** Emitted when reconciliation of a patch ends, successfully or not */
export interface ReconcileFinished extends BaseEvent {
  type: 'ReconcileFinished';
  payload: {
    status: 'success' | 'no-change' | 'exhausted' | 'complexity-exceeded' | 'failed';
    attempts: number;
    durationMs: number;
    costUsd?: number;
  };
}

/** Emitted before a provider request is sent */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/** Emitted when a provider request completes, after any retries */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    error?: string;
    retries?: number;
  };
}

/**
 * Union type of all patchfix events.
 * Use this type for handling events generically.
 */
export type PatchfixEvent =
  | ReconcileStarted
  | PatchApplyAttempted
  | ContextBuilt
  | CandidateRequested
  | CandidateApplied
  | ValidationFinished
  | AttemptFinished
  | RollbackPerformed
  | ReconcileFinished
  | ProviderRequestStarted
  | ProviderRequestFinished;
