/**
 * Slipway - Centralized Export Module
 *
 * @module index
 *
 * Single entry point for embedding the merge queue:
 * - Queue actor and its pipeline stages
 * - Merge slot protocol and backing stores
 * - Issue store, git, notification and command-runner capabilities
 * - Configuration, errors and core types
 */

// Anomaly detection
export { type BranchPresence, type BranchPresenceCheck, detectQueueAnomalies, listQueueAnomalies } from "./anomalies.js";
// Command execution
export { type CommandOptions, type CommandResult, type CommandRunner, ShellCommandRunner } from "./command-runner.js";
// Configuration
export {
	defaultMergeQueueConfig,
	formatDuration,
	loadRigConfig,
	type MergeQueueConfig,
	parseDuration,
	type RigConfig,
	resolveRigConfig,
} from "./config.js";
// Convoy continuation
export { CommandConvoyObserver, type ConvoyObserver, NoopConvoyObserver } from "./convoy.js";
// Errors
export {
	AppError,
	ConfigError,
	errorMessage,
	GitError,
	IssueNotFoundError,
	OperationCancelledError,
	SlotContentionTimeoutError,
	SlotStoreError,
	TimeoutError,
	ValidationError,
} from "./errors.js";
// Git
export { Git, type GitClient, type SubmoduleChange } from "./git.js";
// Issue store
export {
	getIssue,
	type IssueListFilter,
	type IssueStore,
	type IssueUpdate,
	JsonIssueStore,
	MemoryIssueStore,
	type NewIssue,
} from "./issue-store.js";
// Logging
export { logger } from "./logger.js";
// Queue actor
export { createMergeQueue, MergeQueue, type MergeQueueDeps, type ProcessedMergeRequest } from "./merge-queue.js";
// Merge pipeline
export { MergeProcessor, validateTestCommand } from "./merge-processor.js";
// Merge slot
export {
	type ConflictSlotResult,
	CounterSequence,
	conflictHolderFor,
	type HolderSequence,
	MergeSlot,
	type MergeSlotOptions,
} from "./merge-slot.js";
// MR fields
export {
	descriptionWithoutMRFields,
	formatMRFields,
	getField,
	type MRFields,
	parseMRFields,
	setFields,
	updateMRFields,
} from "./mr-fields.js";
// Notifications
export {
	type MailMessage,
	MailboxNotifier,
	type MergeFailedPayload,
	mergeFailedMessage,
	type Notifier,
	parseMergeFailedPayload,
} from "./notifications.js";
// Outcomes
export { classifyFailure, type FailureOutcome, OutcomeHandler } from "./outcome-handler.js";
// Queue listing
export { isClaimStale, QueueLister } from "./queue-lister.js";
// Scoring
export { DEFAULT_SCORE_WEIGHTS, type ScoreInput, type ScoreWeights, scoreMergeRequest } from "./scoring.js";
// Slot stores
export { FileSlotStore, MemorySlotStore, type SlotStore, slotIdForRig } from "./slot-store.js";
// Core types
export type {
	AnomalySeverity,
	AnomalyType,
	FailureType,
	Issue,
	IssueStatus,
	MergeRequest,
	MergeSlotStatus,
	MRAnomaly,
	ProcessResult,
	Rig,
} from "./types.js";
