export { RobotRuntime } from './robot-runtime.js';
export type { RobotRuntimeOptions } from './robot-runtime.js';
export { decodeEnvelope, objectEventFromEnvelope, statusEventFromEnvelope, wakeWordEventFromEnvelope } from './event-factory.js';
export type { DecodeResult } from './event-factory.js';
export { EventDispatcher } from './event-dispatcher.js';
export type { EventHandler, DispatcherOptions } from './event-dispatcher.js';
export { ErrorChannel } from './error-channel.js';
export type { RuntimeFailure, FailureHandler } from './error-channel.js';
export { SerialQueue } from './serial-queue.js';
export { GenerationTimers } from './generation-timers.js';
export { WorldRegistry, DEFAULT_VISIBILITY_TIMEOUT_MS } from './world-registry.js';
export type { WorldRegistryOptions } from './world-registry.js';
export { ActionCompletion, ActionCompletionCorrelator, DEFAULT_QUIET_INTERVAL_MS } from './completion-correlator.js';
export type { ActionKind, CompletionOutcome, CompletionCorrelatorOptions } from './completion-correlator.js';
export { AnimationTracker, DEFAULT_PLAY_OPTIONS, DEFAULT_TRIGGER_PLAY_OPTIONS } from './animation-tracker.js';
export type { AnimationRpc, PlaybackStatus, PlayOptions, TriggerPlayOptions, PlaybackResult } from './animation-tracker.js';
export { customArchetypeSchema } from './custom-archetype-schema.js';
export type { CustomArchetypeInput } from './custom-archetype-schema.js';
export { userIntentName, USER_INTENTS } from './user-intents.js';
export { snapshotObject, snapshotWorldEvent } from './world-snapshot.js';
export type { ObjectSnapshot, WorldEventSnapshot } from './world-snapshot.js';
