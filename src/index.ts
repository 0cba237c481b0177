export * from './types.js';
export * from './errors.js';
export { logEvent, getConcordDir, type LogEvent } from './logging/index.js';

export { AgentRegistry, type AvailabilityChange, type AvailabilityListener, type AgentSlotState } from './registry/agent-registry.js';
export {
    findCandidates,
    matchTeam,
    rankForRole,
    rankForSupport,
    recencyWeight,
    capabilityScore,
    roleSlots,
    unfillableRoles,
    SUPPORT_ROLE,
    type MatchOptions,
    type ScoredCandidate,
    type CandidateTeam,
    type RoleSlot,
} from './registry/capability-matcher.js';
export { validateRegistration, validateRequirement, relaxRequirement } from './registry/validation.js';

export {
    TeamFormationService,
    type FormationResult,
    type ReplacementResult,
    type ContextHandoff,
    type TeamFormationOptions,
} from './formation/team-formation.js';

export { NegotiationEngine, jainIndex, type NegotiationAnalysis, type OpenNegotiationInput } from './negotiation/negotiation-engine.js';
export { NegotiationDriver, type ProposalRequest, type ProposalSource } from './negotiation/negotiation-driver.js';
export { resolveRound, type RoundInput, type RoundOutcome } from './negotiation/conflict-resolver.js';

export * from './collaboration/index.js';

export { LearningRecorder, type RecordResult, type AgentSummary } from './learning/recorder.js';
export { MemoryEpisodeStore, SqliteEpisodeStore, type EpisodeStore } from './learning/episode-store.js';

export * from './agents/index.js';

export {
    CollaborationOrchestrator,
    defaultAgenda,
    type TaskRecord,
    type SubmitTaskOptions,
    type CollaborationOrchestratorOptions,
} from './orchestrator/index.js';

export { openDatabase, getDb, closeDb } from './db/index.js';
