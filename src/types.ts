// Capability schema: agents declare proficiency only against these kinds
export const CAPABILITY_KINDS = [
    'research',
    'writing',
    'analysis',
    'coding',
    'review',
    'planning',
    'design',
    'testing',
    'data',
    'summarization',
    'translation',
] as const;

export type CapabilityKind = typeof CAPABILITY_KINDS[number];

export type Availability = 'FREE' | 'BUSY' | 'OFFLINE';

export interface Capability {
    kind: CapabilityKind;
    /** Proficiency in [0, 1] */
    proficiency: number;
    /** ISO timestamp of the last task that exercised this capability */
    lastUsedAt?: string;
}

export interface AgentProfile {
    id: string;
    name: string;
    capabilities: readonly Capability[];
    load: number;
    availability: Availability;
    /** Team currently holding this agent (reserved while FREE, committed while BUSY) */
    heldBy: string | null;
}

export interface AgentRegistration {
    id: string;
    name?: string;
    capabilities: Capability[];
    load?: number;
    availability?: Availability;
}

export type TaskPriority = 'low' | 'medium' | 'high' | 'critical';

export interface RequiredCapability {
    capability: CapabilityKind;
    minProficiency: number;
    /** Role name; defaults to the capability kind */
    role?: string;
}

export interface TeamSizeRange {
    min: number;
    max: number;
}

export interface TaskRequirement {
    required: RequiredCapability[];
    /** Soft tags: add to a candidate's score, never required */
    preferred?: CapabilityKind[];
    teamSize: TeamSizeRange;
    deadline?: string;
    priority?: TaskPriority;
}

export type TeamStatus = 'PROPOSED' | 'COMMITTED' | 'DEGRADED' | 'RELEASED' | 'FAILED';

export interface TeamMember {
    agentId: string;
    role: string;
    /** Capability the role was matched on; null for support members filling the team size */
    capability: CapabilityKind | null;
    score: number;
}

export interface AgentTeam {
    id: string;
    taskId: string;
    members: readonly TeamMember[];
    /** Members that left and could not be replaced */
    vacated: readonly TeamMember[];
    requirement: TaskRequirement;
    formedAt: string;
    status: TeamStatus;
}

// Negotiation

export type AgendaItemKind = 'subtask' | 'resource';

export interface AgendaItem {
    id: string;
    kind: AgendaItemKind;
    capability: CapabilityKind;
    minProficiency: number;
    /** Declared cost, charged when the item is assigned without a claim */
    cost: number;
}

export interface NegotiationAgenda {
    items: AgendaItem[];
    budget?: number;
}

export interface Claim {
    itemId: string;
    estimatedCost: number;
}

export interface Proposal {
    agentId: string;
    round: number;
    claims: Claim[];
}

export type NegotiationStatus = 'OPEN' | 'RESOLVED' | 'FAILED' | 'ABORTED';

export type ResolutionRule = 'uncontested' | 'capability' | 'load' | 'agent-id' | 'reoffer' | 'budget';

export interface Assignment {
    itemId: string;
    agentId: string;
    cost: number;
    round: number;
    rule: ResolutionRule;
}

export interface ConflictRecord {
    itemId: string;
    claimants: string[];
    winner: string;
    rule: Exclude<ResolutionRule, 'uncontested' | 'reoffer' | 'budget'>;
}

export interface NegotiationMember {
    agentId: string;
    role: string;
    load: number;
    capabilities: readonly Capability[];
}

export interface RoundRecord {
    round: number;
    proposals: Proposal[];
    timedOut: string[];
    conflicts: ConflictRecord[];
    assignments: Assignment[];
    unplaced: string[];
    idle: string[];
    totalCost: number;
    closedAt: string;
}

export type NegotiationFailureReason = 'ROUND_LIMIT' | 'BUDGET' | 'TIMEOUT' | 'NO_PARTICIPANTS';

export interface Negotiation {
    id: string;
    teamId: string;
    taskId: string;
    round: number;
    status: NegotiationStatus;
    agenda: NegotiationAgenda;
    members: NegotiationMember[];
    /** Assignments carried in from an earlier negotiation of the same task */
    settled: Assignment[];
    resolution: Assignment[];
    rounds: RoundRecord[];
    /** agentId -> number of rounds the agent ended UNPLACED */
    relaxation: Record<string, number>;
    failureReason?: NegotiationFailureReason;
    openedAt: string;
    closedAt?: string;
}

export interface NegotiationTrace {
    negotiationId: string;
    status: NegotiationStatus;
    rounds: RoundRecord[];
    resolution: Assignment[];
    failureReason?: NegotiationFailureReason;
}

// Shared context

export interface ContextItem<T = unknown> {
    taskId: string;
    key: string;
    value: T;
    /** Per-key version, starting at 1 */
    version: number;
    /** Position in the task-wide commit log, starting at 1 */
    sequence: number;
    writer: string;
    timestamp: string;
    /** Version this write was based on; null for the initial write */
    predecessor: number | null;
}

// Learning

export interface OutcomeMetrics {
    success: boolean;
    durationMs: number;
    rounds: number;
    replacements: number;
    failureCode?: string;
}

export interface LearningEvent {
    id: string;
    taskId: string;
    teamId: string;
    team: AgentTeam;
    negotiation: NegotiationTrace;
    metrics: OutcomeMetrics;
    recordedAt: string;
}

// Task lifecycle (inbound boundary)

export type TaskStatus = 'FORMING' | 'NEGOTIATING' | 'EXECUTING' | 'DEGRADED' | 'FAILED' | 'COMPLETED';

export interface TaskFailure {
    code: string;
    message: string;
}

// Configuration

export interface MatcherConfig {
    recencyHalfLifeDays: number;
    recencyFloor: number;
    /** Weight applied to soft (preferred) capability scores */
    softWeight: number;
    scoreEpsilon: number;
}

export interface FormationConfig {
    /** Matching retries after a reserved agent drops out */
    matchRetries: number;
    /** Times the orchestrator relaxes a requirement after NoCandidateError */
    relaxations: number;
    relaxationStep: number;
}

export interface NegotiationConfig {
    maxRounds: number;
    roundTimeoutMs: number;
    negotiationTimeoutMs: number;
    proficiencyEpsilon: number;
    /** Proficiency threshold reduction per round an agent spent UNPLACED */
    relaxationStep: number;
}

export interface ContextConfig {
    writeTimeoutMs: number;
}

export interface RecorderConfig {
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    backoffMultiplier: number;
}

export interface RuntimeConfig {
    matcher: MatcherConfig;
    formation: FormationConfig;
    negotiation: NegotiationConfig;
    context: ContextConfig;
    recorder: RecorderConfig;
}

// Default configurations
export const defaultMatcherConfig: MatcherConfig = {
    recencyHalfLifeDays: 30,
    recencyFloor: 0.5,
    softWeight: 0.25,
    scoreEpsilon: 1e-9,
};

export const defaultFormationConfig: FormationConfig = {
    matchRetries: 1,
    relaxations: 1,
    relaxationStep: 0.1,
};

export const defaultNegotiationConfig: NegotiationConfig = {
    maxRounds: 5,
    roundTimeoutMs: 30000,
    negotiationTimeoutMs: 150000,
    proficiencyEpsilon: 1e-6,
    relaxationStep: 0.1,
};

export const defaultContextConfig: ContextConfig = {
    writeTimeoutMs: 5000,
};

export const defaultRecorderConfig: RecorderConfig = {
    maxRetries: 3,
    initialBackoffMs: 100,
    maxBackoffMs: 5000,
    backoffMultiplier: 2,
};

// Global configuration (~/.concord/config.json)
export interface ConcordGlobalConfig {
    maxRounds: number;
    roundTimeoutMs: number;
    negotiationTimeoutMs: number;
    writeTimeoutMs: number;
    recencyHalfLifeDays: number;
    recorderMaxRetries: number;
    databasePath?: string;
}

export const defaultGlobalConfig: ConcordGlobalConfig = {
    maxRounds: defaultNegotiationConfig.maxRounds,
    roundTimeoutMs: defaultNegotiationConfig.roundTimeoutMs,
    negotiationTimeoutMs: defaultNegotiationConfig.negotiationTimeoutMs,
    writeTimeoutMs: defaultContextConfig.writeTimeoutMs,
    recencyHalfLifeDays: defaultMatcherConfig.recencyHalfLifeDays,
    recorderMaxRetries: defaultRecorderConfig.maxRetries,
};

export function isCapabilityKind(value: unknown): value is CapabilityKind {
    return typeof value === 'string' && CAPABILITY_KINDS.some(kind => kind === value);
}

/**
 * Build the runtime configuration from the global config, starting from defaults
 */
export function toRuntimeConfig(global: ConcordGlobalConfig): RuntimeConfig {
    return {
        matcher: { ...defaultMatcherConfig, recencyHalfLifeDays: global.recencyHalfLifeDays },
        formation: { ...defaultFormationConfig },
        negotiation: {
            ...defaultNegotiationConfig,
            maxRounds: global.maxRounds,
            roundTimeoutMs: global.roundTimeoutMs,
            negotiationTimeoutMs: global.negotiationTimeoutMs,
        },
        context: { writeTimeoutMs: global.writeTimeoutMs },
        recorder: { ...defaultRecorderConfig, maxRetries: global.recorderMaxRetries },
    };
}
