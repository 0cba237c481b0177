/**
 * Capability Matcher
 *
 * Pure functions from (requirement, agent snapshot) to a ranked candidate team.
 * No randomness and no hidden state: the same inputs always produce the same
 * ordered result.
 */

import {
    defaultMatcherConfig,
    type AgentProfile,
    type Capability,
    type CapabilityKind,
    type MatcherConfig,
    type RequiredCapability,
    type TaskRequirement,
    type TeamMember,
} from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const SUPPORT_ROLE = 'support';

export interface MatchOptions {
    config?: Partial<MatcherConfig>;
    /** Reference time for recency weighting */
    now?: Date;
    /** Agent ids that must not be selected */
    exclude?: ReadonlySet<string>;
}

export interface ScoredCandidate {
    profile: AgentProfile;
    score: number;
}

export interface CandidateTeam {
    members: TeamMember[];
    profiles: AgentProfile[];
}

export interface RoleSlot {
    role: string;
    requirement: RequiredCapability;
}

function resolveConfig(options: MatchOptions): MatcherConfig {
    return { ...defaultMatcherConfig, ...options.config };
}

function findCapability(profile: AgentProfile, kind: CapabilityKind): Capability | undefined {
    return profile.capabilities.find(c => c.kind === kind);
}

export function proficiencyOf(profile: Pick<AgentProfile, 'capabilities'>, kind: CapabilityKind): number {
    return profile.capabilities.find(c => c.kind === kind)?.proficiency ?? 0;
}

/**
 * Decay factor for a capability that has not been exercised recently.
 * Never-used capabilities and future timestamps weigh 1.
 */
export function recencyWeight(capability: Capability, now: Date, config: MatcherConfig = defaultMatcherConfig): number {
    if (!capability.lastUsedAt) return 1;
    const ageDays = (now.getTime() - Date.parse(capability.lastUsedAt)) / DAY_MS;
    if (ageDays <= 0) return 1;
    const decayed = Math.pow(0.5, ageDays / config.recencyHalfLifeDays);
    return Math.max(config.recencyFloor, decayed);
}

export function capabilityScore(
    profile: AgentProfile,
    kind: CapabilityKind,
    now: Date,
    config: MatcherConfig = defaultMatcherConfig
): number {
    const capability = findCapability(profile, kind);
    if (!capability) return 0;
    return capability.proficiency * recencyWeight(capability, now, config);
}

/**
 * Eligibility is judged on raw proficiency against the hard minimum
 */
export function isEligible(profile: AgentProfile, requirement: RequiredCapability): boolean {
    return proficiencyOf(profile, requirement.capability) >= requirement.minProficiency;
}

function softScore(profile: AgentProfile, preferred: readonly CapabilityKind[], now: Date, config: MatcherConfig): number {
    let total = 0;
    for (const kind of preferred) {
        total += capabilityScore(profile, kind, now, config);
    }
    return total * config.softWeight;
}

/**
 * Deterministic ordering: higher score first, then lower load, then id
 */
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate, epsilon = defaultMatcherConfig.scoreEpsilon): number {
    if (Math.abs(a.score - b.score) > epsilon) {
        return b.score - a.score;
    }
    if (a.profile.load !== b.profile.load) {
        return a.profile.load - b.profile.load;
    }
    return a.profile.id < b.profile.id ? -1 : a.profile.id > b.profile.id ? 1 : 0;
}

/**
 * Expand the requirement into named role slots. Duplicate names get a numeric suffix.
 */
export function roleSlots(requirement: TaskRequirement): RoleSlot[] {
    const counts = new Map<string, number>();
    return requirement.required.map(entry => {
        const base = entry.role ?? entry.capability;
        const seen = counts.get(base) ?? 0;
        counts.set(base, seen + 1);
        return { role: seen === 0 ? base : `${base}#${seen + 1}`, requirement: entry };
    });
}

/**
 * Rank the available agents eligible for one role
 */
export function rankForRole(
    agents: readonly AgentProfile[],
    slot: RequiredCapability,
    requirement: TaskRequirement,
    options: MatchOptions = {}
): ScoredCandidate[] {
    const config = resolveConfig(options);
    const now = options.now ?? new Date();
    const preferred = requirement.preferred ?? [];

    return agents
        .filter(agent => agent.availability === 'FREE' && agent.heldBy === null)
        .filter(agent => !options.exclude?.has(agent.id))
        .filter(agent => isEligible(agent, slot))
        .map(profile => ({
            profile,
            score: capabilityScore(profile, slot.capability, now, config) + softScore(profile, preferred, now, config),
        }))
        .sort((a, b) => compareCandidates(a, b, config.scoreEpsilon));
}

/**
 * Rank agents for an unspecialised support slot by their combined required + preferred score
 */
export function rankForSupport(
    agents: readonly AgentProfile[],
    requirement: TaskRequirement,
    options: MatchOptions = {}
): ScoredCandidate[] {
    const config = resolveConfig(options);
    const now = options.now ?? new Date();
    const preferred = requirement.preferred ?? [];

    return agents
        .filter(agent => agent.availability === 'FREE' && agent.heldBy === null)
        .filter(agent => !options.exclude?.has(agent.id))
        .map(profile => {
            let score = softScore(profile, preferred, now, config);
            for (const entry of requirement.required) {
                score += capabilityScore(profile, entry.capability, now, config);
            }
            return { profile, score };
        })
        .sort((a, b) => compareCandidates(a, b, config.scoreEpsilon));
}

/**
 * Build a candidate team: for each role in order, take the best still-unassigned
 * eligible agent, then top up with support members to reach the minimum size.
 * Returns null when the hard requirements or the size range cannot be met.
 */
export function matchTeam(
    requirement: TaskRequirement,
    agents: readonly AgentProfile[],
    options: MatchOptions = {}
): CandidateTeam | null {
    const slots = roleSlots(requirement);
    if (slots.length > requirement.teamSize.max) {
        return null;
    }

    const taken = new Set<string>(options.exclude ?? []);
    const members: TeamMember[] = [];
    const profiles: AgentProfile[] = [];

    for (const slot of slots) {
        const [best] = rankForRole(agents, slot.requirement, requirement, { ...options, exclude: taken });
        if (!best) {
            return null;
        }
        taken.add(best.profile.id);
        members.push({
            agentId: best.profile.id,
            role: slot.role,
            capability: slot.requirement.capability,
            score: best.score,
        });
        profiles.push(best.profile);
    }

    const missing = requirement.teamSize.min - members.length;
    if (missing > 0) {
        const support = rankForSupport(agents, requirement, { ...options, exclude: taken }).slice(0, missing);
        if (support.length < missing) {
            return null;
        }
        support.forEach((candidate, index) => {
            members.push({
                agentId: candidate.profile.id,
                role: index === 0 ? SUPPORT_ROLE : `${SUPPORT_ROLE}#${index + 1}`,
                capability: null,
                score: candidate.score,
            });
            profiles.push(candidate.profile);
        });
    }

    return { members, profiles };
}

/**
 * Roles no available agent can fill; used to explain an empty match
 */
export function unfillableRoles(
    requirement: TaskRequirement,
    agents: readonly AgentProfile[],
    options: MatchOptions = {}
): string[] {
    return roleSlots(requirement)
        .filter(slot => rankForRole(agents, slot.requirement, requirement, options).length === 0)
        .map(slot => slot.role);
}

/**
 * Ordered candidate profiles for a requirement, one per team slot; empty when no team exists
 */
export function findCandidates(
    requirement: TaskRequirement,
    agents: readonly AgentProfile[],
    options: MatchOptions = {}
): AgentProfile[] {
    return matchTeam(requirement, agents, options)?.profiles ?? [];
}
