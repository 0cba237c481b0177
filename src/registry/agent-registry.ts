/**
 * Agent Registry
 *
 * Tracks registered agents, their capabilities, load and availability.
 * Availability and team holds change only through per-agent compare-and-swap,
 * so an agent can never be reserved or committed into two teams at once.
 */

import { InvalidStateError, NotFoundError, ValidationError } from '../errors.js';
import { logEvent } from '../logging/index.js';
import type { AgentProfile, AgentRegistration, Availability, CapabilityKind } from '../types.js';
import { validateRegistration } from './validation.js';

export interface AgentSlotState {
    availability: Availability;
    heldBy: string | null;
}

export interface AvailabilityChange {
    agentId: string;
    previous: AgentProfile;
    current: AgentProfile;
}

export type AvailabilityListener = (change: AvailabilityChange) => void;

function freezeProfile(profile: AgentProfile): AgentProfile {
    return Object.freeze({
        ...profile,
        capabilities: Object.freeze(profile.capabilities.map(c => Object.freeze({ ...c }))),
    });
}

export class AgentRegistry {
    private agents: Map<string, AgentProfile> = new Map();
    private listeners: AvailabilityListener[] = [];

    /**
     * Register a new agent. Ids are unique; profiles are validated against the capability schema.
     */
    register(registration: AgentRegistration): AgentProfile {
        const profile = validateRegistration(registration);
        if (this.agents.has(profile.id)) {
            throw new ValidationError(`Agent already registered: ${profile.id}`, 'id', profile.id);
        }
        const stored = freezeProfile(profile);
        this.agents.set(stored.id, stored);

        logEvent({
            level: 'info',
            agentId: stored.id,
            message: `Registered agent ${stored.name}`,
            details: { capabilities: stored.capabilities.map(c => `${c.kind}:${c.proficiency}`) },
        });

        return stored;
    }

    get(agentId: string): AgentProfile | undefined {
        return this.agents.get(agentId);
    }

    require(agentId: string): AgentProfile {
        const profile = this.agents.get(agentId);
        if (!profile) {
            throw new NotFoundError('Agent', agentId);
        }
        return profile;
    }

    /**
     * All agents, ordered by id
     */
    list(): AgentProfile[] {
        return [...this.agents.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    }

    /**
     * Agents that are FREE and not held by any team
     */
    listAvailable(): AgentProfile[] {
        return this.list().filter(agent => agent.availability === 'FREE' && agent.heldBy === null);
    }

    /**
     * Atomically replace an agent's slot state if it still matches `expected`.
     * Returns false (and changes nothing) when another caller got there first.
     */
    compareAndSet(
        agentId: string,
        expected: AgentSlotState,
        next: AgentSlotState,
        loadDelta = 0
    ): boolean {
        const current = this.require(agentId);
        if (current.availability !== expected.availability || current.heldBy !== expected.heldBy) {
            return false;
        }

        const updated = freezeProfile({
            ...current,
            availability: next.availability,
            heldBy: next.heldBy,
            load: Math.max(0, current.load + loadDelta),
        });
        this.agents.set(agentId, updated);

        if (current.availability !== updated.availability || current.heldBy !== updated.heldBy) {
            this.notify({ agentId, previous: current, current: updated });
        }
        return true;
    }

    /**
     * Reserve a FREE, unheld agent for a proposed team
     */
    reserve(agentId: string, teamId: string): boolean {
        return this.compareAndSet(
            agentId,
            { availability: 'FREE', heldBy: null },
            { availability: 'FREE', heldBy: teamId }
        );
    }

    /**
     * Flip an agent reserved by `teamId` to BUSY
     */
    markBusy(agentId: string, teamId: string): boolean {
        return this.compareAndSet(
            agentId,
            { availability: 'FREE', heldBy: teamId },
            { availability: 'BUSY', heldBy: teamId },
            1
        );
    }

    /**
     * Release the hold `teamId` has on an agent. BUSY agents return to FREE.
     */
    release(agentId: string, teamId: string): boolean {
        const current = this.require(agentId);
        if (current.heldBy !== teamId) {
            return false;
        }
        if (current.availability === 'BUSY') {
            return this.compareAndSet(
                agentId,
                { availability: 'BUSY', heldBy: teamId },
                { availability: 'FREE', heldBy: null },
                -1
            );
        }
        return this.compareAndSet(
            agentId,
            { availability: current.availability, heldBy: teamId },
            { availability: current.availability, heldBy: null }
        );
    }

    /**
     * External availability update (agent heartbeat, departure, return).
     * BUSY is reserved for team commitment; going OFFLINE drops any hold.
     */
    updateAvailability(agentId: string, state: Availability): AgentProfile {
        const current = this.require(agentId);
        if (state === 'BUSY') {
            throw new InvalidStateError('BUSY is only set when a team commits', { agentId });
        }
        if (state === 'FREE' && current.availability === 'BUSY') {
            throw new InvalidStateError('A BUSY agent is freed by releasing its team', {
                agentId,
                teamId: current.heldBy ?? undefined,
            });
        }
        if (state === current.availability) {
            return current;
        }

        const wasBusy = current.availability === 'BUSY';
        const swapped = this.compareAndSet(
            agentId,
            { availability: current.availability, heldBy: current.heldBy },
            { availability: state, heldBy: state === 'OFFLINE' ? null : current.heldBy },
            wasBusy ? -1 : 0
        );
        if (!swapped) {
            throw new InvalidStateError(`Concurrent availability update on agent ${agentId}`, { agentId });
        }

        logEvent({
            level: state === 'OFFLINE' ? 'warn' : 'info',
            agentId,
            message: `Agent ${agentId} is now ${state}`,
            details: { previous: current.availability, heldBy: current.heldBy },
        });

        return this.require(agentId);
    }

    /**
     * Refresh recency for the capabilities an agent exercised
     */
    touchCapabilities(agentId: string, kinds: CapabilityKind[], at: Date = new Date()): AgentProfile {
        const current = this.require(agentId);
        const touched = new Set(kinds);
        const updated = freezeProfile({
            ...current,
            capabilities: current.capabilities.map(c =>
                touched.has(c.kind) ? { ...c, lastUsedAt: at.toISOString() } : c
            ),
        });
        this.agents.set(agentId, updated);
        return updated;
    }

    /**
     * Subscribe to availability and hold changes. Returns an unsubscribe function.
     */
    onAvailabilityChange(listener: AvailabilityListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    private notify(change: AvailabilityChange): void {
        for (const listener of [...this.listeners]) {
            listener(change);
        }
    }
}
