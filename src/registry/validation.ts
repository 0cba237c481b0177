import { ValidationError } from '../errors.js';
import {
    isCapabilityKind,
    type AgentProfile,
    type AgentRegistration,
    type Availability,
    type Capability,
    type TaskRequirement,
} from '../types.js';

const AVAILABILITY_STATES: readonly Availability[] = ['FREE', 'BUSY', 'OFFLINE'];

function isProficiency(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

function isIsoDate(value: string): boolean {
    return !Number.isNaN(Date.parse(value));
}

function validateCapabilities(capabilities: Capability[], field: string): Capability[] {
    const seen = new Set<string>();
    return capabilities.map((capability, index) => {
        if (!isCapabilityKind(capability.kind)) {
            throw new ValidationError(`Unknown capability kind: ${String(capability.kind)}`, `${field}[${index}].kind`, capability.kind);
        }
        if (seen.has(capability.kind)) {
            throw new ValidationError(`Duplicate capability: ${capability.kind}`, `${field}[${index}].kind`, capability.kind);
        }
        seen.add(capability.kind);
        if (!isProficiency(capability.proficiency)) {
            throw new ValidationError('Proficiency must be a number in [0, 1]', `${field}[${index}].proficiency`, capability.proficiency);
        }
        if (capability.lastUsedAt !== undefined && !isIsoDate(capability.lastUsedAt)) {
            throw new ValidationError('lastUsedAt must be an ISO timestamp', `${field}[${index}].lastUsedAt`, capability.lastUsedAt);
        }
        return { ...capability };
    });
}

/**
 * Validate a registration and turn it into a FREE (or declared) profile
 */
export function validateRegistration(input: AgentRegistration): AgentProfile {
    if (typeof input.id !== 'string' || input.id.trim() === '') {
        throw new ValidationError('Agent id is required', 'id', input.id);
    }
    const availability = input.availability ?? 'FREE';
    if (!AVAILABILITY_STATES.includes(availability)) {
        throw new ValidationError(`Unknown availability: ${String(availability)}`, 'availability', availability);
    }
    if (availability === 'BUSY') {
        throw new ValidationError('Agents register as FREE or OFFLINE; BUSY is set by team formation', 'availability', availability);
    }
    const load = input.load ?? 0;
    if (!Number.isInteger(load) || load < 0) {
        throw new ValidationError('Load must be a non-negative integer', 'load', load);
    }
    if (!Array.isArray(input.capabilities)) {
        throw new ValidationError('Capabilities must be a list', 'capabilities', input.capabilities);
    }

    return {
        id: input.id,
        name: input.name ?? input.id,
        capabilities: validateCapabilities(input.capabilities, 'capabilities'),
        load,
        availability,
        heldBy: null,
    };
}

/**
 * Validate a task requirement at creation time. The deadline, if any, must lie after `now`.
 */
export function validateRequirement(requirement: TaskRequirement, now: Date = new Date()): TaskRequirement {
    const { teamSize } = requirement;
    if (!Number.isInteger(teamSize.min) || teamSize.min < 1) {
        throw new ValidationError('Minimum team size must be an integer >= 1', 'teamSize.min', teamSize.min);
    }
    if (!Number.isInteger(teamSize.max) || teamSize.max < teamSize.min) {
        throw new ValidationError('Maximum team size must be an integer >= the minimum', 'teamSize.max', teamSize.max);
    }
    if (requirement.required.length === 0) {
        throw new ValidationError('At least one required capability is needed', 'required', requirement.required);
    }

    requirement.required.forEach((entry, index) => {
        if (!isCapabilityKind(entry.capability)) {
            throw new ValidationError(`Unknown capability kind: ${String(entry.capability)}`, `required[${index}].capability`, entry.capability);
        }
        if (!isProficiency(entry.minProficiency)) {
            throw new ValidationError('Minimum proficiency must be a number in [0, 1]', `required[${index}].minProficiency`, entry.minProficiency);
        }
        if (entry.role !== undefined && entry.role.trim() === '') {
            throw new ValidationError('Role name must not be empty', `required[${index}].role`, entry.role);
        }
    });

    for (const [index, kind] of (requirement.preferred ?? []).entries()) {
        if (!isCapabilityKind(kind)) {
            throw new ValidationError(`Unknown capability kind: ${String(kind)}`, `preferred[${index}]`, kind);
        }
    }

    if (requirement.deadline !== undefined) {
        const deadline = Date.parse(requirement.deadline);
        if (Number.isNaN(deadline)) {
            throw new ValidationError('Deadline must be an ISO timestamp', 'deadline', requirement.deadline);
        }
        if (deadline <= now.getTime()) {
            throw new ValidationError('Deadline must be in the future', 'deadline', requirement.deadline);
        }
    }

    return requirement;
}

/**
 * Lower every minimum proficiency by `step`, floored at zero
 */
export function relaxRequirement(requirement: TaskRequirement, step: number): TaskRequirement {
    return {
        ...requirement,
        required: requirement.required.map(entry => ({
            ...entry,
            minProficiency: Math.max(0, Math.round((entry.minProficiency - step) * 1e9) / 1e9),
        })),
    };
}
