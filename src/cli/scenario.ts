/**
 * Simulation scenarios: a roster of scripted agents and the tasks to run
 * against them, loaded from JSON.
 */

import { readFileSync } from 'fs';
import type { ScriptedParticipantOptions } from '../agents/scripted.js';
import { ValidationError } from '../errors.js';
import {
    isCapabilityKind,
    type AgendaItem,
    type AgentRegistration,
    type Availability,
    type Capability,
    type NegotiationAgenda,
    type RequiredCapability,
    type TaskPriority,
    type TaskRequirement,
} from '../types.js';

export type ScenarioBehavior = Omit<ScriptedParticipantOptions, 'agentId' | 'capabilities'>;

export interface ScenarioAgent {
    registration: AgentRegistration;
    behavior: ScenarioBehavior;
}

export interface ScenarioTask {
    name: string;
    requirement: TaskRequirement;
    agenda?: NegotiationAgenda;
}

export interface Scenario {
    agents: ScenarioAgent[];
    tasks: ScenarioTask[];
}

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown, field: string): Fields {
    if (!isRecord(value)) throw new ValidationError('Expected an object', field, value);
    return value;
}

function list(value: unknown, field: string): unknown[] {
    if (!Array.isArray(value)) throw new ValidationError('Expected a list', field, value);
    return value;
}

function text(value: unknown, field: string): string {
    if (typeof value !== 'string' || value === '') throw new ValidationError('Expected a non-empty string', field, value);
    return value;
}

function num(value: unknown, field: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) throw new ValidationError('Expected a number', field, value);
    return value;
}

function optional<T>(value: unknown, parse: (v: unknown) => T): T | undefined {
    return value === undefined ? undefined : parse(value);
}

function capabilityKind(value: unknown, field: string) {
    if (!isCapabilityKind(value)) throw new ValidationError(`Unknown capability kind: ${String(value)}`, field, value);
    return value;
}

function availability(value: unknown, field: string): Availability {
    if (value === 'FREE' || value === 'BUSY' || value === 'OFFLINE') return value;
    throw new ValidationError(`Unknown availability: ${String(value)}`, field, value);
}

function priority(value: unknown, field: string): TaskPriority {
    if (value === 'low' || value === 'medium' || value === 'high' || value === 'critical') return value;
    throw new ValidationError(`Unknown priority: ${String(value)}`, field, value);
}

function parseCapability(value: unknown, field: string): Capability {
    const fields = record(value, field);
    return {
        kind: capabilityKind(fields.kind, `${field}.kind`),
        proficiency: num(fields.proficiency, `${field}.proficiency`),
        lastUsedAt: optional(fields.lastUsedAt, v => text(v, `${field}.lastUsedAt`)),
    };
}

function parseAgent(value: unknown, field: string): ScenarioAgent {
    const fields = record(value, field);
    const behavior = optional(fields.behavior, v => record(v, `${field}.behavior`)) ?? {};
    return {
        registration: {
            id: text(fields.id, `${field}.id`),
            name: optional(fields.name, v => text(v, `${field}.name`)),
            capabilities: list(fields.capabilities, `${field}.capabilities`).map((c, i) =>
                parseCapability(c, `${field}.capabilities[${i}]`)
            ),
            load: optional(fields.load, v => num(v, `${field}.load`)),
            availability: optional(fields.availability, v => availability(v, `${field}.availability`)),
        },
        behavior: {
            costFactor: optional(behavior.costFactor, v => num(v, `${field}.behavior.costFactor`)),
            claims: optional(behavior.claims, v =>
                list(v, `${field}.behavior.claims`).map((c, i) => text(c, `${field}.behavior.claims[${i}]`))
            ),
            proposeDelayMs: optional(behavior.proposeDelayMs, v => num(v, `${field}.behavior.proposeDelayMs`)),
            executeDelayMs: optional(behavior.executeDelayMs, v => num(v, `${field}.behavior.executeDelayMs`)),
            proposeError: optional(behavior.proposeError, v => text(v, `${field}.behavior.proposeError`)),
            departOnExecute: behavior.departOnExecute === true,
            executeError: optional(behavior.executeError, v => text(v, `${field}.behavior.executeError`)),
        },
    };
}

function parseRequired(value: unknown, field: string): RequiredCapability {
    const fields = record(value, field);
    return {
        capability: capabilityKind(fields.capability, `${field}.capability`),
        minProficiency: num(fields.minProficiency, `${field}.minProficiency`),
        role: optional(fields.role, v => text(v, `${field}.role`)),
    };
}

function parseRequirement(value: unknown, field: string): TaskRequirement {
    const fields = record(value, field);
    const teamSize = record(fields.teamSize, `${field}.teamSize`);
    return {
        required: list(fields.required, `${field}.required`).map((r, i) => parseRequired(r, `${field}.required[${i}]`)),
        preferred: optional(fields.preferred, v =>
            list(v, `${field}.preferred`).map((k, i) => capabilityKind(k, `${field}.preferred[${i}]`))
        ),
        teamSize: {
            min: num(teamSize.min, `${field}.teamSize.min`),
            max: num(teamSize.max, `${field}.teamSize.max`),
        },
        deadline: optional(fields.deadline, v => text(v, `${field}.deadline`)),
        priority: optional(fields.priority, v => priority(v, `${field}.priority`)),
    };
}

function parseItem(value: unknown, field: string): AgendaItem {
    const fields = record(value, field);
    const kind = fields.kind ?? 'subtask';
    if (kind !== 'subtask' && kind !== 'resource') {
        throw new ValidationError(`Unknown agenda item kind: ${String(kind)}`, `${field}.kind`, kind);
    }
    return {
        id: text(fields.id, `${field}.id`),
        kind,
        capability: capabilityKind(fields.capability, `${field}.capability`),
        minProficiency: optional(fields.minProficiency, v => num(v, `${field}.minProficiency`)) ?? 0,
        cost: optional(fields.cost, v => num(v, `${field}.cost`)) ?? 1,
    };
}

function parseAgenda(value: unknown, field: string): NegotiationAgenda {
    const fields = record(value, field);
    return {
        items: list(fields.items, `${field}.items`).map((item, i) => parseItem(item, `${field}.items[${i}]`)),
        budget: optional(fields.budget, v => num(v, `${field}.budget`)),
    };
}

/**
 * Validate a parsed scenario document
 */
export function parseScenario(value: unknown): Scenario {
    const fields = record(value, 'scenario');
    return {
        agents: list(fields.agents, 'agents').map((agent, i) => parseAgent(agent, `agents[${i}]`)),
        tasks: list(fields.tasks, 'tasks').map((task, i) => {
            const taskFields = record(task, `tasks[${i}]`);
            return {
                name: optional(taskFields.name, v => text(v, `tasks[${i}].name`)) ?? `task-${i + 1}`,
                requirement: parseRequirement(taskFields.requirement, `tasks[${i}].requirement`),
                agenda: optional(taskFields.agenda, v => parseAgenda(v, `tasks[${i}].agenda`)),
            };
        }),
    };
}

export function loadScenario(path: string): Scenario {
    const content = readFileSync(path, 'utf-8');
    return parseScenario(JSON.parse(content));
}
