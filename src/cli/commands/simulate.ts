import { Command } from 'commander';
import chalk from 'chalk';
import type Database from 'better-sqlite3';
import { ParticipantDirectory } from '../../agents/base.js';
import { ScriptedParticipant } from '../../agents/scripted.js';
import { MemoryContextBackend, SqliteContextBackend } from '../../collaboration/context-backend.js';
import { getDb } from '../../db/index.js';
import { MemoryEpisodeStore, SqliteEpisodeStore } from '../../learning/episode-store.js';
import type { NegotiationAnalysis } from '../../negotiation/negotiation-engine.js';
import { CollaborationOrchestrator, type TaskRecord } from '../../orchestrator/index.js';
import { AgentRegistry } from '../../registry/agent-registry.js';
import { toRuntimeConfig, type ConcordGlobalConfig, type TeamMember } from '../../types.js';
import { loadGlobalConfig } from '../config.js';
import { loadScenario, type Scenario } from '../scenario.js';

export interface SimulatedTask {
    name: string;
    task: TaskRecord;
    members: TeamMember[];
    analysis?: NegotiationAnalysis;
}

export interface SimulationOptions {
    config: ConcordGlobalConfig;
    /** Persist context and episodes here; in-memory when omitted */
    database?: Database.Database;
    /** Submit every task at once instead of one after another */
    parallel?: boolean;
}

/**
 * Run every task in a scenario against its scripted roster
 */
export async function runScenario(scenario: Scenario, options: SimulationOptions): Promise<SimulatedTask[]> {
    const registry = new AgentRegistry();
    const participants = new ParticipantDirectory();
    for (const agent of scenario.agents) {
        const profile = registry.register(agent.registration);
        participants.register(
            new ScriptedParticipant({ ...agent.behavior, agentId: profile.id, capabilities: profile.capabilities })
        );
    }

    const orchestrator = new CollaborationOrchestrator({
        registry,
        participants,
        config: toRuntimeConfig(options.config),
        contextBackend: options.database ? new SqliteContextBackend(options.database) : new MemoryContextBackend(),
        episodeStore: options.database ? new SqliteEpisodeStore(options.database) : new MemoryEpisodeStore(),
    });

    const finish = async (name: string, taskId: string): Promise<SimulatedTask> => {
        const task = await orchestrator.waitForTask(taskId);
        const team = task.teamId ? orchestrator.formation.getTeam(task.teamId) : undefined;
        const lastNegotiation = task.negotiationIds[task.negotiationIds.length - 1];
        return {
            name,
            task,
            members: team ? [...team.members] : [],
            analysis: lastNegotiation ? orchestrator.negotiations.analyze(lastNegotiation) : undefined,
        };
    };

    const results: SimulatedTask[] = [];
    if (options.parallel) {
        const submitted = scenario.tasks.map(t => ({
            name: t.name,
            taskId: orchestrator.submitTask(t.requirement, { agenda: t.agenda }),
        }));
        results.push(...(await Promise.all(submitted.map(s => finish(s.name, s.taskId)))));
    } else {
        for (const t of scenario.tasks) {
            const taskId = orchestrator.submitTask(t.requirement, { agenda: t.agenda });
            results.push(await finish(t.name, taskId));
        }
    }

    await orchestrator.shutdown();
    return results;
}

function printResult(result: SimulatedTask): void {
    const { task } = result;
    const status = task.status === 'COMPLETED' ? chalk.green(task.status) : chalk.red(task.status);
    console.log(`${chalk.bold(result.name)} ${chalk.gray(task.id)} ${status}`);

    for (const member of result.members) {
        console.log(chalk.gray(`    ${member.agentId.padEnd(16)} ${member.role.padEnd(14)} score ${member.score.toFixed(3)}`));
    }
    if (result.analysis) {
        const a = result.analysis;
        console.log(
            chalk.gray(
                `    ${a.rounds} round(s), ${a.conflicts} conflict(s), cost ${a.totalCost}, fairness ${a.fairness.toFixed(2)}`
            )
        );
    }
    if (task.replacements > 0) {
        console.log(chalk.yellow(`    ${task.replacements} member(s) replaced`));
    }
    if (task.failure) {
        console.log(chalk.red(`    ${task.failure.code}: ${task.failure.message}`));
    }
}

export const simulateCommand = new Command('simulate')
    .description('Run a scenario of scripted agents and tasks through formation, negotiation and execution')
    .argument('<scenario>', 'Path to a scenario JSON file')
    .option('--memory', 'Keep context and episodes in memory instead of the database')
    .option('--parallel', 'Submit all tasks at once')
    .option('--json', 'Output as JSON')
    .action(async (path: string, options: { memory?: boolean; parallel?: boolean; json?: boolean }) => {
        const config = loadGlobalConfig();
        const scenario = loadScenario(path);
        const results = await runScenario(scenario, {
            config,
            database: options.memory ? undefined : getDb(config.databasePath),
            parallel: options.parallel,
        });

        if (options.json) {
            console.log(JSON.stringify(results, null, 2));
            return;
        }

        console.log(chalk.bold(`\nSimulated ${results.length} task(s):\n`));
        for (const result of results) {
            printResult(result);
        }
        const failed = results.filter(r => r.task.status === 'FAILED').length;
        console.log('');
        console.log(failed === 0 ? chalk.green('All tasks completed') : chalk.yellow(`${failed} task(s) failed`));
    });
