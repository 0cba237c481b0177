import { Command } from 'commander';
import chalk from 'chalk';
import { getDb } from '../../db/index.js';
import { SqliteEpisodeStore } from '../../learning/episode-store.js';
import { LearningRecorder } from '../../learning/recorder.js';
import type { LearningEvent } from '../../types.js';
import { loadGlobalConfig } from '../config.js';
import { integerOption } from '../options.js';

export function formatEpisode(event: LearningEvent): string {
    const outcome = event.metrics.success ? chalk.green('success') : chalk.red(event.metrics.failureCode ?? 'failed');
    const members = event.team.members.map(m => `${m.agentId}(${m.role})`).join(', ');
    return [
        `${chalk.bold(event.taskId)} ${outcome} ${chalk.gray(event.recordedAt)}`,
        chalk.gray(`    team ${event.teamId}: ${members || 'none'}`),
        chalk.gray(
            `    ${event.metrics.rounds} round(s), ${event.metrics.replacements} replacement(s), ${event.metrics.durationMs}ms`
        ),
    ].join('\n');
}

export const episodesCommand = new Command('episodes')
    .description('Browse recorded collaboration episodes')
    .option('-a, --agent <id>', 'Episodes an agent took part in')
    .option('-t, --task <id>', 'Episodes for a task')
    .option('--team <id>', 'Episodes for a team')
    .option('-n, --limit <n>', 'Number of recent episodes', integerOption(1), 20)
    .option('--summary', 'Summarise the agent given with --agent')
    .option('--json', 'Output as JSON')
    .action(async (options: { agent?: string; task?: string; team?: string; limit: number; summary?: boolean; json?: boolean }) => {
        const config = loadGlobalConfig();
        const recorder = new LearningRecorder(new SqliteEpisodeStore(getDb(config.databasePath)));

        if (options.summary) {
            if (!options.agent) {
                console.error(chalk.red('--summary needs --agent <id>'));
                process.exit(1);
            }
            const summary = await recorder.summarizeAgent(options.agent);
            if (options.json) {
                console.log(JSON.stringify(summary, null, 2));
                return;
            }
            console.log(chalk.bold(`\n${summary.agentId}\n`));
            console.log(`  Episodes:     ${summary.episodes}`);
            console.log(`  Success rate: ${(summary.successRate * 100).toFixed(0)}%`);
            console.log(`  Avg duration: ${summary.averageDurationMs.toFixed(0)}ms`);
            for (const [role, count] of Object.entries(summary.roles)) {
                console.log(chalk.gray(`    ${role}: ${count}`));
            }
            return;
        }

        const events = options.agent
            ? await recorder.getAgentHistory(options.agent)
            : options.task
              ? await recorder.getTaskHistory(options.task)
              : options.team
                ? await recorder.getTeamHistory(options.team)
                : await recorder.recent(options.limit);

        if (options.json) {
            console.log(JSON.stringify(events, null, 2));
            return;
        }
        if (events.length === 0) {
            console.log(chalk.yellow('No episodes recorded'));
            return;
        }
        for (const event of events) {
            console.log(formatEpisode(event));
        }
    });
