import { Command } from 'commander';
import chalk from 'chalk';
import { SqliteContextBackend } from '../../collaboration/context-backend.js';
import { SharedContextStore } from '../../collaboration/context-store.js';
import { getDb } from '../../db/index.js';
import type { ContextItem } from '../../types.js';
import { loadGlobalConfig } from '../config.js';
import { integerOption } from '../options.js';

function formatItem(item: ContextItem): string {
    return `${chalk.bold(item.key)} v${item.version} ${chalk.gray(`#${item.sequence} by ${item.writer} at ${item.timestamp}`)}\n    ${JSON.stringify(item.value)}`;
}

export const contextCommand = new Command('context')
    .description("Inspect a task's shared context (read-only)")
    .argument('<taskId>', 'Task id')
    .argument('[key]', 'Show one key')
    .option('--history', 'Show every version of the key')
    .option('--at <sequence>', 'Snapshot as of a commit-log position', integerOption(0))
    .option('--json', 'Output as JSON')
    .action(async (taskId: string, key: string | undefined, options: { history?: boolean; at?: number; json?: boolean }) => {
        const config = loadGlobalConfig();
        const store = new SharedContextStore(taskId, new SqliteContextBackend(getDb(config.databasePath)));
        store.close();

        let items: ContextItem[];
        if (key) {
            if (options.history) {
                items = await store.history(key);
            } else {
                const item = await store.read(key);
                items = item ? [item] : [];
            }
        } else {
            items = Object.values(await store.snapshot(options.at)).sort((a, b) => a.sequence - b.sequence);
        }

        if (options.json) {
            console.log(JSON.stringify(items, null, 2));
            return;
        }
        if (items.length === 0) {
            console.log(chalk.yellow('No context items'));
            return;
        }
        for (const item of items) {
            console.log(formatItem(item));
        }
    });
