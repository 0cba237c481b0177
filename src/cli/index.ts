#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { simulateCommand } from './commands/simulate.js';
import { episodesCommand } from './commands/episodes.js';
import { contextCommand } from './commands/context.js';
import { CONFIG_KEYS, applyConfigValue, loadGlobalConfig, saveGlobalConfig } from './config.js';
import { closeDb } from '../db/index.js';

const program = new Command();

program
    .name('concord')
    .description('Team formation, negotiation and shared context for collaborating agents')
    .version('0.1.0');

// Add commands
program.addCommand(simulateCommand);
program.addCommand(episodesCommand);
program.addCommand(contextCommand);

// Config command
program
    .command('config')
    .description('View or set global configuration')
    .argument('[key]', 'Configuration key')
    .argument('[value]', 'Configuration value')
    .action((key?: string, value?: string) => {
        const config = loadGlobalConfig();

        if (!key) {
            console.log(chalk.bold('\nConcord Configuration:\n'));
            console.log(JSON.stringify(config, null, 2));
            return;
        }

        if (!value) {
            const known = CONFIG_KEYS.find(k => k === key);
            if (known) {
                console.log(config[known] ?? '');
            } else {
                console.error(chalk.red(`Unknown config key: ${key}`));
                console.log('Available keys:', CONFIG_KEYS.join(', '));
                process.exit(1);
            }
            return;
        }

        const updated = applyConfigValue(config, key, value);
        saveGlobalConfig(updated);
        console.log(chalk.green(`Set ${key} = ${value}`));
    });

// Handle errors
program.exitOverride();

try {
    await program.parseAsync(process.argv);
} catch (error) {
    if (error instanceof Error && error.message !== '(outputHelp)') {
        console.error(chalk.red(`Error: ${error.message}`));
        process.exitCode = 1;
    }
} finally {
    closeDb();
}
