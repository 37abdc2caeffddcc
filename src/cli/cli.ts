#!/usr/bin/env node
import { Command } from 'commander';
import { config } from '../config.js';
import { initCommand } from './commands/init.js';
import { showCommand } from './commands/show.js';
import { setCommand } from './commands/set.js';
import { networkCommand } from './commands/network.js';
import { envCommand } from './commands/env.js';
import { validateCommand } from './commands/validate.js';
import { diffCommand } from './commands/diff.js';
import { upgradeCommand } from './commands/upgrade.js';

const program = new Command();

program
    .name('stackcfg')
    .description('Node Stack Configuration - settings for the node operator stack')
    .version(config.version)
    .option('-d, --dir <path>', 'Stack directory', config.configDir)
    .option('-f, --file <path>', 'Settings file (default: <dir>/user-settings.yml)')
    .option('--native', 'Clients run as system services instead of containers');

program.addCommand(initCommand);
program.addCommand(showCommand);
program.addCommand(setCommand);
program.addCommand(networkCommand);
program.addCommand(envCommand);
program.addCommand(validateCommand);
program.addCommand(diffCommand);
program.addCommand(upgradeCommand);

program.parse();
