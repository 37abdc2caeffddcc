/**
 * validate: report problems with the saved settings
 */

import { Command } from 'commander';
import cli, { sym } from '../../utils/cli.js';
import { commandContext, loadSavedConfig, runAction } from '../context.js';

export const validateCommand = new Command('validate')
    .description('Check the saved settings for problems')
    .action(runAction((_options: unknown, command: Command) => {
        const problems = loadSavedConfig(commandContext(command)).validate();
        if (problems.length === 0) {
            cli.success('Settings are valid');
            return;
        }
        console.log(cli.errorBox(problems.join('\n\n'), `${sym.error} ${problems.length} Problem(s)`));
        process.exitCode = 1;
    }));
