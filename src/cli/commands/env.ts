/**
 * env: print the variables handed to the container orchestrator
 */

import { Command } from 'commander';
import { toShellAssignments } from '../../config/environment.js';
import { commandContext, loadSavedConfig, runAction } from '../context.js';

interface EnvOptions {
    json?: boolean;
}

export const envCommand = new Command('env')
    .description('Print the environment for the container orchestrator')
    .option('--json', 'Print as a JSON object')
    .action(runAction((options: EnvOptions, command: Command) => {
        const env = loadSavedConfig(commandContext(command)).generateEnvironment();

        if (options.json) {
            const sorted = Object.fromEntries(Object.keys(env).sort().map(name => [name, env[name]]));
            console.log(JSON.stringify(sorted, null, 2));
            return;
        }
        for (const line of toShellAssignments(env)) {
            console.log(line);
        }
    }));
