/**
 * diff: compare the saved settings with another settings file
 */

import path from 'path';
import { Command } from 'commander';
import cli, { c } from '../../utils/cli.js';
import { ConfigStore } from '../../storage/ConfigStore.js';
import { StorageError } from '../../params/errors.js';
import { commandContext, loadSavedConfig, printChanges, runAction } from '../context.js';

export const diffCommand = new Command('diff')
    .description('Show what applying another settings file would change')
    .argument('<file>', 'Candidate settings file')
    .action(runAction((file: string, _options: unknown, command: Command) => {
        const ctx = commandContext(command);
        const current = loadSavedConfig(ctx);

        const candidatePath = path.resolve(file);
        const candidate = new ConfigStore(candidatePath).loadConfig(ctx.directory, ctx.nativeMode);
        if (!candidate) {
            throw new StorageError(`No settings file at ${candidatePath}`, candidatePath);
        }

        console.log(cli.header(`${path.basename(ctx.store.file)} ${c.dim('vs')} ${path.basename(candidatePath)}`));
        cli.newline();
        printChanges(candidate.computeChanges(current));
    }));
