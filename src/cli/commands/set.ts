/**
 * set: change one parameter and report which containers must restart
 */

import { Command } from 'commander';
import cli, { c, sym } from '../../utils/cli.js';
import { commandContext, loadSavedConfig, printChanges, runAction } from '../context.js';

interface SetOptions {
    dryRun?: boolean;
}

export const setCommand = new Command('set')
    .description('Change a setting, e.g. "set consensusCommon graffiti hello"')
    .argument('<section>', 'Section key ("root" for top-level settings)')
    .argument('<id>', 'Parameter id')
    .argument('<value>', 'New value')
    .option('--dry-run', 'Show what would change without saving')
    .action(runAction((sectionKey: string, id: string, value: string, options: SetOptions, command: Command) => {
        const ctx = commandContext(command);
        const cfg = loadSavedConfig(ctx);
        const before = cfg.clone();

        cfg.setSetting(sectionKey, id, value);

        const changes = cfg.computeChanges(before);
        printChanges(changes);

        const problems = cfg.validate();
        if (problems.length > 0) {
            console.log(cli.warningBox(problems.join('\n\n'), `${sym.warning} Validation`));
        }

        if (options.dryRun) {
            cli.info('Dry run: nothing saved');
            return;
        }
        if (changes.settings.length > 0) {
            ctx.store.saveConfig(cfg);
            cli.success(`Saved ${c.value(`${sectionKey}.${id}`)}`);
        }
    }));
