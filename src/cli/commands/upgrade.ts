/**
 * upgrade: migrate the saved file to the current schema and refresh the
 * settings that track the installed version
 */

import { Command } from 'commander';
import { pendingMigrations } from '../../migration/index.js';
import cli, { c, sym } from '../../utils/cli.js';
import { commandContext, loadSavedConfig, printChanges, runAction } from '../context.js';

export const upgradeCommand = new Command('upgrade')
    .description('Migrate saved settings and refresh container tags')
    .action(runAction((_options: unknown, command: Command) => {
        const ctx = commandContext(command);

        const raw = ctx.store.load();
        const steps = raw ? pendingMigrations(raw) : [];
        for (const step of steps) {
            console.log(`${sym.pointer} ${c.dim('Migrating')} ${step}`);
        }

        const cfg = loadSavedConfig(ctx);
        const before = cfg.clone();
        cfg.updateDefaultsOnUpgrade();
        printChanges(cfg.computeChanges(before));

        const backup = ctx.store.backup();
        if (backup) {
            cli.keyValue('Backup', backup);
        }
        ctx.store.saveConfig(cfg);
        cli.success(`Settings are at schema ${c.value(cfg.version)}`);
    }));
