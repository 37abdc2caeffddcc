/**
 * network: switch networks, moving every untouched default along
 */

import { Command } from 'commander';
import { TypeConversionError } from '../../params/errors.js';
import { isNetwork, NETWORKS } from '../../params/types.js';
import cli, { c } from '../../utils/cli.js';
import { commandContext, loadSavedConfig, printChanges, runAction } from '../context.js';

export const networkCommand = new Command('network')
    .description('Switch the configured network')
    .argument('<name>', `Network (${NETWORKS.join('/')})`)
    .action(runAction((name: string, _options: unknown, command: Command) => {
        if (!isNetwork(name)) {
            throw new TypeConversionError('network', name, `network (${NETWORKS.join(', ')})`);
        }

        const ctx = commandContext(command);
        const cfg = loadSavedConfig(ctx);
        if (cfg.network === name) {
            cli.info(`Already on ${c.value(name)}`);
            return;
        }

        const before = cfg.clone();
        cfg.changeNetwork(name);
        printChanges(cfg.computeChanges(before));
        ctx.store.saveConfig(cfg);
        cli.success(`Switched to ${c.value(name)} (chain id ${cfg.chainId()})`);
    }));
