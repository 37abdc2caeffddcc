/**
 * init: write a fresh settings file with every default applied
 */

import { Command } from 'commander';
import { RootConfig } from '../../config/RootConfig.js';
import { TypeConversionError } from '../../params/errors.js';
import { isNetwork, NETWORKS } from '../../params/types.js';
import cli, { c, sym } from '../../utils/cli.js';
import { commandContext, runAction } from '../context.js';

interface InitOptions {
    network: string;
    force?: boolean;
}

export const initCommand = new Command('init')
    .description('Create a settings file with default values')
    .option('-n, --network <name>', `Network to configure (${NETWORKS.join('/')})`, 'mainnet')
    .option('--force', 'Overwrite existing settings')
    .action(runAction((options: InitOptions, command: Command) => {
        const ctx = commandContext(command);

        if (ctx.store.exists() && !options.force) {
            console.log(cli.warningBox(
                `Settings already exist at ${c.value(ctx.store.file)}\nUse ${c.primary('--force')} to overwrite them`,
                `${sym.warning} Already Configured`
            ));
            return;
        }
        if (!isNetwork(options.network)) {
            throw new TypeConversionError('network', options.network, `network (${NETWORKS.join(', ')})`);
        }

        const cfg = new RootConfig(ctx.directory, ctx.nativeMode);
        cfg.changeNetwork(options.network);
        ctx.store.saveConfig(cfg);

        console.log(cli.successBox([
            `${c.label('File:')}    ${c.value(ctx.store.file)}`,
            `${c.label('Network:')} ${c.value(cfg.network)}`,
            `${c.label('Mode:')}    ${c.value(cfg.isNativeMode ? 'native' : 'docker')}`,
        ].join('\n'), `${sym.success} Settings Created`));
    }));
