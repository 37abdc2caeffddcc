/**
 * show: print the current settings, by section
 */

import { Command } from 'commander';
import { Section } from '../../params/Section.js';
import { ROOT_KEY } from '../../config/root.js';
import cli, { c, sym } from '../../utils/cli.js';
import { commandContext, loadSavedConfig, runAction } from '../context.js';

interface ShowOptions {
    all?: boolean;
    section?: string;
}

export const showCommand = new Command('show')
    .description('Show current settings (sections in use, unless --all)')
    .option('-a, --all', 'Include sections of clients that are not selected')
    .option('-s, --section <key>', 'Only show one section')
    .action(runAction((options: ShowOptions, command: Command) => {
        const cfg = loadSavedConfig(commandContext(command));

        const sections: Array<[string, Section]> = options.all
            ? [[ROOT_KEY, cfg.root], ...cfg.sections()]
            : cfg.activeSections();

        console.log(cli.header(`Settings (${cfg.network})`));
        for (const [key, section] of sections) {
            if (options.section !== undefined && options.section !== key) continue;

            cli.newline();
            console.log(`${c.heading(section.title())} ${c.dim(`[${key}]`)}`);
            for (const param of section.parameters()) {
                const marker = param.isDefault(cfg.network) ? ' ' : c.highlight('*');
                const value = param.format();
                console.log(`${marker} ${c.label(param.id.padEnd(28))} ${value === '' ? c.dim('(blank)') : c.value(value)}`);
            }
        }
        cli.newline();
        console.log(c.dim(`${sym.bullet} * marks values changed from the default`));
    }));
