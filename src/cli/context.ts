/**
 * Shared plumbing for the stackcfg commands: locating the settings file,
 * loading it, and rendering failures.
 */

import path from 'path';
import { Command } from 'commander';
import { config } from '../config.js';
import { RootConfig } from '../config/RootConfig.js';
import { ChangeSet, groupBySection } from '../config/changes.js';
import { isConfigError } from '../params/errors.js';
import { ConfigStore } from '../storage/ConfigStore.js';
import cli, { c, sym } from '../utils/cli.js';

export interface GlobalOptions {
    dir: string;
    file?: string;
    native: boolean;
}

export interface CommandContext {
    directory: string;
    nativeMode: boolean;
    store: ConfigStore;
}

function readGlobalOptions(command: Command): GlobalOptions {
    const opts = command.optsWithGlobals();
    return {
        dir: typeof opts.dir === 'string' ? opts.dir : config.configDir,
        file: typeof opts.file === 'string' ? opts.file : undefined,
        native: opts.native === true || config.nativeMode,
    };
}

export function commandContext(command: Command): CommandContext {
    const options = readGlobalOptions(command);
    const directory = path.resolve(options.dir);
    const file = options.file ?? (options.dir === config.configDir ? config.settingsFile : path.join(directory, 'user-settings.yml'));
    return {
        directory,
        nativeMode: options.native,
        store: new ConfigStore(path.resolve(file)),
    };
}

/**
 * The saved configuration. Exits when there is nothing saved yet.
 */
export function loadSavedConfig(ctx: CommandContext): RootConfig {
    const cfg = ctx.store.loadConfig(ctx.directory, ctx.nativeMode);
    if (!cfg) {
        console.log(cli.warningBox(
            `No settings at ${c.value(ctx.store.file)}\nRun ${c.primary('stackcfg init')} first`,
            `${sym.warning} Not Configured`
        ));
        process.exit(1);
    }
    return cfg;
}

export function printChanges(changes: ChangeSet): void {
    if (changes.settings.length === 0) {
        cli.info('No settings changed');
        return;
    }

    for (const [section, settings] of groupBySection(changes.settings)) {
        console.log(c.subheading(section));
        for (const setting of settings) {
            console.log(`  ${sym.bullet} ${c.label(setting.name + ':')} ${c.dim(setting.oldValue || '(blank)')} ${sym.arrow} ${c.value(setting.newValue || '(blank)')}`);
        }
    }
    cli.newline();

    const containers = [...changes.affectedContainers].sort();
    cli.keyValue('Containers to restart', containers.join(', '));
    if (changes.networkChanged) {
        cli.warn('The network changed: chain data of the previous network must be removed');
    }
}

/**
 * Run a command body, rendering configuration errors instead of a stack trace
 */
export function runAction<A extends unknown[]>(body: (...args: A) => void): (...args: A) => void {
    return (...args: A) => {
        try {
            body(...args);
        } catch (error) {
            if (isConfigError(error)) {
                console.error(cli.errorBox(error.message, `${sym.error} ${error.code}`));
                process.exitCode = 1;
                return;
            }
            throw error;
        }
    };
}
