/**
 * Config Store
 * Reads and writes the settings document as YAML. Every call opens, uses and
 * releases the file; nothing is held between calls.
 */

import fs from 'fs';
import path from 'path';
import { dump, FAILSAFE_SCHEMA, load } from 'js-yaml';
import { StorageError } from '../params/errors.js';
import { SettingsDocument } from '../params/types.js';
import { RootConfig, RootConfigOptions } from '../config/RootConfig.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalarToString(value: unknown): string | undefined {
    if (value === null) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return undefined;
}

/**
 * Check the parsed YAML has the two-level string shape of a settings document.
 * Hand-edited files often lose quoting, so plain scalars are read back as strings.
 */
export function toSettingsDocument(parsed: unknown, file: string): SettingsDocument {
    if (parsed === undefined || parsed === null) return {};
    if (!isRecord(parsed)) {
        throw new StorageError(`Settings file ${file} is not a mapping of sections`, file);
    }

    const doc: SettingsDocument = {};
    for (const [sectionKey, section] of Object.entries(parsed)) {
        if (section === null) {
            doc[sectionKey] = {};
            continue;
        }
        if (!isRecord(section)) {
            throw new StorageError(`Section [${sectionKey}] in ${file} is not a mapping`, file);
        }
        const map: Record<string, string> = {};
        for (const [id, value] of Object.entries(section)) {
            const text = scalarToString(value);
            if (text === undefined) {
                throw new StorageError(`Setting [${sectionKey}.${id}] in ${file} is not a scalar value`, file);
            }
            map[id] = text;
        }
        doc[sectionKey] = map;
    }
    return doc;
}

export class ConfigStore {
    readonly file: string;
    private log: Logger;

    constructor(file: string, log: Logger = rootLogger.child('ConfigStore')) {
        this.file = file;
        this.log = log;
    }

    exists(): boolean {
        return fs.existsSync(this.file);
    }

    /**
     * Raw document on disk, or null when no settings file exists yet
     */
    load(): SettingsDocument | null {
        if (!this.exists()) {
            this.log.debug(`No settings file at ${this.file}`);
            return null;
        }

        let content: string;
        try {
            content = fs.readFileSync(this.file, 'utf-8');
        } catch (error) {
            throw new StorageError(`Could not read ${this.file}`, this.file, error);
        }

        let parsed: unknown;
        try {
            // Failsafe keeps every scalar as its literal text (0x1F, 007, 1.50)
            parsed = load(content, { schema: FAILSAFE_SCHEMA });
        } catch (error) {
            throw new StorageError(`Settings file ${this.file} is not valid YAML`, this.file, error);
        }

        const doc = toSettingsDocument(parsed, this.file);
        this.log.debug(`Loaded ${Object.keys(doc).length} sections from ${this.file}`);
        return doc;
    }

    /**
     * Write the document through a temporary file and rename it into place, so
     * readers never see a partial file
     */
    save(doc: SettingsDocument): void {
        const dir = path.dirname(this.file);
        const tempFile = path.join(dir, `.${path.basename(this.file)}.${process.pid}.tmp`);
        const content = dump(doc, { lineWidth: -1, sortKeys: false });

        try {
            fs.mkdirSync(dir, { recursive: true });
            const fd = fs.openSync(tempFile, 'w', 0o600);
            try {
                fs.writeFileSync(fd, content, 'utf-8');
                fs.fsyncSync(fd);
            } finally {
                fs.closeSync(fd);
            }
            fs.renameSync(tempFile, this.file);
        } catch (error) {
            fs.rmSync(tempFile, { force: true });
            throw new StorageError(`Could not write ${this.file}`, this.file, error);
        }

        this.log.info(`💾 Settings saved to ${this.file}`);
    }

    /** Copy the current file aside before an upgrade rewrites it */
    backup(): string | null {
        if (!this.exists()) return null;
        const backupFile = `${this.file}.bak`;
        try {
            fs.copyFileSync(this.file, backupFile);
        } catch (error) {
            throw new StorageError(`Could not back up ${this.file}`, this.file, error);
        }
        this.log.debug(`Backed up settings to ${backupFile}`);
        return backupFile;
    }

    /**
     * Settings on disk as a RootConfig, or null when no file exists yet
     */
    loadConfig(directory: string, isNativeMode: boolean, options: RootConfigOptions = {}): RootConfig | null {
        const doc = this.load();
        if (doc === null) return null;
        const cfg = new RootConfig(directory, isNativeMode, options);
        cfg.deserialize(doc);
        return cfg;
    }

    saveConfig(cfg: RootConfig): void {
        this.save(cfg.serialize());
    }
}
