import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigStore, toSettingsDocument } from '../../src/storage/ConfigStore.js';
import { RootConfig } from '../../src/config/RootConfig.js';
import { StorageError } from '../../src/params/errors.js';
import { Logger } from '../../src/utils/logger.js';

const system = { totalMemoryGB: 16, arch: 'amd64' as const };
const quiet = new Logger('test', 'error');

describe('Settings Document Shape', () => {
    it('reads an empty file as an empty document', () => {
        expect(toSettingsDocument(null, 'user-settings.yml')).toEqual({});
    });
    it('reads plain scalars back as strings', () => {
        const doc = toSettingsDocument({ geth: { maxPeers: 30, openRpcPorts: false, containerTag: null } }, 'f.yml');
        expect(doc).toEqual({ geth: { maxPeers: '30', openRpcPorts: 'false', containerTag: '' } });
    });
    it('reads an empty section as an empty map', () => {
        expect(toSettingsDocument({ teku: null }, 'f.yml')).toEqual({ teku: {} });
    });
    it('rejects nested values', () => {
        expect(() => toSettingsDocument({ geth: { flags: ['--a', '--b'] } }, 'f.yml'))
            .toThrow('Setting [geth.flags] in f.yml is not a scalar value');
    });
    it('rejects a document that is not a mapping', () => {
        expect(() => toSettingsDocument(['root'], 'f.yml')).toThrow(StorageError);
    });
});

describe('ConfigStore', () => {
    let dir: string;
    let file: string;
    let store: ConfigStore;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stack-config-'));
        file = path.join(dir, 'user-settings.yml');
        store = new ConfigStore(file, quiet);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('returns null while no settings file exists', () => {
        expect(store.exists()).toBe(false);
        expect(store.load()).toBeNull();
        expect(store.loadConfig(dir, false, { system })).toBeNull();
    });

    it('saves and loads a document', () => {
        store.save({ root: { version: 'v4' }, geth: { maxPeers: '30' } });
        expect(store.exists()).toBe(true);
        expect(store.load()).toEqual({ root: { version: 'v4' }, geth: { maxPeers: '30' } });
    });

    it('leaves no temporary file behind', () => {
        store.save({ root: { version: 'v4' } });
        expect(fs.readdirSync(dir)).toEqual(['user-settings.yml']);
    });

    it('creates missing parent directories', () => {
        const nested = new ConfigStore(path.join(dir, 'a', 'b', 'settings.yml'), quiet);
        nested.save({ root: {} });
        expect(nested.load()).toEqual({ root: {} });
    });

    it('reports invalid YAML', () => {
        fs.writeFileSync(file, 'root: [unclosed');
        expect(() => store.load()).toThrow(StorageError);
        expect(() => store.load()).toThrow(`Settings file ${file} is not valid YAML`);
    });

    it('keeps unquoted scalars as written', () => {
        fs.writeFileSync(file, [
            'consensusCommon:',
            '  graffiti: 0x1F',
            '  checkpointSyncUrl: 007',
            'smartnode:',
            '  priorityFee: 1.50',
            '  projectName: true',
            'teku:',
            '',
        ].join('\n'));

        expect(store.load()).toEqual({
            consensusCommon: { graffiti: '0x1F', checkpointSyncUrl: '007' },
            smartnode: { priorityFee: '1.50', projectName: 'true' },
            teku: {},
        });
    });

    it('reads a hand-edited hex graffiti back verbatim', () => {
        fs.writeFileSync(file, 'consensusCommon:\n  graffiti: 0x1F\n');
        const cfg = store.loadConfig(dir, false, { system });
        expect(cfg?.catalog.consensusCommon.graffiti.value).toBe('0x1F');
    });

    it('copies the file aside on backup', () => {
        expect(store.backup()).toBeNull();
        store.save({ root: { version: 'v3' } });
        expect(store.backup()).toBe(`${file}.bak`);
        expect(fs.readFileSync(`${file}.bak`, 'utf-8')).toBe(fs.readFileSync(file, 'utf-8'));
    });

    it('round-trips a full configuration', () => {
        const cfg = new RootConfig(dir, false, { system });
        cfg.root.consensusClient.setValue('teku');
        cfg.catalog.geth.maxPeers.setValue(30);
        cfg.catalog.consensusCommon.graffiti.setValue('hello: world');
        store.saveConfig(cfg);

        const loaded = store.loadConfig(dir, false, { system });
        expect(loaded).not.toBeNull();
        expect(loaded?.root.consensusClient.value).toBe('teku');
        expect(loaded?.catalog.geth.maxPeers.value).toBe(30);
        expect(loaded?.catalog.consensusCommon.graffiti.value).toBe('hello: world');
        expect(loaded?.serialize()).toEqual(cfg.serialize());
    });

    it('loads a hand-edited legacy file', () => {
        fs.writeFileSync(file, [
            'root:',
            '  executionClient: geth',
            'eth1:',
            '  httpPort: 8600',
            '  maxPeers: 40',
            'smartnode:',
            '  network: prater',
            '',
        ].join('\n'));

        const cfg = store.loadConfig(dir, false, { system });
        expect(cfg?.network).toBe('prater');
        expect(cfg?.catalog.executionCommon.httpPort.value).toBe(8600);
        expect(cfg?.catalog.geth.maxPeers.value).toBe(40);
        expect(cfg?.version).toBe('v4');
    });
});
