import { describe, it, expect } from 'vitest';
import {
    CURRENT_SCHEMA_VERSION,
    migrate,
    parseVersion,
    pendingMigrations,
} from '../../src/migration/index.js';
import { UnsupportedVersionError } from '../../src/params/errors.js';
import { SettingsDocument } from '../../src/params/types.js';

describe('Version Stamps', () => {
    it('treats a missing stamp as the oldest version', () => {
        expect(parseVersion(undefined)).toBe(0);
        expect(parseVersion('')).toBe(0);
    });
    it('parses v-prefixed versions', () => {
        expect(parseVersion('v3')).toBe(3);
    });
    it('rejects stamps it cannot read', () => {
        expect(() => parseVersion('1.4.0')).toThrow(UnsupportedVersionError);
    });
    it('knows four schema steps', () => {
        expect(CURRENT_SCHEMA_VERSION).toBe(4);
    });
});

describe('Migration Steps', () => {
    it('splits the legacy eth1 section by the selected client', () => {
        const doc: SettingsDocument = {
            root: { executionClient: 'nethermind' },
            eth1: { httpPort: '8600', wsPort: '8601', cache: '4096', maxPeers: '40' },
        };
        migrate(doc);
        expect(doc.eth1).toBeUndefined();
        expect(doc.executionCommon).toEqual({ httpPort: '8600', wsPort: '8601' });
        expect(doc.nethermind).toEqual({ cache: '4096', maxPeers: '40' });
        expect(doc.geth).toBeUndefined();
    });

    it('moves legacy client settings to Geth when no client is recorded', () => {
        const doc: SettingsDocument = { eth1: { maxPeers: '30' } };
        migrate(doc);
        expect(doc.geth).toEqual({ maxPeers: '30' });
    });

    it('renames the abbreviated fallback keys', () => {
        const doc: SettingsDocument = {
            root: { useFallbackEc: 'true', fallbackEcMode: 'external', fallbackEc: 'infura' },
        };
        migrate(doc);
        expect(doc.root).toEqual({
            useFallbackExecutionClient: 'true',
            fallbackExecutionClientMode: 'external',
            fallbackExecutionClient: 'infura',
            version: 'v4',
        });
    });

    it('hoists validator settings, preferring the selected client', () => {
        const doc: SettingsDocument = {
            root: { version: 'v2', consensusClient: 'teku' },
            lighthouse: { graffiti: 'from lighthouse', maxPeers: '60' },
            teku: { graffiti: 'from teku', doppelgangerDetection: 'false' },
        };
        migrate(doc);
        expect(doc.consensusCommon).toEqual({ graffiti: 'from teku', doppelgangerDetection: 'false' });
        expect(doc.lighthouse).toEqual({ maxPeers: '60' });
        expect(doc.teku).toEqual({});
    });

    it('splits the legacy metrics section', () => {
        const doc: SettingsDocument = {
            root: { version: 'v3' },
            metrics: { enabled: 'false', grafanaPort: '3200', prometheusPort: '9191' },
        };
        migrate(doc);
        expect(doc.metrics).toBeUndefined();
        expect(doc.root).toEqual({ version: 'v4', enableMetrics: 'false' });
        expect(doc.grafana).toEqual({ port: '3200' });
        expect(doc.prometheus).toEqual({ port: '9191' });
    });

    it('never overwrites a value already in the target', () => {
        const doc: SettingsDocument = {
            root: { version: 'v3', enableMetrics: 'true' },
            metrics: { enabled: 'false' },
        };
        migrate(doc);
        expect(doc.root.enableMetrics).toBe('true');
        expect(doc.grafana).toBeUndefined();
    });
});

describe('Migration Engine', () => {
    it('stamps the current version', () => {
        const doc: SettingsDocument = {};
        migrate(doc);
        expect(doc.root).toEqual({ version: 'v4' });
    });

    it('leaves a current document untouched', () => {
        const doc: SettingsDocument = {
            root: { version: 'v4', executionClient: 'besu' },
            metrics: { enabled: 'false' },
        };
        migrate(doc);
        expect(doc).toEqual({
            root: { version: 'v4', executionClient: 'besu' },
            metrics: { enabled: 'false' },
        });
    });

    it('is idempotent', () => {
        const doc: SettingsDocument = {
            root: { fallbackEc: 'pocket' },
            eth1: { httpPort: '8545' },
        };
        migrate(doc);
        const once = structuredClone(doc);
        migrate(doc);
        expect(doc).toEqual(once);
    });

    it('refuses documents from a newer release', () => {
        const doc: SettingsDocument = { root: { version: 'v9' } };
        expect(() => migrate(doc)).toThrow('Settings version "v9" is not supported (latest known: v4)');
    });

    it('lists the steps a document still needs', () => {
        expect(pendingMigrations({ root: { version: 'v2' } })).toEqual([
            'v3: Move graffiti and doppelganger detection into consensusCommon',
            'v4: Split the legacy metrics section into root, grafana and prometheus',
        ]);
        expect(pendingMigrations({ root: { version: 'v4' } })).toEqual([]);
    });
});
