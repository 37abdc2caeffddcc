import { describe, it, expect } from 'vitest';
import { RootConfig } from '../../src/config/RootConfig.js';

const system = { totalMemoryGB: 16, arch: 'amd64' as const };

function newConfig(): RootConfig {
    return new RootConfig('/srv/stack', false, { system });
}

describe('Client Pairing', () => {
    it('accepts the default configuration', () => {
        expect(newConfig().validate()).toEqual([]);
    });

    it('rejects a consensus client the execution client cannot serve', () => {
        const cfg = newConfig();
        cfg.root.executionClient.setValue('pocket');
        cfg.root.consensusClient.setValue('nimbus');
        expect(cfg.validate()).toEqual([
            'Selected Consensus client:\n\tNimbus\nis not compatible with selected Execution client:\n\tpocket',
        ]);
    });

    it('checks the fallback client as well', () => {
        const cfg = newConfig();
        cfg.root.useFallbackExecutionClient.setValue(true);
        cfg.root.consensusClient.setValue('nimbus');
        expect(cfg.validate()).toEqual([
            'Selected Consensus client:\n\tNimbus\nis not compatible with selected fallback Execution client:\n\tpocket',
        ]);
    });

    it('ignores pairing while the consensus client is external', () => {
        const cfg = newConfig();
        cfg.root.executionClient.setValue('pocket');
        cfg.root.consensusClient.setValue('nimbus');
        cfg.root.consensusClientMode.setValue('external');
        cfg.catalog.externalLighthouse.httpUrl.setValue('http://10.0.0.2:5052');
        expect(cfg.validate()).toEqual([]);
    });
});

describe('Blank Values', () => {
    it('reports a blank setting in an active section', () => {
        const cfg = newConfig();
        cfg.root.executionClient.setValue('infura');
        expect(cfg.validate()).toEqual(['[Infura Settings - Infura Project ID] cannot be blank.']);
    });

    it('ignores blank settings of unselected clients', () => {
        const cfg = newConfig();
        expect(cfg.catalog.infura.projectId.value).toBe('');
        expect(cfg.validate()).toEqual([]);
    });

    it('names root settings without a section title', () => {
        const cfg = newConfig();
        cfg.root.reconnectDelay.setValue('');
        expect(cfg.validate()).toEqual(['[Reconnect Delay] cannot be blank.']);
    });

    it('requires both endpoints of an external execution client', () => {
        const cfg = newConfig();
        cfg.root.executionClientMode.setValue('external');
        cfg.catalog.externalExecution.httpUrl.setValue('http://192.168.1.40:8545');
        expect(cfg.validate()).toEqual(['[External Execution Client Settings - Websocket URL] cannot be blank.']);

        cfg.catalog.externalExecution.wsUrl.setValue('ws://192.168.1.40:8546');
        expect(cfg.validate()).toEqual([]);
    });

    it('requires the beaconcha.in key once reporting is enabled', () => {
        const cfg = newConfig();
        cfg.root.enableBitflyNodeMetrics.setValue(true);
        expect(cfg.validate()).toEqual(['[Beaconcha.in Node Metrics Settings - Beaconcha.in API Key] cannot be blank.']);
    });

    it('lists pairing problems before blank values', () => {
        const cfg = newConfig();
        cfg.root.executionClient.setValue('pocket');
        cfg.root.consensusClient.setValue('nimbus');
        cfg.root.reconnectDelay.setValue('');
        expect(cfg.validate()).toHaveLength(2);
        expect(cfg.validate()[1]).toBe('[Reconnect Delay] cannot be blank.');
    });
});
