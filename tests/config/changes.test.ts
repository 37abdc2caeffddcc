import { describe, it, expect } from 'vitest';
import { RootConfig } from '../../src/config/RootConfig.js';
import { groupBySection } from '../../src/config/changes.js';

const system = { totalMemoryGB: 16, arch: 'amd64' as const };

function newConfig(): RootConfig {
    return new RootConfig('/srv/stack', false, { system });
}

describe('Change Detection', () => {
    it('finds nothing between a config and its copy', () => {
        const cfg = newConfig();
        const changes = cfg.computeChanges(cfg.clone());
        expect(changes.settings).toEqual([]);
        expect(changes.affectedContainers.size).toBe(0);
        expect(changes.networkChanged).toBe(false);
    });

    it('reports a single edited parameter with its containers', () => {
        const before = newConfig();
        const after = before.clone();
        after.catalog.geth.maxPeers.setValue(30);

        const changes = after.computeChanges(before);
        expect(changes.settings).toEqual([{
            section: 'Geth Settings',
            id: 'maxPeers',
            name: 'Max Peers',
            oldValue: '50',
            newValue: '30',
            affectedContainers: new Set(['eth1']),
        }]);
        expect(changes.affectedContainers).toEqual(new Set(['eth1']));
    });

    it('unions the containers of several changes', () => {
        const before = newConfig();
        const after = before.clone();
        after.catalog.consensusCommon.graffiti.setValue('hi');
        after.catalog.consensusCommon.p2pPort.setValue(9002);

        const changes = after.computeChanges(before);
        expect(changes.settings.map(setting => setting.id)).toEqual(['graffiti', 'p2pPort']);
        expect(changes.affectedContainers).toEqual(new Set(['validator', 'eth2']));
    });

    it('reports a network switch', () => {
        const before = newConfig();
        const after = before.clone();
        after.changeNetwork('prater');

        const changes = after.computeChanges(before);
        expect(changes.networkChanged).toBe(true);
        expect(changes.settings.find(setting => setting.id === 'network')).toMatchObject({
            section: 'Smartnode Settings',
            oldValue: 'mainnet',
            newValue: 'prater',
        });
    });
});

describe('Container Redirects', () => {
    function withNimbus(mode: 'local' | 'external'): RootConfig {
        const cfg = newConfig();
        cfg.root.consensusClient.setValue('nimbus');
        cfg.root.consensusClientMode.setValue(mode);
        return cfg;
    }

    it('restarts the beacon node instead of the validator for a merged client', () => {
        const before = withNimbus('local');
        const after = before.clone();
        after.catalog.consensusCommon.graffiti.setValue('hi');

        const changes = after.computeChanges(before);
        expect(changes.settings).toHaveLength(1);
        expect(changes.settings[0].affectedContainers).toEqual(new Set(['eth2']));
        expect(changes.affectedContainers).toEqual(new Set(['eth2']));
    });

    it('collapses beacon node and validator into one restart', () => {
        const before = withNimbus('local');
        const after = before.clone();
        after.catalog.nimbus.containerTag.setValue('statusim/nimbus-eth2:custom');

        expect(after.computeChanges(before).affectedContainers).toEqual(new Set(['eth2']));
    });

    it('leaves containers alone for split clients', () => {
        const before = newConfig();
        const after = before.clone();
        after.catalog.lighthouse.containerTag.setValue('sigp/lighthouse:custom');

        expect(after.computeChanges(before).affectedContainers).toEqual(new Set(['eth2', 'validator']));
    });

    it('only applies the redirect in the mode it was declared for', () => {
        const before = withNimbus('external');
        const after = before.clone();
        after.catalog.consensusCommon.graffiti.setValue('hi');

        expect(after.computeChanges(before).affectedContainers).toEqual(new Set(['validator']));
    });
});

describe('Grouping', () => {
    it('groups changed settings by section title', () => {
        const before = newConfig();
        const after = before.clone();
        after.catalog.geth.maxPeers.setValue(30);
        after.catalog.geth.cacheSize.setValue(1024);
        after.smartnode.priorityFee.setValue(3);

        const grouped = groupBySection(after.computeChanges(before).settings);
        expect([...grouped.keys()]).toEqual(['Smartnode Settings', 'Geth Settings']);
        expect(grouped.get('Geth Settings')?.map(setting => setting.id)).toEqual(['cache', 'maxPeers']);
    });
});
