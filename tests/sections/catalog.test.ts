import { describe, it, expect } from 'vitest';
import { RootConfig } from '../../src/config/RootConfig.js';
import { NETWORKS } from '../../src/params/types.js';
import { memoryTierMB } from '../../src/sections/system.js';
import { GethSection } from '../../src/sections/execution/geth.js';
import { BesuSection } from '../../src/sections/execution/besu.js';
import { InfuraSection } from '../../src/sections/execution/infura.js';
import { PocketSection, DEFAULT_POCKET_GATEWAY_PRATER } from '../../src/sections/execution/pocket.js';
import { ExecutionCommonSection } from '../../src/sections/execution/common.js';
import { NimbusSection } from '../../src/sections/consensus/nimbus.js';
import { SmartnodeSection } from '../../src/sections/smartnode.js';

const system = { totalMemoryGB: 16, arch: 'amd64' as const };

describe('Section Catalog', () => {
    const cfg = new RootConfig('/srv/stack', false, { system });

    it('keeps parameter ids unique within every section', () => {
        for (const [, section] of [['root', cfg.root] as const, ...cfg.sections()]) {
            const ids = section.parameters().map(param => param.id);
            expect(new Set(ids).size).toBe(ids.length);
        }
    });
    it('gives every section a distinct title', () => {
        const titles = [cfg.root.title(), ...cfg.sections().map(([, section]) => section.title())];
        expect(new Set(titles).size).toBe(titles.length);
    });
    it('lists parameters in the same order for every instance', () => {
        const other = new RootConfig('/elsewhere', false, { system });
        for (const [key, section] of cfg.sections()) {
            const ids = section.parameters().map(param => param.id);
            expect(other.catalog[key].parameters().map(param => param.id)).toEqual(ids);
        }
    });
    it('resolves a default for every parameter on every network', () => {
        for (const { param } of cfg.allParameters()) {
            for (const network of NETWORKS) {
                expect(() => param.resolveDefault(network)).not.toThrow();
            }
        }
    });
});

describe('Execution Sections', () => {
    it('sizes caches from system memory', () => {
        expect(memoryTierMB({ totalMemoryGB: 8, arch: 'amd64' })).toBe(512);
        expect(memoryTierMB({ totalMemoryGB: 16, arch: 'amd64' })).toBe(2048);
        expect(memoryTierMB({ totalMemoryGB: 64, arch: 'amd64' })).toBe(8192);
        expect(new GethSection(system).cacheSize.value).toBe(2048);
    });
    it('lowers peer counts on arm64', () => {
        expect(new GethSection({ totalMemoryGB: 8, arch: 'arm64' }).maxPeers.value).toBe(25);
        expect(new GethSection(system).maxPeers.value).toBe(50);
    });
    it('lets the JVM size Besu heaps on small machines', () => {
        expect(new BesuSection(system).jvmHeapSize.value).toBe(8192);
        expect(new BesuSection({ totalMemoryGB: 8, arch: 'amd64' }).jvmHeapSize.value).toBe(0);
    });
    it('prefixes fallback variables and retargets the fallback container', () => {
        const primary = new InfuraSection(false);
        const fallback = new InfuraSection(true);
        expect(primary.projectId.envVars).toEqual(['INFURA_PROJECT_ID']);
        expect(fallback.projectId.envVars).toEqual(['FALLBACK_INFURA_PROJECT_ID']);
        expect(fallback.projectId.affectsContainers).toEqual(['eth1-fallback']);
        expect(fallback.title()).toBe('Fallback Infura Settings');
    });
    it('gives the fallback its own default ports', () => {
        expect(new ExecutionCommonSection(false).httpPort.value).toBe(8545);
        expect(new ExecutionCommonSection(true).httpPort.value).toBe(8645);
    });
    it('marks the Websocket port as unused by Pocket', () => {
        const pocket = new PocketSection(false);
        expect(pocket.unsupportedCommonParams).toEqual(['wsPort']);
        expect(pocket.compatibleConsensusClients).not.toContain('nimbus');
        expect(pocket.gatewayId.resolveDefault('prater')).toBe(DEFAULT_POCKET_GATEWAY_PRATER);
    });
});

describe('Consensus Sections', () => {
    it('Nimbus redirects validator restarts to the beacon node', () => {
        expect(new NimbusSection().containerRedirects()).toEqual([
            { container: 'validator', mode: 'local', override: 'eth2' },
        ]);
    });
});

describe('Smartnode Section', () => {
    const smartnode = new SmartnodeSection('/srv/stack');

    it('defaults the data path under the stack directory', () => {
        expect(smartnode.dataPath.value).toBe('/srv/stack/data');
    });
    it('derives key paths from the explicit mode', () => {
        expect(smartnode.walletPath({ isNativeMode: true })).toBe('/srv/stack/data/wallet');
        expect(smartnode.walletPath({ isNativeMode: false })).toBe('/.stacknode/data/wallet');
        expect(smartnode.validatorKeychainPath({ isNativeMode: false })).toBe('/.stacknode/data/validators');
    });
    it('looks up chain facts for the selected network', () => {
        expect(smartnode.chainId()).toBe(1);
        smartnode.network.setValue('prater');
        expect(smartnode.chainId()).toBe(5);
        expect(smartnode.txWatchUrl()).toBe('https://goerli.etherscan.io/tx');
    });
});
