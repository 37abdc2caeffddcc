/**
 * Geth Section
 */

import { Parameter, stringParam, uint16Param, uintParam } from '../../params/Parameter.js';
import { ExecutionClientSection } from '../../params/Section.js';
import { ConsensusClient } from '../../params/types.js';
import { GETH_IMAGE } from '../images.js';
import { memoryTierMB, SystemProfile } from '../system.js';

export class GethSection implements ExecutionClientSection {
    readonly compatibleConsensusClients: readonly ConsensusClient[] = ['lighthouse', 'nimbus', 'prysm', 'teku'];
    readonly unsupportedCommonParams: readonly string[] = [];
    readonly stopSignal = 'SIGTERM';

    readonly cacheSize: Parameter<number>;
    readonly maxPeers: Parameter<number>;
    readonly containerTag: Parameter<string>;
    readonly additionalFlags: Parameter<string>;

    constructor(system: SystemProfile) {
        this.cacheSize = uintParam({
            id: 'cache',
            name: 'Cache Size',
            description: 'RAM in MB Geth may use for its cache. Defaults to a value sized from system memory.',
            defaults: { all: memoryTierMB(system) },
            affectsContainers: ['eth1'],
            envVars: ['EC_CACHE_SIZE'],
        });

        this.maxPeers = uint16Param({
            id: 'maxPeers',
            name: 'Max Peers',
            description: 'Maximum number of peers Geth connects to. Keep it at 12 or higher.',
            defaults: { all: system.arch === 'arm64' ? 25 : 50 },
            affectsContainers: ['eth1'],
            envVars: ['EC_MAX_PEERS'],
        });

        this.containerTag = stringParam({
            id: 'containerTag',
            name: 'Container Tag',
            description: 'Docker Hub tag of the Geth image.',
            defaults: { all: GETH_IMAGE },
            affectsContainers: ['eth1'],
            envVars: ['EC_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });

        this.additionalFlags = stringParam({
            id: 'additionalFlags',
            name: 'Additional Flags',
            description: 'Extra command line flags passed to Geth.',
            defaults: { all: '' },
            affectsContainers: ['eth1'],
            envVars: ['EC_ADDITIONAL_FLAGS'],
            canBeBlank: true,
        });
    }

    title(): string {
        return 'Geth Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.cacheSize, this.maxPeers, this.containerTag, this.additionalFlags];
    }
}
