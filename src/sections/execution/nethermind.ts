/**
 * Nethermind Section
 */

import { Parameter, stringParam, uint16Param, uintParam } from '../../params/Parameter.js';
import { ExecutionClientSection } from '../../params/Section.js';
import { ConsensusClient } from '../../params/types.js';
import { NETHERMIND_IMAGE } from '../images.js';
import { memoryTierMB, SystemProfile } from '../system.js';

export class NethermindSection implements ExecutionClientSection {
    readonly compatibleConsensusClients: readonly ConsensusClient[] = ['lighthouse', 'nimbus', 'prysm', 'teku'];
    readonly unsupportedCommonParams: readonly string[] = [];
    readonly stopSignal = 'SIGTERM';

    readonly cacheSize: Parameter<number>;
    readonly maxPeers: Parameter<number>;
    readonly pruneMemSize: Parameter<number>;
    readonly containerTag: Parameter<string>;
    readonly additionalFlags: Parameter<string>;

    constructor(system: SystemProfile) {
        this.cacheSize = uintParam({
            id: 'cache',
            name: 'Cache (Memory Hint) Size',
            description: 'RAM in MB suggested to Nethermind for its cache. Nethermind may exceed it.',
            defaults: { all: memoryTierMB(system) },
            affectsContainers: ['eth1'],
            envVars: ['EC_CACHE_SIZE'],
        });

        this.maxPeers = uint16Param({
            id: 'maxPeers',
            name: 'Max Peers',
            description: 'Maximum number of peers Nethermind connects to. Keep it at 12 or higher.',
            defaults: { all: system.arch === 'arm64' ? 25 : 50 },
            affectsContainers: ['eth1'],
            envVars: ['EC_MAX_PEERS'],
        });

        this.pruneMemSize = uintParam({
            id: 'pruneMemSize',
            name: 'In-Memory Pruning Cache Size',
            description: 'RAM in MB for in-memory pruning. Higher values mean fewer disk writes and slower database growth.',
            defaults: { all: memoryTierMB(system) },
            affectsContainers: ['eth1'],
            envVars: ['NETHERMIND_PRUNE_MEM_SIZE'],
        });

        this.containerTag = stringParam({
            id: 'containerTag',
            name: 'Container Tag',
            description: 'Docker Hub tag of the Nethermind image.',
            defaults: { all: NETHERMIND_IMAGE },
            affectsContainers: ['eth1'],
            envVars: ['EC_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });

        this.additionalFlags = stringParam({
            id: 'additionalFlags',
            name: 'Additional Flags',
            description: 'Extra command line flags passed to Nethermind.',
            defaults: { all: '' },
            affectsContainers: ['eth1'],
            envVars: ['EC_ADDITIONAL_FLAGS'],
            canBeBlank: true,
        });
    }

    title(): string {
        return 'Nethermind Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.cacheSize, this.maxPeers, this.pruneMemSize, this.containerTag, this.additionalFlags];
    }
}
