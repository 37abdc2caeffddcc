/**
 * Besu Section
 */

import { Parameter, stringParam, uint16Param, uintParam } from '../../params/Parameter.js';
import { ExecutionClientSection } from '../../params/Section.js';
import { ConsensusClient } from '../../params/types.js';
import { BESU_IMAGE } from '../images.js';
import { SystemProfile } from '../system.js';

function besuHeapSizeMB(system: SystemProfile): number {
    // 0 lets the JVM decide
    if (system.totalMemoryGB >= 16 && system.arch === 'amd64') return 8192;
    return 0;
}

export class BesuSection implements ExecutionClientSection {
    readonly compatibleConsensusClients: readonly ConsensusClient[] = ['lighthouse', 'nimbus', 'prysm', 'teku'];
    readonly unsupportedCommonParams: readonly string[] = [];
    readonly stopSignal = 'SIGTERM';

    readonly jvmHeapSize: Parameter<number>;
    readonly maxPeers: Parameter<number>;
    readonly maxBackLayers: Parameter<number>;
    readonly containerTag: Parameter<string>;
    readonly additionalFlags: Parameter<string>;

    constructor(system: SystemProfile) {
        this.jvmHeapSize = uintParam({
            id: 'jvmHeapSize',
            name: 'JVM Heap Size',
            description: 'Upper bound in MB for the Besu JVM heap. 0 for automatic allocation.',
            defaults: { all: besuHeapSizeMB(system) },
            affectsContainers: ['eth1'],
            envVars: ['BESU_JVM_HEAP_SIZE'],
        });

        this.maxPeers = uint16Param({
            id: 'maxPeers',
            name: 'Max Peers',
            description: 'Maximum number of peers Besu connects to.',
            defaults: { all: 25 },
            affectsContainers: ['eth1'],
            envVars: ['EC_MAX_PEERS'],
        });

        this.maxBackLayers = uintParam({
            id: 'maxBackLayers',
            name: 'Historical Block Replay Limit',
            description: 'Number of historical blocks Besu can replay to rebuild old state.',
            defaults: { all: 512 },
            affectsContainers: ['eth1'],
            envVars: ['BESU_MAX_BACK_LAYERS'],
        });

        this.containerTag = stringParam({
            id: 'containerTag',
            name: 'Container Tag',
            description: 'Docker Hub tag of the Besu image.',
            defaults: { all: BESU_IMAGE },
            affectsContainers: ['eth1'],
            envVars: ['EC_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });

        this.additionalFlags = stringParam({
            id: 'additionalFlags',
            name: 'Additional Flags',
            description: 'Extra command line flags passed to Besu.',
            defaults: { all: '' },
            affectsContainers: ['eth1'],
            envVars: ['EC_ADDITIONAL_FLAGS'],
            canBeBlank: true,
        });
    }

    title(): string {
        return 'Besu Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.jvmHeapSize, this.maxPeers, this.maxBackLayers, this.containerTag, this.additionalFlags];
    }
}
