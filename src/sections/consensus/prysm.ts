/**
 * Prysm Section
 * Prysm ships separate beacon node and validator images, and its validator talks
 * to the beacon node over gRPC.
 */

import { boolParam, Parameter, stringParam, uint16Param } from '../../params/Parameter.js';
import { Section } from '../../params/Section.js';
import { PRYSM_BN_IMAGE, PRYSM_VC_IMAGE } from '../images.js';

export class PrysmSection implements Section {
    readonly maxPeers: Parameter<number>;
    readonly rpcPort: Parameter<number>;
    readonly openRpcPort: Parameter<boolean>;
    readonly bnContainerTag: Parameter<string>;
    readonly vcContainerTag: Parameter<string>;
    readonly additionalBnFlags: Parameter<string>;
    readonly additionalVcFlags: Parameter<string>;

    constructor() {
        this.maxPeers = uint16Param({
            id: 'maxPeers',
            name: 'Max Peers',
            description: 'Maximum number of peers the beacon node keeps.',
            defaults: { all: 45 },
            affectsContainers: ['eth2'],
            envVars: ['BN_MAX_PEERS'],
        });

        this.rpcPort = uint16Param({
            id: 'rpcPort',
            name: 'RPC Port',
            description: 'Port the beacon node serves its gRPC API on.',
            defaults: { all: 5053 },
            affectsContainers: ['eth2', 'validator'],
            envVars: ['BN_RPC_PORT'],
        });

        this.openRpcPort = boolParam({
            id: 'openRpcPort',
            name: 'Expose RPC Port',
            description: 'Expose the gRPC port to the local network.',
            defaults: { all: false },
            affectsContainers: ['eth2'],
        });

        this.bnContainerTag = stringParam({
            id: 'bnContainerTag',
            name: 'Beacon Node Container Tag',
            description: 'Docker Hub tag of the Prysm beacon node image.',
            defaults: { all: PRYSM_BN_IMAGE },
            affectsContainers: ['eth2'],
            envVars: ['BN_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });

        this.vcContainerTag = stringParam({
            id: 'vcContainerTag',
            name: 'Validator Client Container Tag',
            description: 'Docker Hub tag of the Prysm validator client image.',
            defaults: { all: PRYSM_VC_IMAGE },
            affectsContainers: ['validator'],
            envVars: ['VC_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });

        this.additionalBnFlags = stringParam({
            id: 'additionalBnFlags',
            name: 'Additional Beacon Node Flags',
            description: 'Extra command line flags passed to the Prysm beacon node.',
            defaults: { all: '' },
            affectsContainers: ['eth2'],
            envVars: ['BN_ADDITIONAL_FLAGS'],
            canBeBlank: true,
        });

        this.additionalVcFlags = stringParam({
            id: 'additionalVcFlags',
            name: 'Additional Validator Client Flags',
            description: 'Extra command line flags passed to the Prysm validator client.',
            defaults: { all: '' },
            affectsContainers: ['validator'],
            envVars: ['VC_ADDITIONAL_FLAGS'],
            canBeBlank: true,
        });
    }

    title(): string {
        return 'Prysm Settings';
    }

    parameters(): readonly Parameter[] {
        return [
            this.maxPeers,
            this.rpcPort,
            this.openRpcPort,
            this.bnContainerTag,
            this.vcContainerTag,
            this.additionalBnFlags,
            this.additionalVcFlags,
        ];
    }
}
