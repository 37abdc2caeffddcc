/**
 * Teku Section
 */

import { Parameter, stringParam, uint16Param } from '../../params/Parameter.js';
import { Section } from '../../params/Section.js';
import { TEKU_IMAGE } from '../images.js';

export class TekuSection implements Section {
    readonly maxPeers: Parameter<number>;
    readonly containerTag: Parameter<string>;
    readonly additionalBnFlags: Parameter<string>;
    readonly additionalVcFlags: Parameter<string>;

    constructor() {
        this.maxPeers = uint16Param({
            id: 'maxPeers',
            name: 'Max Peers',
            description: 'Maximum number of peers the beacon node keeps.',
            defaults: { all: 74 },
            affectsContainers: ['eth2'],
            envVars: ['BN_MAX_PEERS'],
        });

        this.containerTag = stringParam({
            id: 'containerTag',
            name: 'Container Tag',
            description: 'Docker Hub tag of the Teku image, used for the beacon node and the validator client.',
            defaults: { all: TEKU_IMAGE },
            affectsContainers: ['eth2', 'validator'],
            envVars: ['BN_CONTAINER_TAG', 'VC_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });

        this.additionalBnFlags = stringParam({
            id: 'additionalBnFlags',
            name: 'Additional Beacon Node Flags',
            description: 'Extra command line flags passed to the Teku beacon node.',
            defaults: { all: '' },
            affectsContainers: ['eth2'],
            envVars: ['BN_ADDITIONAL_FLAGS'],
            canBeBlank: true,
        });

        this.additionalVcFlags = stringParam({
            id: 'additionalVcFlags',
            name: 'Additional Validator Client Flags',
            description: 'Extra command line flags passed to the Teku validator client.',
            defaults: { all: '' },
            affectsContainers: ['validator'],
            envVars: ['VC_ADDITIONAL_FLAGS'],
            canBeBlank: true,
        });
    }

    title(): string {
        return 'Teku Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.maxPeers, this.containerTag, this.additionalBnFlags, this.additionalVcFlags];
    }
}
