/**
 * Nimbus Section
 * Nimbus runs its validator duties inside the beacon node process, so there is no
 * separate validator container to restart while it is the local client.
 */

import { Parameter, stringParam, uint16Param } from '../../params/Parameter.js';
import { ContainerRedirect, Section } from '../../params/Section.js';
import { NIMBUS_IMAGE } from '../images.js';

const REDIRECTS: readonly ContainerRedirect[] = [
    { container: 'validator', mode: 'local', override: 'eth2' },
];

export class NimbusSection implements Section {
    readonly maxPeers: Parameter<number>;
    readonly containerTag: Parameter<string>;
    readonly additionalFlags: Parameter<string>;

    constructor() {
        this.maxPeers = uint16Param({
            id: 'maxPeers',
            name: 'Max Peers',
            description: 'Maximum number of peers the beacon node keeps.',
            defaults: { all: 160 },
            affectsContainers: ['eth2'],
            envVars: ['BN_MAX_PEERS'],
        });

        this.containerTag = stringParam({
            id: 'containerTag',
            name: 'Container Tag',
            description: 'Docker Hub tag of the Nimbus image.',
            defaults: { all: NIMBUS_IMAGE },
            affectsContainers: ['eth2', 'validator'],
            envVars: ['BN_CONTAINER_TAG', 'VC_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });

        this.additionalFlags = stringParam({
            id: 'additionalFlags',
            name: 'Additional Flags',
            description: 'Extra command line flags passed to Nimbus.',
            defaults: { all: '' },
            affectsContainers: ['eth2'],
            envVars: ['BN_ADDITIONAL_FLAGS'],
            canBeBlank: true,
        });
    }

    title(): string {
        return 'Nimbus Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.maxPeers, this.containerTag, this.additionalFlags];
    }

    containerRedirects(): readonly ContainerRedirect[] {
        return REDIRECTS;
    }
}
