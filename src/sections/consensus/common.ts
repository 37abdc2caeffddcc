/**
 * Consensus Common Section
 * Settings every locally managed beacon node understands.
 */

import { boolParam, Parameter, stringParam, uint16Param } from '../../params/Parameter.js';
import { Section } from '../../params/Section.js';

export const GRAFFITI_ID = 'graffiti';
export const DOPPELGANGER_DETECTION_ID = 'doppelgangerDetection';

/** Beacon chain graffiti is a 32-byte field; the version tag takes the rest */
export const MAX_GRAFFITI_LENGTH = 16;

export class ConsensusCommonSection implements Section {
    readonly graffiti: Parameter<string>;
    readonly checkpointSyncUrl: Parameter<string>;
    readonly p2pPort: Parameter<number>;
    readonly apiPort: Parameter<number>;
    readonly openApiPort: Parameter<boolean>;
    readonly doppelgangerDetection: Parameter<boolean>;

    constructor() {
        this.graffiti = stringParam({
            id: GRAFFITI_ID,
            name: 'Custom Graffiti',
            description: `Message attached to the blocks you propose. At most ${MAX_GRAFFITI_LENGTH} characters.`,
            defaults: { all: '' },
            affectsContainers: ['validator'],
            envVars: ['CUSTOM_GRAFFITI'],
            canBeBlank: true,
            maxLength: MAX_GRAFFITI_LENGTH,
        });

        this.checkpointSyncUrl = stringParam({
            id: 'checkpointSyncUrl',
            name: 'Checkpoint Sync URL',
            description: 'Beacon node API to copy a recent finalized state from, so a fresh node syncs in minutes.',
            defaults: { all: '' },
            affectsContainers: ['eth2'],
            envVars: ['CHECKPOINT_SYNC_URL'],
            canBeBlank: true,
        });

        this.p2pPort = uint16Param({
            id: 'p2pPort',
            name: 'P2P Port',
            description: 'Port the consensus client uses to talk to other consensus clients.',
            defaults: { all: 9001 },
            affectsContainers: ['eth2'],
            envVars: ['BN_P2P_PORT'],
        });

        this.apiPort = uint16Param({
            id: 'apiPort',
            name: 'HTTP API Port',
            description: 'Port the consensus client serves its HTTP API on.',
            defaults: { all: 5052 },
            affectsContainers: ['api', 'node', 'watchtower', 'eth2', 'validator', 'prometheus'],
            envVars: ['BN_API_PORT'],
        });

        this.openApiPort = boolParam({
            id: 'openApiPort',
            name: 'Expose API Port',
            description: 'Expose the HTTP API port to the local network.',
            defaults: { all: false },
            affectsContainers: ['eth2'],
        });

        this.doppelgangerDetection = boolParam({
            id: DOPPELGANGER_DETECTION_ID,
            name: 'Enable Doppelganger Detection',
            description: 'Wait a few epochs after a restart and refuse to validate if the keys are already active elsewhere.',
            defaults: { all: true },
            affectsContainers: ['validator'],
            envVars: ['DOPPELGANGER_DETECTION'],
        });
    }

    title(): string {
        return 'Common Consensus Client Settings';
    }

    parameters(): readonly Parameter[] {
        return [
            this.graffiti,
            this.checkpointSyncUrl,
            this.p2pPort,
            this.apiPort,
            this.openApiPort,
            this.doppelgangerDetection,
        ];
    }
}
