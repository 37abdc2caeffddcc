/**
 * External Consensus Sections
 * Hybrid mode: the beacon node runs outside the stack and only the validator
 * client is managed here.
 */

import { boolParam, Parameter, stringParam } from '../../params/Parameter.js';
import { Section } from '../../params/Section.js';
import { ContainerID } from '../../params/types.js';
import { LIGHTHOUSE_IMAGE, PRYSM_VC_IMAGE, TEKU_IMAGE } from '../images.js';
import { DOPPELGANGER_DETECTION_ID, GRAFFITI_ID, MAX_GRAFFITI_LENGTH } from './common.js';

const BEACON_CONSUMERS: ContainerID[] = ['api', 'node', 'watchtower', 'validator', 'prometheus'];

function httpUrlParam(): Parameter<string> {
    return stringParam({
        id: 'httpUrl',
        name: 'HTTP URL',
        description: 'URL of the HTTP Beacon API of the external consensus client, e.g. http://192.168.1.40:5052',
        defaults: { all: '' },
        affectsContainers: BEACON_CONSUMERS,
        envVars: ['CC_API_ENDPOINT'],
    });
}

function graffitiParam(): Parameter<string> {
    return stringParam({
        id: GRAFFITI_ID,
        name: 'Custom Graffiti',
        description: `Message attached to the blocks you propose. At most ${MAX_GRAFFITI_LENGTH} characters.`,
        defaults: { all: '' },
        affectsContainers: ['validator'],
        envVars: ['CUSTOM_GRAFFITI'],
        canBeBlank: true,
        maxLength: MAX_GRAFFITI_LENGTH,
    });
}

function doppelgangerParam(): Parameter<boolean> {
    return boolParam({
        id: DOPPELGANGER_DETECTION_ID,
        name: 'Enable Doppelganger Detection',
        description: 'Wait a few epochs after a restart and refuse to validate if the keys are already active elsewhere.',
        defaults: { all: true },
        affectsContainers: ['validator'],
        envVars: ['DOPPELGANGER_DETECTION'],
    });
}

function vcContainerTagParam(image: string, clientName: string): Parameter<string> {
    return stringParam({
        id: 'containerTag',
        name: 'Container Tag',
        description: `Docker Hub tag of the ${clientName} validator client image.`,
        defaults: { all: image },
        affectsContainers: ['validator'],
        envVars: ['VC_CONTAINER_TAG'],
        overwriteOnUpgrade: true,
    });
}

function vcFlagsParam(clientName: string): Parameter<string> {
    return stringParam({
        id: 'additionalVcFlags',
        name: 'Additional Validator Client Flags',
        description: `Extra command line flags passed to the ${clientName} validator client.`,
        defaults: { all: '' },
        affectsContainers: ['validator'],
        envVars: ['VC_ADDITIONAL_FLAGS'],
        canBeBlank: true,
    });
}

export class ExternalLighthouseSection implements Section {
    readonly httpUrl = httpUrlParam();
    readonly graffiti = graffitiParam();
    readonly doppelgangerDetection = doppelgangerParam();
    readonly containerTag = vcContainerTagParam(LIGHTHOUSE_IMAGE, 'Lighthouse');
    readonly additionalVcFlags = vcFlagsParam('Lighthouse');

    title(): string {
        return 'External Lighthouse Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.httpUrl, this.graffiti, this.doppelgangerDetection, this.containerTag, this.additionalVcFlags];
    }
}

export class ExternalPrysmSection implements Section {
    readonly httpUrl = httpUrlParam();
    readonly jsonRpcUrl = stringParam({
        id: 'jsonRpcUrl',
        name: 'RPC URL',
        description: 'Address of the gRPC API of the external Prysm beacon node, e.g. 192.168.1.40:5053',
        defaults: { all: '' },
        affectsContainers: ['validator'],
        envVars: ['CC_RPC_ENDPOINT'],
    });
    readonly graffiti = graffitiParam();
    readonly doppelgangerDetection = doppelgangerParam();
    readonly containerTag = vcContainerTagParam(PRYSM_VC_IMAGE, 'Prysm');
    readonly additionalVcFlags = vcFlagsParam('Prysm');

    title(): string {
        return 'External Prysm Settings';
    }

    parameters(): readonly Parameter[] {
        return [
            this.httpUrl,
            this.jsonRpcUrl,
            this.graffiti,
            this.doppelgangerDetection,
            this.containerTag,
            this.additionalVcFlags,
        ];
    }
}

// Teku's validator client has no doppelganger protection
export class ExternalTekuSection implements Section {
    readonly httpUrl = httpUrlParam();
    readonly graffiti = graffitiParam();
    readonly containerTag = vcContainerTagParam(TEKU_IMAGE, 'Teku');
    readonly additionalVcFlags = vcFlagsParam('Teku');

    title(): string {
        return 'External Teku Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.httpUrl, this.graffiti, this.containerTag, this.additionalVcFlags];
    }
}
