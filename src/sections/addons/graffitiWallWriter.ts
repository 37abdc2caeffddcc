/**
 * Graffiti Wall Writer Addon
 * Paints an image onto the beaconcha.in graffiti wall by rotating the validator
 * graffiti. Contributes to the environment only while enabled.
 */

import { boolParam, Parameter, stringParam, uintParam } from '../../params/Parameter.js';
import { Section } from '../../params/Section.js';
import { EnvironmentMap } from '../../params/types.js';
import { GWW_IMAGE } from '../images.js';

export const GWW_ENABLED_ID = 'enabled';

export class GraffitiWallWriterSection implements Section {
    readonly enabled: Parameter<boolean>;
    readonly inputUrl: Parameter<string>;
    readonly updateWallTime: Parameter<number>;
    readonly containerTag: Parameter<string>;
    readonly additionalFlags: Parameter<string>;

    constructor() {
        this.enabled = boolParam({
            id: GWW_ENABLED_ID,
            name: 'Enabled',
            description: 'Run the graffiti wall writer alongside the validator client.',
            defaults: { all: false },
            affectsContainers: ['addon_gww', 'validator'],
        });

        this.inputUrl = stringParam({
            id: 'inputUrl',
            name: 'Input URL',
            description: 'URL or container path of the image description to paint.',
            defaults: {
                mainnet: 'https://cdn-stacknode.example.org/graffiti/mainnet.json',
                prater: 'https://cdn-stacknode.example.org/graffiti/prater.json',
            },
            affectsContainers: ['addon_gww'],
            envVars: ['ADDON_GWW_INPUT_URL'],
        });

        this.updateWallTime = uintParam({
            id: 'updateWallTime',
            name: 'Wall Update Interval',
            description: 'Seconds between refreshes of the current wall state.',
            defaults: { all: 600 },
            affectsContainers: ['addon_gww'],
            envVars: ['ADDON_GWW_UPDATE_WALL_TIME'],
            range: { min: 60 },
        });

        this.containerTag = stringParam({
            id: 'containerTag',
            name: 'Container Tag',
            description: 'Docker Hub tag of the graffiti wall writer image.',
            defaults: { all: GWW_IMAGE },
            affectsContainers: ['addon_gww'],
            envVars: ['ADDON_GWW_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });

        this.additionalFlags = stringParam({
            id: 'additionalFlags',
            name: 'Additional Flags',
            description: 'Extra command line flags passed to the graffiti wall writer.',
            defaults: { all: '' },
            affectsContainers: ['addon_gww'],
            envVars: ['ADDON_GWW_ADDITIONAL_FLAGS'],
            canBeBlank: true,
        });
    }

    title(): string {
        return 'Graffiti Wall Writer';
    }

    parameters(): readonly Parameter[] {
        return [this.enabled, this.inputUrl, this.updateWallTime, this.containerTag, this.additionalFlags];
    }

    addToEnvironment(env: EnvironmentMap): void {
        if (!this.enabled.value) return;
        for (const param of this.parameters()) {
            param.addToEnvironment(env);
        }
    }
}
