/**
 * Pocket Section
 * Proxy onto the Pocket network's decentralized gateway. Pocket serves HTTP only,
 * so the common Websocket port does not apply to it.
 */

import { Parameter, stringParam } from '../../params/Parameter.js';
import { ExecutionClientSection, variantLabels } from '../../params/Section.js';
import { ConsensusClient, ContainerID } from '../../params/types.js';
import { EC_PROXY_IMAGE } from '../images.js';
import { EC_WS_PORT_ID } from './common.js';

export const DEFAULT_POCKET_GATEWAY_MAINNET = 'lb/5f3a9c0e7d21b40012ab34cd';
export const DEFAULT_POCKET_GATEWAY_PRATER = 'lb/60c1d2e3f4a5b60013cd45ef';

export class PocketSection implements ExecutionClientSection {
    // Nimbus follows the execution chain over Websocket only
    readonly compatibleConsensusClients: readonly ConsensusClient[] = ['lighthouse', 'prysm', 'teku'];
    readonly unsupportedCommonParams: readonly string[] = [EC_WS_PORT_ID];
    readonly stopSignal = 'SIGTERM';

    readonly gatewayId: Parameter<string>;
    readonly containerTag: Parameter<string>;
    readonly additionalFlags: Parameter<string>;

    private readonly sectionTitle: string;

    constructor(isFallback: boolean) {
        const { prefix, title } = variantLabels('Pocket Settings', isFallback);
        const container: ContainerID = isFallback ? 'eth1-fallback' : 'eth1';
        this.sectionTitle = title;

        this.gatewayId = stringParam({
            id: 'gatewayID',
            name: 'Gateway ID',
            description: 'Pocket gateway identifier. Leave the default to use the shared gateway.',
            defaults: {
                mainnet: DEFAULT_POCKET_GATEWAY_MAINNET,
                prater: DEFAULT_POCKET_GATEWAY_PRATER,
            },
            affectsContainers: [container],
            envVars: [`${prefix}POCKET_GATEWAY_ID`],
            regex: '(^$|^(lb\\/)?[0-9a-zA-Z]{24,}$)',
        });

        this.containerTag = stringParam({
            id: 'containerTag',
            name: 'Container Tag',
            description: 'Docker Hub tag of the execution proxy image.',
            defaults: { all: EC_PROXY_IMAGE },
            affectsContainers: [container],
            envVars: [`${prefix}EC_CONTAINER_TAG`],
            overwriteOnUpgrade: true,
        });

        this.additionalFlags = stringParam({
            id: 'additionalFlags',
            name: 'Additional Flags',
            description: 'Extra command line flags passed to the proxy.',
            defaults: { all: '' },
            affectsContainers: [container],
            envVars: [`${prefix}EC_ADDITIONAL_FLAGS`],
            canBeBlank: true,
        });
    }

    title(): string {
        return this.sectionTitle;
    }

    parameters(): readonly Parameter[] {
        return [this.gatewayId, this.containerTag, this.additionalFlags];
    }
}
