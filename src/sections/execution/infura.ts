/**
 * Infura Section
 * Light proxy forwarding execution requests to Infura. Usable as the primary
 * client or as the fallback.
 */

import { Parameter, stringParam } from '../../params/Parameter.js';
import { ExecutionClientSection, variantLabels } from '../../params/Section.js';
import { ConsensusClient, ContainerID } from '../../params/types.js';
import { EC_PROXY_IMAGE } from '../images.js';

export class InfuraSection implements ExecutionClientSection {
    readonly compatibleConsensusClients: readonly ConsensusClient[] = ['lighthouse', 'nimbus', 'prysm', 'teku'];
    readonly unsupportedCommonParams: readonly string[] = [];
    readonly stopSignal = 'SIGTERM';

    readonly projectId: Parameter<string>;
    readonly containerTag: Parameter<string>;
    readonly additionalFlags: Parameter<string>;

    private readonly sectionTitle: string;

    constructor(isFallback: boolean) {
        const { prefix, title } = variantLabels('Infura Settings', isFallback);
        const container: ContainerID = isFallback ? 'eth1-fallback' : 'eth1';
        this.sectionTitle = title;

        this.projectId = stringParam({
            id: 'projectID',
            name: 'Infura Project ID',
            description: 'The project ID of your Infura Ethereum project.',
            defaults: { all: '' },
            affectsContainers: [container],
            envVars: [`${prefix}INFURA_PROJECT_ID`],
            regex: '^[0-9a-fA-F]{32}$',
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
        return [this.projectId, this.containerTag, this.additionalFlags];
    }
}
