/**
 * External Execution Section
 * Endpoints of an execution client the operator runs outside the stack.
 */

import { Parameter, stringParam } from '../../params/Parameter.js';
import { Section, variantLabels } from '../../params/Section.js';
import { ContainerID } from '../../params/types.js';

export class ExternalExecutionSection implements Section {
    readonly httpUrl: Parameter<string>;
    readonly wsUrl: Parameter<string>;

    private readonly sectionTitle: string;

    constructor(isFallback: boolean) {
        const { prefix, title } = variantLabels('External Execution Client Settings', isFallback);
        const ecContainer: ContainerID = isFallback ? 'eth1-fallback' : 'eth1';
        const affected: ContainerID[] = ['api', ecContainer, 'eth2', 'node', 'watchtower'];
        this.sectionTitle = title;

        this.httpUrl = stringParam({
            id: 'httpUrl',
            name: 'HTTP URL',
            description: 'URL of the HTTP RPC endpoint of the external execution client, e.g. http://192.168.1.40:8545',
            defaults: { all: '' },
            affectsContainers: affected,
            envVars: [`${prefix}EC_HTTP_ENDPOINT`],
        });

        this.wsUrl = stringParam({
            id: 'wsUrl',
            name: 'Websocket URL',
            description: 'URL of the Websocket RPC endpoint of the external execution client, e.g. ws://192.168.1.40:8546',
            defaults: { all: '' },
            affectsContainers: affected,
            envVars: [`${prefix}EC_WS_ENDPOINT`],
        });
    }

    title(): string {
        return this.sectionTitle;
    }

    parameters(): readonly Parameter[] {
        return [this.httpUrl, this.wsUrl];
    }
}
