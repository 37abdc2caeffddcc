/**
 * Execution Common Section
 * Ports shared by every locally managed execution client, primary or fallback.
 */

import { boolParam, Parameter, uint16Param } from '../../params/Parameter.js';
import { Section, variantLabels } from '../../params/Section.js';
import { ContainerID } from '../../params/types.js';

export const EC_HTTP_PORT_ID = 'httpPort';
export const EC_WS_PORT_ID = 'wsPort';

export class ExecutionCommonSection implements Section {
    readonly httpPort: Parameter<number>;
    readonly wsPort: Parameter<number>;
    readonly openRpcPorts: Parameter<boolean>;

    private readonly sectionTitle: string;

    constructor(isFallback: boolean) {
        const { prefix, title } = variantLabels('Common Execution Client Settings', isFallback);
        const ecContainer: ContainerID = isFallback ? 'eth1-fallback' : 'eth1';
        this.sectionTitle = title;

        this.httpPort = uint16Param({
            id: EC_HTTP_PORT_ID,
            name: 'HTTP Port',
            description: 'Port the execution client serves its HTTP RPC endpoint on.',
            defaults: { all: isFallback ? 8645 : 8545 },
            affectsContainers: ['api', 'node', 'watchtower', ecContainer, 'eth2'],
            envVars: [`${prefix}EC_HTTP_PORT`],
        });

        this.wsPort = uint16Param({
            id: EC_WS_PORT_ID,
            name: 'Websocket Port',
            description: 'Port the execution client serves its Websocket RPC endpoint on.',
            defaults: { all: isFallback ? 8646 : 8546 },
            affectsContainers: [ecContainer, 'eth2'],
            envVars: [`${prefix}EC_WS_PORT`],
        });

        this.openRpcPorts = boolParam({
            id: 'openRpcPorts',
            name: 'Expose RPC Ports',
            description: 'Expose the HTTP and Websocket RPC ports to the local network.',
            defaults: { all: false },
            affectsContainers: [ecContainer],
        });
    }

    title(): string {
        return this.sectionTitle;
    }

    parameters(): readonly Parameter[] {
        return [this.httpPort, this.wsPort, this.openRpcPorts];
    }
}
