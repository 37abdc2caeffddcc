/**
 * Native Section
 * Used instead of the container sections when the operator runs every client
 * as a system service and the stack only drives the daemon.
 */

import { choiceParam, Parameter, stringParam } from '../params/Parameter.js';
import { Section } from '../params/Section.js';
import { ConsensusClient } from '../params/types.js';

export class NativeSection implements Section {
    readonly ecHttpUrl: Parameter<string>;
    readonly consensusClient: Parameter<ConsensusClient>;
    readonly ccHttpUrl: Parameter<string>;
    readonly validatorRestartCommand: Parameter<string>;

    constructor() {
        this.ecHttpUrl = stringParam({
            id: 'ecHttpUrl',
            name: 'Execution Client URL',
            description: 'HTTP RPC URL of the execution client service.',
            defaults: { all: 'http://127.0.0.1:8545' },
            affectsContainers: ['api', 'node', 'watchtower'],
        });

        this.consensusClient = choiceParam<ConsensusClient>({
            id: 'consensusClient',
            name: 'Consensus Client',
            description: 'Consensus client the validator service runs.',
            defaults: { all: 'lighthouse' },
            affectsContainers: ['api', 'node', 'watchtower'],
            options: [
                { name: 'Lighthouse', description: 'Lighthouse by Sigma Prime.', value: 'lighthouse' },
                { name: 'Nimbus', description: 'Nimbus by Status.', value: 'nimbus' },
                { name: 'Prysm', description: 'Prysm by Prysmatic Labs.', value: 'prysm' },
                { name: 'Teku', description: 'Teku by ConsenSys.', value: 'teku' },
            ],
        });

        this.ccHttpUrl = stringParam({
            id: 'ccHttpUrl',
            name: 'Consensus Client URL',
            description: 'HTTP Beacon API URL of the consensus client service.',
            defaults: { all: 'http://127.0.0.1:5052' },
            affectsContainers: ['api', 'node', 'watchtower'],
        });

        this.validatorRestartCommand = stringParam({
            id: 'validatorRestartCommand',
            name: 'Validator Restart Command',
            description: 'Shell command the daemon runs after it adds validator keys.',
            defaults: { all: '' },
            affectsContainers: ['node'],
            canBeBlank: true,
        });
    }

    title(): string {
        return 'Native Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.ecHttpUrl, this.consensusClient, this.ccHttpUrl, this.validatorRestartCommand];
    }
}
