/**
 * Root Parameters
 * Top-level switches that pick which client variants and optional services run.
 */

import { boolParam, choiceParam, Parameter, stringParam, uint16Param } from '../params/Parameter.js';
import { Section } from '../params/Section.js';
import {
    ConsensusClient,
    ContainerID,
    ExecutionClient,
    ExternalConsensusClient,
    FallbackExecutionClient,
    Mode,
    ParameterOption,
} from '../params/types.js';

export const ROOT_KEY = 'root';
export const ROOT_TITLE = 'Top-level Settings';

// Metadata stored beside the root parameters
export const META_BASE_DIR = 'baseDir';
export const META_IS_NATIVE = 'isNative';
export const META_VERSION = 'version';

const ALL_CLIENT_CONSUMERS: ContainerID[] = ['api', 'node', 'watchtower', 'eth1', 'eth2', 'validator'];

const MODE_OPTIONS: ParameterOption<Mode>[] = [
    { name: 'Locally Managed', description: 'The stack creates and manages the client for you.', value: 'local' },
    { name: 'Externally Managed', description: 'You run the client yourself and the stack connects to it.', value: 'external' },
];

const LIGHTHOUSE_OPTION = {
    name: 'Lighthouse',
    description: 'Rust client by Sigma Prime, focused on speed and security.',
    value: 'lighthouse',
} as const;
const PRYSM_OPTION = {
    name: 'Prysm',
    description: 'Client by Prysmatic Labs, with a strong focus on usability.',
    value: 'prysm',
} as const;
const TEKU_OPTION = {
    name: 'Teku',
    description: 'Java client by ConsenSys, suited to institutional operators.',
    value: 'teku',
} as const;

export const CONSENSUS_CLIENT_OPTIONS: ParameterOption<ConsensusClient>[] = [
    LIGHTHOUSE_OPTION,
    { name: 'Nimbus', description: 'Nim client by Status, with a minimal resource footprint.', value: 'nimbus' },
    PRYSM_OPTION,
    TEKU_OPTION,
];

const FALLBACK_CLIENT_OPTIONS: ParameterOption<FallbackExecutionClient>[] = [
    { name: 'Infura', description: 'Hosted Ethereum API. Requires a project ID.', value: 'infura' },
    { name: 'Pocket', description: 'Decentralized gateway onto the Pocket network.', value: 'pocket' },
];

function metricsPortParam(id: string, subject: string, port: number, containers: ContainerID[], envVar: string): Parameter<number> {
    return uint16Param({
        id,
        name: `${subject} Metrics Port`,
        description: `Port Prometheus scrapes for ${subject} metrics.`,
        defaults: { all: port },
        affectsContainers: [...containers, 'prometheus'],
        envVars: [envVar],
    });
}

export class RootParameters implements Section {
    readonly executionClientMode: Parameter<Mode>;
    readonly executionClient: Parameter<ExecutionClient>;
    readonly useFallbackExecutionClient: Parameter<boolean>;
    readonly fallbackExecutionClientMode: Parameter<Mode>;
    readonly fallbackExecutionClient: Parameter<FallbackExecutionClient>;
    readonly reconnectDelay: Parameter<string>;
    readonly consensusClientMode: Parameter<Mode>;
    readonly consensusClient: Parameter<ConsensusClient>;
    readonly externalConsensusClient: Parameter<ExternalConsensusClient>;
    readonly enableMetrics: Parameter<boolean>;
    readonly enableBitflyNodeMetrics: Parameter<boolean>;
    readonly ecMetricsPort: Parameter<number>;
    readonly bnMetricsPort: Parameter<number>;
    readonly vcMetricsPort: Parameter<number>;
    readonly nodeMetricsPort: Parameter<number>;
    readonly exporterMetricsPort: Parameter<number>;
    readonly watchtowerMetricsPort: Parameter<number>;

    constructor() {
        this.executionClientMode = choiceParam<Mode>({
            id: 'executionClientMode',
            name: 'Execution Client Mode',
            description: 'Run a new execution client in the stack, or use one you already manage.',
            defaults: { all: 'local' },
            affectsContainers: ALL_CLIENT_CONSUMERS,
            options: MODE_OPTIONS,
        });

        this.executionClient = choiceParam<ExecutionClient>({
            id: 'executionClient',
            name: 'Execution Client',
            description: 'The execution client the stack runs.',
            defaults: { all: 'geth' },
            affectsContainers: ALL_CLIENT_CONSUMERS,
            options: [
                { name: 'Geth', description: 'The reference execution client, the most widely used.', value: 'geth' },
                { name: 'Nethermind', description: '.NET client with fast sync and rich tracing.', value: 'nethermind' },
                { name: 'Besu', description: 'Java client by Hyperledger.', value: 'besu' },
                ...FALLBACK_CLIENT_OPTIONS,
            ],
        });

        this.useFallbackExecutionClient = boolParam({
            id: 'useFallbackExecutionClient',
            name: 'Use Fallback Execution Client',
            description: 'Keep a second execution client to fail over to while the primary is down or syncing.',
            defaults: { all: false },
            affectsContainers: ['api', 'node', 'watchtower', 'eth1-fallback', 'eth2'],
        });

        this.fallbackExecutionClientMode = choiceParam<Mode>({
            id: 'fallbackExecutionClientMode',
            name: 'Fallback Execution Client Mode',
            description: 'Run the fallback client in the stack, or use one you already manage.',
            defaults: { all: 'local' },
            affectsContainers: ['api', 'node', 'watchtower', 'eth1-fallback', 'eth2'],
            options: MODE_OPTIONS,
        });

        this.fallbackExecutionClient = choiceParam<FallbackExecutionClient>({
            id: 'fallbackExecutionClient',
            name: 'Fallback Execution Client',
            description: 'The light client used as the fallback.',
            defaults: { all: 'pocket' },
            affectsContainers: ['api', 'node', 'watchtower', 'eth1-fallback', 'eth2'],
            envVars: ['FALLBACK_EC_CLIENT'],
            options: FALLBACK_CLIENT_OPTIONS,
        });

        this.reconnectDelay = stringParam({
            id: 'reconnectDelay',
            name: 'Reconnect Delay',
            description: 'Wait before retrying the primary client after failing over, e.g. 30s, 5m, 1h.',
            defaults: { all: '60s' },
            affectsContainers: ['api', 'node', 'watchtower'],
            envVars: ['RECONNECT_DELAY'],
            regex: '^[0-9]+(ms|s|m|h)$',
        });

        this.consensusClientMode = choiceParam<Mode>({
            id: 'consensusClientMode',
            name: 'Consensus Client Mode',
            description: 'Run a new consensus client in the stack, or use one you already manage.',
            defaults: { all: 'local' },
            affectsContainers: ALL_CLIENT_CONSUMERS,
            options: MODE_OPTIONS,
        });

        this.consensusClient = choiceParam<ConsensusClient>({
            id: 'consensusClient',
            name: 'Consensus Client',
            description: 'The consensus client the stack runs.',
            defaults: { all: 'lighthouse' },
            affectsContainers: ALL_CLIENT_CONSUMERS,
            options: CONSENSUS_CLIENT_OPTIONS,
        });

        this.externalConsensusClient = choiceParam<ExternalConsensusClient>({
            id: 'externalConsensusClient',
            name: 'Consensus Client',
            description: 'The kind of externally managed consensus client you run.',
            defaults: { all: 'lighthouse' },
            affectsContainers: ALL_CLIENT_CONSUMERS,
            options: [LIGHTHOUSE_OPTION, PRYSM_OPTION, TEKU_OPTION],
        });

        this.enableMetrics = boolParam({
            id: 'enableMetrics',
            name: 'Enable Metrics',
            description: 'Run Grafana, Prometheus and the node exporter to chart the health of the node.',
            defaults: { all: true },
            affectsContainers: ['api', 'node', 'watchtower', 'eth1', 'eth2', 'validator', 'grafana', 'prometheus', 'exporter'],
            envVars: ['ENABLE_METRICS'],
        });

        this.enableBitflyNodeMetrics = boolParam({
            id: 'enableBitflyNodeMetrics',
            name: 'Enable Beaconcha.in Node Metrics',
            description: 'Report node and validator health to the beaconcha.in dashboard.',
            defaults: { all: false },
            affectsContainers: ['validator', 'eth2'],
            envVars: ['ENABLE_BITFLY_NODE_METRICS'],
        });

        this.ecMetricsPort = metricsPortParam('ecMetricsPort', 'Execution Client', 9105, ['eth1'], 'EC_METRICS_PORT');
        this.bnMetricsPort = metricsPortParam('bnMetricsPort', 'Beacon Node', 9100, ['eth2'], 'BN_METRICS_PORT');
        this.vcMetricsPort = metricsPortParam('vcMetricsPort', 'Validator Client', 9101, ['validator'], 'VC_METRICS_PORT');
        this.nodeMetricsPort = metricsPortParam('nodeMetricsPort', 'Node Daemon', 9102, ['node'], 'NODE_METRICS_PORT');
        this.exporterMetricsPort = metricsPortParam('exporterMetricsPort', 'Exporter', 9103, ['exporter'], 'EXPORTER_METRICS_PORT');
        this.watchtowerMetricsPort = metricsPortParam('watchtowerMetricsPort', 'Watchtower', 9104, ['watchtower'], 'WATCHTOWER_METRICS_PORT');
    }

    title(): string {
        return ROOT_TITLE;
    }

    parameters(): readonly Parameter[] {
        return [
            this.executionClientMode,
            this.executionClient,
            this.useFallbackExecutionClient,
            this.fallbackExecutionClientMode,
            this.fallbackExecutionClient,
            this.reconnectDelay,
            this.consensusClientMode,
            this.consensusClient,
            this.externalConsensusClient,
            this.enableMetrics,
            this.enableBitflyNodeMetrics,
            this.ecMetricsPort,
            this.bnMetricsPort,
            this.vcMetricsPort,
            this.nodeMetricsPort,
            this.exporterMetricsPort,
            this.watchtowerMetricsPort,
        ];
    }
}
