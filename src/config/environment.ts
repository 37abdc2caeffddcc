/**
 * Environment Projection
 * Flattens the configuration into the variables the container orchestrator
 * reads. Only the client variants that are selected contribute variables.
 */

import { Parameter } from '../params/Parameter.js';
import { ExecutionClientSection, Section } from '../params/Section.js';
import { EnvironmentMap } from '../params/types.js';
import { ExecutionCommonSection } from '../sections/execution/common.js';
import type { RootConfig } from './RootConfig.js';

// Container hostnames on the stack's network
const EC_HOST = 'eth1';
const FALLBACK_EC_HOST = 'eth1-fallback';
const CC_HOST = 'eth2';

/** EC_CLIENT value while the execution client is externally managed */
const EXTERNAL_CLIENT_MARKER = 'X';

function addParameters(params: readonly Parameter[], env: EnvironmentMap): void {
    for (const param of params) {
        param.addToEnvironment(env);
    }
}

function addSection(section: Section, env: EnvironmentMap): void {
    addParameters(section.parameters(), env);
}

/** Common parameters minus the ones the client ignores */
function supportedCommonParameters(common: ExecutionCommonSection, client: ExecutionClientSection): Parameter[] {
    return common.parameters().filter(param => !client.unsupportedCommonParams.includes(param.id));
}

function portMapping(port: number): string {
    return `"${port}:${port}/tcp"`;
}

/** Port mappings of the common ports the client actually serves */
function openRpcPorts(common: ExecutionCommonSection, client: ExecutionClientSection): string[] {
    return supportedCommonParameters(common, client)
        .filter(param => param === common.httpPort || param === common.wsPort)
        .map(param => portMapping(Number(param.value)));
}

function hostnameOf(endpoint: string | undefined): string | undefined {
    if (endpoint === undefined || !URL.canParse(endpoint)) return undefined;
    return new URL(endpoint).hostname;
}

export function generateEnvironment(cfg: RootConfig): EnvironmentMap {
    const { root, catalog } = cfg;
    const env: EnvironmentMap = {};

    // Identity and root settings
    env.SMARTNODE_IMAGE = catalog.smartnode.containerImage();
    env.STACK_FOLDER = cfg.baseDir;
    addSection(catalog.smartnode, env);
    addSection(root, env);

    // Execution client
    if (root.executionClientMode.value === 'local') {
        const common = catalog.executionCommon;
        const client = cfg.executionClientSection(root.executionClient.value);

        env.EC_CLIENT = root.executionClient.value;
        env.EC_HTTP_ENDPOINT = `http://${EC_HOST}:${common.httpPort.value}`;
        env.EC_WS_ENDPOINT = `ws://${EC_HOST}:${common.wsPort.value}`;
        if (common.openRpcPorts.value) {
            env.EC_OPEN_API_PORTS = openRpcPorts(common, client).map(mapping => `, ${mapping}`).join('');
        }

        addParameters(supportedCommonParameters(common, client), env);
        addSection(client, env);
        env.EC_STOP_SIGNAL = client.stopSignal;
    } else {
        env.EC_CLIENT = EXTERNAL_CLIENT_MARKER;
        addSection(catalog.externalExecution, env);
    }
    const ecHostname = hostnameOf(env.EC_HTTP_ENDPOINT);
    if (ecHostname !== undefined) {
        env.EC_HOSTNAME = ecHostname;
    }

    // Fallback execution client
    if (root.useFallbackExecutionClient.value) {
        if (root.fallbackExecutionClientMode.value === 'local') {
            const common = catalog.fallbackExecutionCommon;
            const client = cfg.fallbackExecutionClientSection(root.fallbackExecutionClient.value);

            env.FALLBACK_EC_HTTP_ENDPOINT = `http://${FALLBACK_EC_HOST}:${common.httpPort.value}`;
            env.FALLBACK_EC_WS_ENDPOINT = `ws://${FALLBACK_EC_HOST}:${common.wsPort.value}`;
            if (common.openRpcPorts.value) {
                env.FALLBACK_EC_OPEN_API_PORTS = openRpcPorts(common, client).join(', ');
            }

            addParameters(supportedCommonParameters(common, client), env);
            addSection(client, env);
        } else {
            addSection(catalog.fallbackExternalExecution, env);
        }
    }

    // Consensus client
    if (root.consensusClientMode.value === 'local') {
        const common = catalog.consensusCommon;

        env.CC_CLIENT = root.consensusClient.value;
        env.CC_API_ENDPOINT = `http://${CC_HOST}:${common.apiPort.value}`;

        let bnOpenPorts = '';
        if (common.openApiPort.value) {
            bnOpenPorts += `, ${portMapping(common.apiPort.value)}`;
        }
        if (root.consensusClient.value === 'prysm' && catalog.prysm.openRpcPort.value) {
            bnOpenPorts += `, ${portMapping(catalog.prysm.rpcPort.value)}`;
        }
        env.BN_OPEN_PORTS = bnOpenPorts;

        addSection(common, env);
        addSection(cfg.localConsensusSection(root.consensusClient.value), env);
        if (root.consensusClient.value === 'prysm') {
            env.CC_RPC_ENDPOINT = `http://${CC_HOST}:${catalog.prysm.rpcPort.value}`;
        }
    } else {
        env.CC_CLIENT = root.externalConsensusClient.value;
        addSection(cfg.selectedConsensusSection(), env);
    }
    const ccHostname = hostnameOf(env.CC_API_ENDPOINT);
    if (ccHostname !== undefined) {
        env.CC_HOSTNAME = ccHostname;
    }

    // Metrics
    if (root.enableMetrics.value) {
        addSection(catalog.exporter, env);
        addSection(catalog.prometheus, env);
        addSection(catalog.grafana, env);

        if (catalog.exporter.rootFs.value) {
            env.EXPORTER_ROOTFS_COMMAND = ', "--path.rootfs=/rootfs"';
            env.EXPORTER_ROOTFS_VOLUME = ', "/:/rootfs:ro"';
        }
        if (catalog.prometheus.openPort.value) {
            env.PROMETHEUS_OPEN_PORTS = `${catalog.prometheus.port.value}:${catalog.prometheus.port.value}/tcp`;
        }
        if (catalog.exporter.additionalFlags.value !== '') {
            env.EXPORTER_ADDITIONAL_FLAGS = `, "${catalog.exporter.additionalFlags.value}"`;
        }
        if (catalog.prometheus.additionalFlags.value !== '') {
            env.PROMETHEUS_ADDITIONAL_FLAGS = `, "${catalog.prometheus.additionalFlags.value}"`;
        }
    }

    if (root.enableBitflyNodeMetrics.value) {
        addSection(catalog.bitflyNodeMetrics, env);
    }

    catalog['addons-gww'].addToEnvironment(env);

    return env;
}

/** Single-quote a value for a POSIX shell */
function shellQuote(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * `NAME='value'` lines sorted by name, safe to `source` or pass to `env`
 */
export function toShellAssignments(env: EnvironmentMap): string[] {
    return Object.keys(env)
        .sort()
        .map(name => `${name}=${shellQuote(env[name])}`);
}
