/**
 * Metrics Sections
 * Grafana, Prometheus and the host exporter, enabled together by the root
 * enableMetrics switch, plus the optional Bitfly node-metrics reporter.
 */

import { boolParam, Parameter, stringParam, uint16Param } from '../params/Parameter.js';
import { Section } from '../params/Section.js';
import { EXPORTER_IMAGE, GRAFANA_IMAGE, PROMETHEUS_IMAGE } from './images.js';

export class GrafanaSection implements Section {
    readonly port: Parameter<number>;
    readonly containerTag: Parameter<string>;

    constructor() {
        this.port = uint16Param({
            id: 'port',
            name: 'Grafana Port',
            description: 'Port Grafana serves its dashboard on.',
            defaults: { all: 3100 },
            affectsContainers: ['grafana'],
            envVars: ['GRAFANA_PORT'],
        });

        this.containerTag = stringParam({
            id: 'containerTag',
            name: 'Grafana Container Tag',
            description: 'Docker Hub tag of the Grafana image.',
            defaults: { all: GRAFANA_IMAGE },
            affectsContainers: ['grafana'],
            envVars: ['GRAFANA_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });
    }

    title(): string {
        return 'Grafana Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.port, this.containerTag];
    }
}

export class PrometheusSection implements Section {
    readonly port: Parameter<number>;
    readonly openPort: Parameter<boolean>;
    readonly containerTag: Parameter<string>;
    readonly additionalFlags: Parameter<string>;

    constructor() {
        this.port = uint16Param({
            id: 'port',
            name: 'Prometheus Port',
            description: 'Port Prometheus serves its HTTP API on.',
            defaults: { all: 9091 },
            affectsContainers: ['prometheus'],
            envVars: ['PROMETHEUS_PORT'],
        });

        this.openPort = boolParam({
            id: 'openPort',
            name: 'Expose Prometheus Port',
            description: 'Expose the Prometheus port to the local network.',
            defaults: { all: false },
            affectsContainers: ['prometheus'],
        });

        this.containerTag = stringParam({
            id: 'containerTag',
            name: 'Prometheus Container Tag',
            description: 'Docker Hub tag of the Prometheus image.',
            defaults: { all: PROMETHEUS_IMAGE },
            affectsContainers: ['prometheus'],
            envVars: ['PROMETHEUS_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });

        // Projected separately, wrapped as a compose list entry
        this.additionalFlags = stringParam({
            id: 'additionalFlags',
            name: 'Additional Prometheus Flags',
            description: 'Extra command line flags passed to Prometheus.',
            defaults: { all: '' },
            affectsContainers: ['prometheus'],
            canBeBlank: true,
        });
    }

    title(): string {
        return 'Prometheus Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.port, this.openPort, this.containerTag, this.additionalFlags];
    }
}

export class ExporterSection implements Section {
    readonly rootFs: Parameter<boolean>;
    readonly containerTag: Parameter<string>;
    readonly additionalFlags: Parameter<string>;

    constructor() {
        this.rootFs = boolParam({
            id: 'enableRootFs',
            name: 'Allow Root Filesystem Access',
            description: 'Give the exporter read access to the root filesystem so it can report free space on every drive.',
            defaults: { all: false },
            affectsContainers: ['exporter'],
        });

        this.containerTag = stringParam({
            id: 'containerTag',
            name: 'Exporter Container Tag',
            description: 'Docker Hub tag of the node exporter image.',
            defaults: { all: EXPORTER_IMAGE },
            affectsContainers: ['exporter'],
            envVars: ['EXPORTER_CONTAINER_TAG'],
            overwriteOnUpgrade: true,
        });

        this.additionalFlags = stringParam({
            id: 'additionalFlags',
            name: 'Additional Exporter Flags',
            description: 'Extra command line flags passed to the node exporter.',
            defaults: { all: '' },
            affectsContainers: ['exporter'],
            canBeBlank: true,
        });
    }

    title(): string {
        return 'Node Exporter Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.rootFs, this.containerTag, this.additionalFlags];
    }
}

export class BitflyNodeMetricsSection implements Section {
    readonly secret: Parameter<string>;
    readonly endpoint: Parameter<string>;
    readonly machineName: Parameter<string>;

    constructor() {
        this.secret = stringParam({
            id: 'bitflySecret',
            name: 'Beaconcha.in API Key',
            description: 'API key of the beaconcha.in account the node reports to.',
            defaults: { all: '' },
            affectsContainers: ['validator', 'eth2'],
            envVars: ['BITFLY_NODE_METRICS_SECRET'],
        });

        this.endpoint = stringParam({
            id: 'bitflyEndpoint',
            name: 'Node Metrics Endpoint',
            description: 'Endpoint the node metrics are sent to.',
            defaults: { all: 'https://beaconcha.in/api/v1/client/metrics' },
            affectsContainers: ['validator', 'eth2'],
            envVars: ['BITFLY_NODE_METRICS_ENDPOINT'],
        });

        this.machineName = stringParam({
            id: 'bitflyMachineName',
            name: 'Machine Name',
            description: 'Name shown for this machine on the beaconcha.in dashboard.',
            defaults: { all: 'Smartnode' },
            affectsContainers: ['validator', 'eth2'],
            envVars: ['BITFLY_NODE_METRICS_MACHINE_NAME'],
        });
    }

    title(): string {
        return 'Beaconcha.in Node Metrics Settings';
    }

    parameters(): readonly Parameter[] {
        return [this.secret, this.endpoint, this.machineName];
    }
}
