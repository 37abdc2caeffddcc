/**
 * Migration Steps
 * Each step rewrites the raw two-level document from schema version N-1 to N.
 * Steps work on plain string maps only; the sections they read from may no
 * longer exist in the current catalog.
 */

import { SettingsDocument } from '../params/types.js';

export interface MigrationStep {
    version: number;
    description: string;
    apply(doc: SettingsDocument): void;
}

const ROOT = 'root';

const LOCAL_EXECUTION_CLIENTS = ['geth', 'nethermind', 'besu', 'infura', 'pocket'];
const LOCAL_CONSENSUS_CLIENTS = ['lighthouse', 'nimbus', 'prysm', 'teku'];

function sectionOf(doc: SettingsDocument, key: string): Record<string, string> {
    const existing = doc[key];
    if (existing) return existing;
    const created: Record<string, string> = {};
    doc[key] = created;
    return created;
}

/** Copy a value unless the target already has one, then drop it from the source */
function moveKey(from: Record<string, string>, fromKey: string, to: Record<string, string>, toKey: string = fromKey): void {
    const value = from[fromKey];
    if (value === undefined) return;
    if (to[toKey] === undefined) {
        to[toKey] = value;
    }
    delete from[fromKey];
}

// v1: the single legacy 'eth1' section splits into the shared port settings
// and the settings of whichever client was selected
const splitLegacyExecutionSection: MigrationStep = {
    version: 1,
    description: 'Split the legacy eth1 section into executionCommon and the selected client',
    apply(doc) {
        const legacy = doc.eth1;
        if (!legacy) return;

        const common = sectionOf(doc, 'executionCommon');
        for (const key of ['httpPort', 'wsPort', 'openRpcPorts']) {
            moveKey(legacy, key, common);
        }

        const selected = doc[ROOT]?.executionClient;
        const clientKey = selected !== undefined && LOCAL_EXECUTION_CLIENTS.includes(selected) ? selected : 'geth';
        const client = sectionOf(doc, clientKey);
        for (const key of Object.keys(legacy)) {
            moveKey(legacy, key, client);
        }

        delete doc.eth1;
    },
};

const FALLBACK_RENAMES: ReadonlyArray<[string, string]> = [
    ['useFallbackEc', 'useFallbackExecutionClient'],
    ['fallbackEcMode', 'fallbackExecutionClientMode'],
    ['fallbackEc', 'fallbackExecutionClient'],
];

const renameFallbackKeys: MigrationStep = {
    version: 2,
    description: 'Rename the abbreviated fallback execution client root keys',
    apply(doc) {
        const root = doc[ROOT];
        if (!root) return;
        for (const [oldKey, newKey] of FALLBACK_RENAMES) {
            moveKey(root, oldKey, root, newKey);
        }
    },
};

// v3: graffiti and doppelganger detection used to be stored per client
const SHARED_VALIDATOR_KEYS = ['graffiti', 'doppelgangerDetection'];

const hoistValidatorSettings: MigrationStep = {
    version: 3,
    description: 'Move graffiti and doppelganger detection into consensusCommon',
    apply(doc) {
        const selected = doc[ROOT]?.consensusClient;
        const order = selected !== undefined && LOCAL_CONSENSUS_CLIENTS.includes(selected)
            ? [selected, ...LOCAL_CONSENSUS_CLIENTS.filter(client => client !== selected)]
            : LOCAL_CONSENSUS_CLIENTS;

        const holders = order.filter(client => {
            const section = doc[client];
            return section !== undefined && SHARED_VALIDATOR_KEYS.some(key => section[key] !== undefined);
        });
        if (holders.length === 0) return;

        const common = sectionOf(doc, 'consensusCommon');
        for (const client of holders) {
            const section = sectionOf(doc, client);
            for (const key of SHARED_VALIDATOR_KEYS) {
                moveKey(section, key, common);
            }
        }
    },
};

const splitMetricsSection: MigrationStep = {
    version: 4,
    description: 'Split the legacy metrics section into root, grafana and prometheus',
    apply(doc) {
        const metrics = doc.metrics;
        if (!metrics) return;

        moveKey(metrics, 'enabled', sectionOf(doc, ROOT), 'enableMetrics');
        if (metrics.grafanaPort !== undefined) {
            moveKey(metrics, 'grafanaPort', sectionOf(doc, 'grafana'), 'port');
        }
        if (metrics.prometheusPort !== undefined) {
            moveKey(metrics, 'prometheusPort', sectionOf(doc, 'prometheus'), 'port');
        }

        delete doc.metrics;
    },
};

export const MIGRATIONS: readonly MigrationStep[] = [
    splitLegacyExecutionSection,
    renameFallbackKeys,
    hoistValidatorSettings,
    splitMetricsSection,
];
