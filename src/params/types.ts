/**
 * Parameter Types
 * Shared enumerations for networks, containers, client selections and value kinds
 */

// ==================== NETWORKS ====================

export const NETWORKS = ['mainnet', 'prater'] as const;
export type Network = typeof NETWORKS[number];

/** Wildcard key for a default that applies on every network */
export const NETWORK_ALL = 'all';
export type NetworkKey = Network | typeof NETWORK_ALL;

export const DEFAULT_NETWORK: Network = 'mainnet';

export function isNetwork(value: string): value is Network {
    return NETWORKS.some(network => network === value);
}

// ==================== CONTAINERS ====================

export const CONTAINER_IDS = [
    'api',
    'node',
    'watchtower',
    'eth1',
    'eth1-fallback',
    'eth2',
    'validator',
    'grafana',
    'prometheus',
    'exporter',
    'addon_gww',
] as const;
export type ContainerID = typeof CONTAINER_IDS[number];

// ==================== CLIENT SELECTION ====================

/** Local = managed by the stack (Docker mode), external = hybrid mode */
export type Mode = 'local' | 'external';

export type ExecutionClient = 'geth' | 'nethermind' | 'besu' | 'infura' | 'pocket';
export type FallbackExecutionClient = 'infura' | 'pocket';
export type ConsensusClient = 'lighthouse' | 'nimbus' | 'prysm' | 'teku';
export type ExternalConsensusClient = 'lighthouse' | 'prysm' | 'teku';

// ==================== VALUES ====================

export type ParameterType = 'bool' | 'int' | 'uint' | 'uint16' | 'float' | 'string' | 'choice';

/** Runtime representation of each parameter type */
export interface ParameterTypeMap {
    bool: boolean;
    int: number;
    uint: number;
    uint16: number;
    float: number;
    string: string;
    choice: string;
}

export type ParameterValue = ParameterTypeMap[ParameterType];

export interface ParameterOption<V extends string = string> {
    name: string;
    description: string;
    value: V;
}

export interface NumericRange {
    min?: number;
    max?: number;
}

/** Flat persisted form: section key -> parameter id -> string value */
export type SettingsDocument = Record<string, Record<string, string>>;

export type EnvironmentMap = Record<string, string>;
