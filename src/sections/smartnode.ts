/**
 * Smartnode Section
 * Daemon-wide settings, including the network selection every other default keys off.
 */

import path from 'path';
import { choiceParam, floatParam, Parameter, stringParam } from '../params/Parameter.js';
import { Section } from '../params/Section.js';
import { ContainerID, Network } from '../params/types.js';
import { SMARTNODE_IMAGE } from './images.js';

export const NETWORK_PARAM_ID = 'network';

const DEFAULT_PROJECT_NAME = 'stacknode';

const ALL_SERVICES: ContainerID[] = [
    'api', 'node', 'watchtower', 'eth1', 'eth2', 'validator', 'grafana', 'prometheus', 'exporter',
];

// In-container locations used when the daemon runs under Docker
const CONTAINER_DATA_DIR = '/.stacknode/data';

const CHAIN_IDS: Record<Network, number> = {
    mainnet: 1,
    prater: 5,
};

const TX_WATCH_URLS: Record<Network, string> = {
    mainnet: 'https://etherscan.io/tx',
    prater: 'https://goerli.etherscan.io/tx',
};

/**
 * What the derived paths depend on. Passed in by the caller instead of the
 * section holding on to its owner.
 */
export interface PathContext {
    isNativeMode: boolean;
}

export class SmartnodeSection implements Section {
    readonly network: Parameter<Network>;
    readonly projectName: Parameter<string>;
    readonly dataPath: Parameter<string>;
    readonly manualMaxFee: Parameter<number>;
    readonly priorityFee: Parameter<number>;
    readonly rplClaimGasThreshold: Parameter<number>;
    readonly minipoolStakeGasThreshold: Parameter<number>;

    constructor(directory: string) {
        this.network = choiceParam<Network>({
            id: NETWORK_PARAM_ID,
            name: 'Network',
            description: 'The Ethereum network to use: Prater to practice with test ETH, Mainnet to stake real ETH.',
            defaults: { all: 'mainnet' },
            affectsContainers: ['api', 'node', 'watchtower', 'eth1', 'eth2', 'validator'],
            envVars: ['NETWORK'],
            options: [
                { name: 'Ethereum Mainnet', description: 'The real Ethereum network.', value: 'mainnet' },
                { name: 'Prater Testnet', description: 'The Prater test network, using free test ETH.', value: 'prater' },
            ],
        });

        this.projectName = stringParam({
            id: 'projectName',
            name: 'Project Name',
            description: 'Prefix attached to every container the stack manages.',
            defaults: { all: DEFAULT_PROJECT_NAME },
            affectsContainers: ALL_SERVICES,
            envVars: ['COMPOSE_PROJECT_NAME'],
            regex: '^[a-z0-9][a-z0-9_-]*$',
        });

        this.dataPath = stringParam({
            id: 'dataPath',
            name: 'Data Path',
            description: 'Absolute path of the folder holding the node wallet, its password and validator keys.',
            defaults: { all: path.join(directory, 'data') },
            affectsContainers: ['api', 'node', 'watchtower', 'validator'],
            envVars: ['STACK_DATA_FOLDER'],
        });

        this.manualMaxFee = floatParam({
            id: 'manualMaxFee',
            name: 'Manual Max Fee',
            description: 'Max fee in gwei for every transaction, priority fee included. 0 uses the live suggestion.',
            defaults: { all: 0 },
            affectsContainers: ['node', 'watchtower'],
            range: { min: 0 },
        });

        this.priorityFee = floatParam({
            id: 'priorityFee',
            name: 'Priority Fee',
            description: 'Priority fee in gwei paid above the base fee. Must be larger than 0.',
            defaults: { all: 2 },
            affectsContainers: ['node', 'watchtower'],
            range: { min: 0 },
        });

        this.rplClaimGasThreshold = floatParam({
            id: 'rplClaimGasThreshold',
            name: 'RPL Claim Gas Threshold',
            description: 'Automatic reward claims wait until the suggested max fee (gwei) drops below this.',
            defaults: { all: 150 },
            affectsContainers: ['node', 'watchtower'],
            range: { min: 0 },
        });

        this.minipoolStakeGasThreshold = floatParam({
            id: 'minipoolStakeGasThreshold',
            name: 'Minipool Stake Gas Threshold',
            description: 'Automatic minipool stake transactions wait until the suggested max fee (gwei) drops below this.',
            defaults: { all: 150 },
            affectsContainers: ['node'],
            range: { min: 0 },
        });
    }

    title(): string {
        return 'Smartnode Settings';
    }

    parameters(): readonly Parameter[] {
        return [
            this.network,
            this.projectName,
            this.dataPath,
            this.manualMaxFee,
            this.priorityFee,
            this.rplClaimGasThreshold,
            this.minipoolStakeGasThreshold,
        ];
    }

    // ==================== DERIVED VALUES ====================

    chainId(): number {
        return CHAIN_IDS[this.network.value];
    }

    txWatchUrl(): string {
        return TX_WATCH_URLS[this.network.value];
    }

    containerImage(): string {
        return SMARTNODE_IMAGE;
    }

    walletPath(ctx: PathContext): string {
        return this.dataFile(ctx, 'wallet');
    }

    passwordPath(ctx: PathContext): string {
        return this.dataFile(ctx, 'password');
    }

    validatorKeychainPath(ctx: PathContext): string {
        return this.dataFile(ctx, 'validators');
    }

    customKeyPath(ctx: PathContext): string {
        return this.dataFile(ctx, 'custom-keys');
    }

    customKeyPasswordFilePath(ctx: PathContext): string {
        return this.dataFile(ctx, 'custom-key-passwords');
    }

    private dataFile(ctx: PathContext, name: string): string {
        if (ctx.isNativeMode) {
            return path.join(this.dataPath.value, name);
        }
        return path.posix.join(CONTAINER_DATA_DIR, name);
    }
}
