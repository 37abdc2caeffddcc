/**
 * Root Config
 * Owns the root parameters and every section of the stack. Values move in and
 * out of it through the persisted document, and every operation that can fail
 * resolves all new values before assigning any of them.
 */

import { formatValue, Parameter, parseBoolean } from '../params/Parameter.js';
import { ContainerRedirect, ExecutionClientSection, findParameter, Section } from '../params/Section.js';
import { TypeConversionError, UnknownSettingError } from '../params/errors.js';
import {
    ConsensusClient,
    DEFAULT_NETWORK,
    EnvironmentMap,
    ExecutionClient,
    FallbackExecutionClient,
    Mode,
    Network,
    ParameterOption,
    ParameterValue,
    SettingsDocument,
} from '../params/types.js';
import { formatVersion, CURRENT_SCHEMA_VERSION, migrate } from '../migration/index.js';
import { SmartnodeSection, NETWORK_PARAM_ID, PathContext } from '../sections/smartnode.js';
import { detectSystemProfile, SystemProfile } from '../sections/system.js';
import { ExecutionCommonSection } from '../sections/execution/common.js';
import { GethSection } from '../sections/execution/geth.js';
import { NethermindSection } from '../sections/execution/nethermind.js';
import { BesuSection } from '../sections/execution/besu.js';
import { InfuraSection } from '../sections/execution/infura.js';
import { PocketSection } from '../sections/execution/pocket.js';
import { ExternalExecutionSection } from '../sections/execution/external.js';
import { ConsensusCommonSection } from '../sections/consensus/common.js';
import { LighthouseSection } from '../sections/consensus/lighthouse.js';
import { NimbusSection } from '../sections/consensus/nimbus.js';
import { PrysmSection } from '../sections/consensus/prysm.js';
import { TekuSection } from '../sections/consensus/teku.js';
import { ExternalLighthouseSection, ExternalPrysmSection, ExternalTekuSection } from '../sections/consensus/external.js';
import { BitflyNodeMetricsSection, ExporterSection, GrafanaSection, PrometheusSection } from '../sections/metrics.js';
import { NativeSection } from '../sections/native.js';
import { GraffitiWallWriterSection } from '../sections/addons/graffitiWallWriter.js';
import { CONSENSUS_CLIENT_OPTIONS, META_BASE_DIR, META_IS_NATIVE, META_VERSION, ROOT_KEY, RootParameters } from './root.js';
import { ChangeSet, computeChanges } from './changes.js';
import { generateEnvironment } from './environment.js';
import { validateConfig } from './validate.js';

/** Persisted key -> section. Keys are part of the document format. */
export interface SectionRegistry {
    smartnode: SmartnodeSection;
    executionCommon: ExecutionCommonSection;
    geth: GethSection;
    nethermind: NethermindSection;
    besu: BesuSection;
    infura: InfuraSection;
    pocket: PocketSection;
    externalExecution: ExternalExecutionSection;
    fallbackExecutionCommon: ExecutionCommonSection;
    fallbackInfura: InfuraSection;
    fallbackPocket: PocketSection;
    fallbackExternalExecution: ExternalExecutionSection;
    consensusCommon: ConsensusCommonSection;
    lighthouse: LighthouseSection;
    nimbus: NimbusSection;
    prysm: PrysmSection;
    teku: TekuSection;
    externalLighthouse: ExternalLighthouseSection;
    externalPrysm: ExternalPrysmSection;
    externalTeku: ExternalTekuSection;
    grafana: GrafanaSection;
    prometheus: PrometheusSection;
    exporter: ExporterSection;
    bitflyNodeMetrics: BitflyNodeMetricsSection;
    native: NativeSection;
    'addons-gww': GraffitiWallWriterSection;
}

export type SectionKey = keyof SectionRegistry;

/** Section keys in display and serialization order */
export const SECTION_KEYS: readonly SectionKey[] = [
    'smartnode',
    'executionCommon',
    'geth',
    'nethermind',
    'besu',
    'infura',
    'pocket',
    'externalExecution',
    'fallbackExecutionCommon',
    'fallbackInfura',
    'fallbackPocket',
    'fallbackExternalExecution',
    'consensusCommon',
    'lighthouse',
    'nimbus',
    'prysm',
    'teku',
    'externalLighthouse',
    'externalPrysm',
    'externalTeku',
    'grafana',
    'prometheus',
    'exporter',
    'bitflyNodeMetrics',
    'native',
    'addons-gww',
];

export function isSectionKey(key: string): key is SectionKey {
    return SECTION_KEYS.some(candidate => candidate === key);
}

export interface RootConfigOptions {
    system?: SystemProfile;
}

/** A parameter together with the document key it is stored under */
export interface ScopedParameter {
    sectionKey: string;
    section: Section;
    param: Parameter;
}

interface StagedValue {
    param: Parameter;
    value: ParameterValue;
}

/** A client section that is in use, with the mode it is used in */
export interface SelectedClient {
    section: Section;
    mode: Mode;
}

export interface IncompatibleClients {
    primary: ParameterOption<ConsensusClient>[];
    fallback: ParameterOption<ConsensusClient>[];
}

function commit(staged: readonly StagedValue[]): void {
    for (const { param, value } of staged) {
        param.setValue(value);
    }
}

export class RootConfig {
    baseDir: string;
    isNativeMode: boolean;
    version: string;

    readonly system: SystemProfile;
    readonly root: RootParameters;
    readonly catalog: SectionRegistry;

    constructor(directory: string, isNativeMode: boolean = false, options: RootConfigOptions = {}) {
        this.baseDir = directory;
        this.isNativeMode = isNativeMode;
        this.version = formatVersion(CURRENT_SCHEMA_VERSION);
        this.system = options.system ?? detectSystemProfile();

        this.root = new RootParameters();
        this.catalog = {
            smartnode: new SmartnodeSection(directory),
            executionCommon: new ExecutionCommonSection(false),
            geth: new GethSection(this.system),
            nethermind: new NethermindSection(this.system),
            besu: new BesuSection(this.system),
            infura: new InfuraSection(false),
            pocket: new PocketSection(false),
            externalExecution: new ExternalExecutionSection(false),
            fallbackExecutionCommon: new ExecutionCommonSection(true),
            fallbackInfura: new InfuraSection(true),
            fallbackPocket: new PocketSection(true),
            fallbackExternalExecution: new ExternalExecutionSection(true),
            consensusCommon: new ConsensusCommonSection(),
            lighthouse: new LighthouseSection(),
            nimbus: new NimbusSection(),
            prysm: new PrysmSection(),
            teku: new TekuSection(),
            externalLighthouse: new ExternalLighthouseSection(),
            externalPrysm: new ExternalPrysmSection(),
            externalTeku: new ExternalTekuSection(),
            grafana: new GrafanaSection(),
            prometheus: new PrometheusSection(),
            exporter: new ExporterSection(),
            bitflyNodeMetrics: new BitflyNodeMetricsSection(),
            native: new NativeSection(),
            'addons-gww': new GraffitiWallWriterSection(),
        };

        this.applyAllDefaults();
    }

    get network(): Network {
        return this.catalog.smartnode.network.value;
    }

    get smartnode(): SmartnodeSection {
        return this.catalog.smartnode;
    }

    /** Every section with its document key, in serialization order */
    sections(): Array<[SectionKey, Section]> {
        return SECTION_KEYS.map(key => [key, this.catalog[key]]);
    }

    section(key: string): Section | undefined {
        if (key === ROOT_KEY) return this.root;
        return isSectionKey(key) ? this.catalog[key] : undefined;
    }

    /** Root parameters first, then every section's in order */
    allParameters(): ScopedParameter[] {
        const scoped: ScopedParameter[] = this.root.parameters().map(param => ({
            sectionKey: ROOT_KEY,
            section: this.root,
            param,
        }));
        for (const [sectionKey, section] of this.sections()) {
            for (const param of section.parameters()) {
                scoped.push({ sectionKey, section, param });
            }
        }
        return scoped;
    }

    getParameter(sectionKey: string, id: string): Parameter {
        const section = this.section(sectionKey);
        if (!section) {
            throw new UnknownSettingError(sectionKey);
        }
        const param = findParameter(section, id);
        if (!param) {
            throw new UnknownSettingError(sectionKey, id);
        }
        return param;
    }

    /**
     * Edit one setting from its string form. The network goes through
     * changeNetwork so the other network-scoped defaults follow it.
     */
    setSetting(sectionKey: string, id: string, raw: string): void {
        const param = this.getParameter(sectionKey, id);
        const networkParam = this.catalog.smartnode.network;
        if (param === networkParam) {
            this.changeNetwork(networkParam.parse(raw));
            return;
        }
        param.setFromString(raw);
    }

    // ==================== NETWORK & DEFAULTS ====================

    changeNetwork(newNetwork: Network): void {
        const oldNetwork = this.network;
        if (oldNetwork === newNetwork) return;

        const networkParam = this.catalog.smartnode.network;
        const staged: StagedValue[] = [];
        for (const { param } of this.allParameters()) {
            if (param === networkParam) continue;
            staged.push({ param, value: param.valueAfterNetworkChange(oldNetwork, newNetwork) });
        }

        networkParam.setValue(newNetwork);
        commit(staged);
    }

    /**
     * Reset every parameter to its default on the current network. Used at
     * construction.
     */
    applyAllDefaults(): void {
        const network = this.network;
        const staged = this.allParameters().map(({ param }) => ({ param, value: param.resolveDefault(network) }));
        commit(staged);
    }

    /**
     * Reset only the parameters that track the running software version, such
     * as container tags. Every other value is left as the user set it.
     */
    updateDefaultsOnUpgrade(): void {
        const network = this.network;
        const staged = this.allParameters()
            .filter(({ param }) => param.overwriteOnUpgrade)
            .map(({ param }) => ({ param, value: param.resolveDefault(network) }));
        commit(staged);
    }

    // ==================== PERSISTENCE ====================

    serialize(): SettingsDocument {
        const rootMap: Record<string, string> = {};
        for (const param of this.root.parameters()) {
            param.serializeInto(rootMap);
        }
        rootMap[META_BASE_DIR] = this.baseDir;
        rootMap[META_IS_NATIVE] = formatValue(this.isNativeMode);
        rootMap[META_VERSION] = this.version;

        const doc: SettingsDocument = { [ROOT_KEY]: rootMap };
        for (const [key, section] of this.sections()) {
            const map: Record<string, string> = {};
            for (const param of section.parameters()) {
                param.serializeInto(map);
            }
            doc[key] = map;
        }
        return doc;
    }

    /**
     * Load a persisted document. The document is migrated in place first.
     * Parameters it does not mention take their default for the stored network.
     */
    deserialize(doc: SettingsDocument): void {
        migrate(doc);

        const rootMap = doc[ROOT_KEY];
        const storedNetwork = doc.smartnode?.[NETWORK_PARAM_ID];
        const network = storedNetwork === undefined
            ? DEFAULT_NETWORK
            : this.catalog.smartnode.network.parse(storedNetwork);

        const staged: StagedValue[] = this.allParameters().map(({ sectionKey, param }) => ({
            param,
            value: param.readFrom(doc[sectionKey], network),
        }));

        let isNativeMode = this.isNativeMode;
        const storedNative = rootMap?.[META_IS_NATIVE];
        if (storedNative !== undefined) {
            const parsed = parseBoolean(storedNative);
            if (parsed === undefined) {
                throw new TypeConversionError(META_IS_NATIVE, storedNative, 'bool');
            }
            isNativeMode = parsed;
        }

        commit(staged);
        this.baseDir = rootMap?.[META_BASE_DIR] ?? this.baseDir;
        this.isNativeMode = isNativeMode;
        this.version = rootMap?.[META_VERSION] ?? formatVersion(CURRENT_SCHEMA_VERSION);
    }

    /** Independent copy, e.g. a snapshot to diff edits against */
    clone(): RootConfig {
        const copy = new RootConfig(this.baseDir, this.isNativeMode, { system: this.system });
        copy.deserialize(this.serialize());
        return copy;
    }

    // ==================== CLIENT SELECTION ====================

    executionClientSection(client: ExecutionClient): ExecutionClientSection {
        switch (client) {
            case 'geth': return this.catalog.geth;
            case 'nethermind': return this.catalog.nethermind;
            case 'besu': return this.catalog.besu;
            case 'infura': return this.catalog.infura;
            case 'pocket': return this.catalog.pocket;
        }
    }

    fallbackExecutionClientSection(client: FallbackExecutionClient): ExecutionClientSection {
        return client === 'infura' ? this.catalog.fallbackInfura : this.catalog.fallbackPocket;
    }

    localConsensusSection(client: ConsensusClient): Section {
        switch (client) {
            case 'lighthouse': return this.catalog.lighthouse;
            case 'nimbus': return this.catalog.nimbus;
            case 'prysm': return this.catalog.prysm;
            case 'teku': return this.catalog.teku;
        }
    }

    selectedExecutionSection(): Section {
        if (this.root.executionClientMode.value === 'external') {
            return this.catalog.externalExecution;
        }
        return this.executionClientSection(this.root.executionClient.value);
    }

    /** The fallback client section in use, or undefined when the fallback is off */
    selectedFallbackSection(): Section | undefined {
        if (!this.root.useFallbackExecutionClient.value) return undefined;
        if (this.root.fallbackExecutionClientMode.value === 'external') {
            return this.catalog.fallbackExternalExecution;
        }
        return this.fallbackExecutionClientSection(this.root.fallbackExecutionClient.value);
    }

    selectedConsensusSection(): Section {
        if (this.root.consensusClientMode.value === 'local') {
            return this.localConsensusSection(this.root.consensusClient.value);
        }
        switch (this.root.externalConsensusClient.value) {
            case 'lighthouse': return this.catalog.externalLighthouse;
            case 'prysm': return this.catalog.externalPrysm;
            case 'teku': return this.catalog.externalTeku;
        }
    }

    selectedClients(): SelectedClient[] {
        return [
            { section: this.selectedExecutionSection(), mode: this.root.executionClientMode.value },
            { section: this.selectedConsensusSection(), mode: this.root.consensusClientMode.value },
        ];
    }

    /** Container redirects declared by the selected clients for the mode they run in */
    activeRedirects(): ContainerRedirect[] {
        return this.selectedClients().flatMap(({ section, mode }) =>
            (section.containerRedirects?.() ?? []).filter(redirect => redirect.mode === mode)
        );
    }

    /**
     * Sections whose values take effect under the current selections
     */
    activeSections(): Array<[string, Section]> {
        const active: Array<[string, Section]> = [[ROOT_KEY, this.root], ['smartnode', this.catalog.smartnode]];
        const add = (section: Section): void => {
            const entry = this.sections().find(([, candidate]) => candidate === section);
            if (entry) active.push(entry);
        };

        if (this.isNativeMode) {
            add(this.catalog.native);
            return active;
        }

        if (this.root.executionClientMode.value === 'local') {
            add(this.catalog.executionCommon);
        }
        add(this.selectedExecutionSection());

        const fallback = this.selectedFallbackSection();
        if (fallback) {
            if (this.root.fallbackExecutionClientMode.value === 'local') {
                add(this.catalog.fallbackExecutionCommon);
            }
            add(fallback);
        }

        if (this.root.consensusClientMode.value === 'local') {
            add(this.catalog.consensusCommon);
        }
        add(this.selectedConsensusSection());

        if (this.root.enableMetrics.value) {
            add(this.catalog.grafana);
            add(this.catalog.prometheus);
            add(this.catalog.exporter);
        }
        if (this.root.enableBitflyNodeMetrics.value) {
            add(this.catalog.bitflyNodeMetrics);
        }
        if (this.catalog['addons-gww'].enabled.value) {
            add(this.catalog['addons-gww']);
        }
        return active;
    }

    /**
     * Consensus clients that cannot pair with the selected execution client and,
     * when a local fallback is enabled, with the fallback client
     */
    incompatibleConsensusClients(): IncompatibleClients {
        const incompatibleWith = (section: ExecutionClientSection): ParameterOption<ConsensusClient>[] =>
            CONSENSUS_CLIENT_OPTIONS.filter(option => !section.compatibleConsensusClients.includes(option.value));

        const primary = this.root.executionClientMode.value === 'local'
            ? incompatibleWith(this.executionClientSection(this.root.executionClient.value))
            : [];

        const fallback = this.root.useFallbackExecutionClient.value && this.root.fallbackExecutionClientMode.value === 'local'
            ? incompatibleWith(this.fallbackExecutionClientSection(this.root.fallbackExecutionClient.value))
            : [];

        return { primary, fallback };
    }

    isDoppelgangerEnabled(): boolean {
        if (this.root.consensusClientMode.value === 'local') {
            return this.catalog.consensusCommon.doppelgangerDetection.value;
        }
        const section = this.selectedConsensusSection();
        const param = findParameter(section, 'doppelgangerDetection');
        return param?.value === true;
    }

    // ==================== DERIVED VALUES ====================

    pathContext(): PathContext {
        return { isNativeMode: this.isNativeMode };
    }

    walletPath(): string {
        return this.catalog.smartnode.walletPath(this.pathContext());
    }

    passwordPath(): string {
        return this.catalog.smartnode.passwordPath(this.pathContext());
    }

    validatorKeychainPath(): string {
        return this.catalog.smartnode.validatorKeychainPath(this.pathContext());
    }

    customKeyPath(): string {
        return this.catalog.smartnode.customKeyPath(this.pathContext());
    }

    customKeyPasswordFilePath(): string {
        return this.catalog.smartnode.customKeyPasswordFilePath(this.pathContext());
    }

    chainId(): number {
        return this.catalog.smartnode.chainId();
    }

    txWatchUrl(): string {
        return this.catalog.smartnode.txWatchUrl();
    }

    // ==================== DIFF, VALIDATION, ENVIRONMENT ====================

    computeChanges(oldConfig: RootConfig): ChangeSet {
        return computeChanges(oldConfig, this);
    }

    validate(): string[] {
        return validateConfig(this);
    }

    generateEnvironment(): EnvironmentMap {
        return generateEnvironment(this);
    }
}
