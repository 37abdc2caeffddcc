export { SmartnodeSection, NETWORK_PARAM_ID } from './smartnode.js';
export type { PathContext } from './smartnode.js';
export { detectSystemProfile, memoryTierMB } from './system.js';
export type { Architecture, SystemProfile } from './system.js';
export * from './images.js';
export { ExecutionCommonSection, EC_HTTP_PORT_ID, EC_WS_PORT_ID } from './execution/common.js';
export { GethSection } from './execution/geth.js';
export { NethermindSection } from './execution/nethermind.js';
export { BesuSection } from './execution/besu.js';
export { InfuraSection } from './execution/infura.js';
export { PocketSection } from './execution/pocket.js';
export { ExternalExecutionSection } from './execution/external.js';
export { ConsensusCommonSection, GRAFFITI_ID, DOPPELGANGER_DETECTION_ID, MAX_GRAFFITI_LENGTH } from './consensus/common.js';
export { LighthouseSection } from './consensus/lighthouse.js';
export { NimbusSection } from './consensus/nimbus.js';
export { PrysmSection } from './consensus/prysm.js';
export { TekuSection } from './consensus/teku.js';
export { ExternalLighthouseSection, ExternalPrysmSection, ExternalTekuSection } from './consensus/external.js';
export { GrafanaSection, PrometheusSection, ExporterSection, BitflyNodeMetricsSection } from './metrics.js';
export { NativeSection } from './native.js';
export { GraffitiWallWriterSection } from './addons/graffitiWallWriter.js';
