/**
 * Container Images
 * Tags the stack ships with. Parameters holding these are overwritten on upgrade.
 */

export const STACK_VERSION = '1.4.0';

export const SMARTNODE_IMAGE = `stacknode/smartnode:v${STACK_VERSION}`;
export const EC_PROXY_IMAGE = `stacknode/ec-proxy:v${STACK_VERSION}`;

export const GETH_IMAGE = 'ethereum/client-go:v1.10.17';
export const NETHERMIND_IMAGE = 'nethermind/nethermind:1.13.4';
export const BESU_IMAGE = 'hyperledger/besu:22.4.3-openjdk-latest';

export const LIGHTHOUSE_IMAGE = 'sigp/lighthouse:v2.3.1';
export const NIMBUS_IMAGE = 'statusim/nimbus-eth2:multiarch-v22.5.2';
export const PRYSM_BN_IMAGE = 'prysmaticlabs/prysm-beacon-chain:v2.1.2';
export const PRYSM_VC_IMAGE = 'prysmaticlabs/prysm-validator:v2.1.2';
export const TEKU_IMAGE = 'consensys/teku:22.5.2';

export const GRAFANA_IMAGE = 'grafana/grafana:8.5.2';
export const PROMETHEUS_IMAGE = 'prom/prometheus:v2.35.0';
export const EXPORTER_IMAGE = 'prom/node-exporter:v1.3.1';
export const GWW_IMAGE = 'stacknode/graffiti-wall-addon:v1.0.1';
