export { Parameter, boolParam, intParam, uintParam, uint16Param, floatParam, stringParam, choiceParam, formatValue, parseBoolean } from './params/Parameter.js';
export type { ParameterDefinition } from './params/Parameter.js';
export { findParameter, variantLabels } from './params/Section.js';
export type { Section, ExecutionClientSection, ContainerRedirect } from './params/Section.js';
export * from './params/types.js';
export * from './params/errors.js';
export * from './sections/index.js';
export { RootConfig, SECTION_KEYS, isSectionKey } from './config/RootConfig.js';
export type { SectionRegistry, SectionKey, RootConfigOptions, ScopedParameter, SelectedClient, IncompatibleClients } from './config/RootConfig.js';
export { RootParameters, ROOT_KEY, ROOT_TITLE, META_BASE_DIR, META_IS_NATIVE, META_VERSION } from './config/root.js';
export { computeChanges, affectedContainersOf, groupBySection } from './config/changes.js';
export type { ChangedSetting, ChangeSet } from './config/changes.js';
export { generateEnvironment, toShellAssignments } from './config/environment.js';
export { validateConfig } from './config/validate.js';
export * from './migration/index.js';
export { ConfigStore, toSettingsDocument } from './storage/ConfigStore.js';
