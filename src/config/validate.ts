/**
 * Validation
 * Cross-parameter checks. Problems are reported, never thrown.
 */

import type { RootConfig } from './RootConfig.js';
import { ROOT_KEY } from './root.js';

export function validateConfig(cfg: RootConfig): string[] {
    const errors: string[] = [];
    const { root } = cfg;

    // Client pairing only matters when the consensus client is ours to run
    if (root.consensusClientMode.value === 'local') {
        const selected = root.consensusClient.value;
        const { primary, fallback } = cfg.incompatibleConsensusClients();

        const badPrimary = primary.find(option => option.value === selected);
        if (badPrimary) {
            errors.push(
                `Selected Consensus client:\n\t${badPrimary.name}\nis not compatible with selected Execution client:\n\t${root.executionClient.value}`
            );
        }

        const badFallback = fallback.find(option => option.value === selected);
        if (badFallback) {
            errors.push(
                `Selected Consensus client:\n\t${badFallback.name}\nis not compatible with selected fallback Execution client:\n\t${root.fallbackExecutionClient.value}`
            );
        }
    }

    // Blank values are only a problem in sections that are in use
    for (const [key, section] of cfg.activeSections()) {
        for (const param of section.parameters()) {
            if (param.type !== 'string' || param.canBeBlank || param.value !== '') continue;
            errors.push(
                key === ROOT_KEY
                    ? `[${param.name}] cannot be blank.`
                    : `[${section.title()} - ${param.name}] cannot be blank.`
            );
        }
    }

    return errors;
}
