/**
 * Section
 * A named, ordered group of parameters for one service or feature.
 */

import { Parameter } from './Parameter.js';
import { ConsensusClient, ContainerID, Mode } from './types.js';

/**
 * Restart retargeting declared by a client section: while the section is the
 * selected client in `mode`, changes that declare `container` restart `override`.
 */
export interface ContainerRedirect {
    container: ContainerID;
    mode: Mode;
    override: ContainerID;
}

export interface Section {
    title(): string;
    /** Same order on every call and for every instance of the section */
    parameters(): readonly Parameter[];
    containerRedirects?(): readonly ContainerRedirect[];
}

/** A locally managed execution client */
export interface ExecutionClientSection extends Section {
    readonly compatibleConsensusClients: readonly ConsensusClient[];
    /** Common parameter ids this client ignores */
    readonly unsupportedCommonParams: readonly string[];
    readonly stopSignal: string;
}

export function findParameter(section: Section, id: string): Parameter | undefined {
    return section.parameters().find(param => param.id === id);
}

/**
 * Env-var prefix and title for the primary or fallback copy of a section
 */
export function variantLabels(baseTitle: string, isFallback: boolean): { prefix: string; title: string } {
    return {
        prefix: isFallback ? 'FALLBACK_' : '',
        title: isFallback ? `Fallback ${baseTitle}` : baseTitle,
    };
}
