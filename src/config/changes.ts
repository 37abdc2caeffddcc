/**
 * Change Sets
 * Compares two configurations parameter by parameter (matched by id within
 * each section) and works out which containers must restart.
 */

import { Parameter } from '../params/Parameter.js';
import { ContainerRedirect } from '../params/Section.js';
import { ContainerID } from '../params/types.js';
import type { RootConfig } from './RootConfig.js';

export interface ChangedSetting {
    /** Title of the section the parameter belongs to */
    section: string;
    id: string;
    name: string;
    oldValue: string;
    newValue: string;
    affectedContainers: Set<ContainerID>;
}

export interface ChangeSet {
    settings: ChangedSetting[];
    /** Union of every changed setting's containers */
    affectedContainers: Set<ContainerID>;
    networkChanged: boolean;
}

/**
 * Containers a parameter change restarts once the active redirects are applied
 */
export function affectedContainersOf(param: Parameter, redirects: readonly ContainerRedirect[]): Set<ContainerID> {
    const affected = new Set<ContainerID>();
    for (const container of param.affectsContainers) {
        const redirect = redirects.find(entry => entry.container === container);
        affected.add(redirect ? redirect.override : container);
    }
    return affected;
}

export function computeChanges(oldConfig: RootConfig, newConfig: RootConfig): ChangeSet {
    const redirects = newConfig.activeRedirects();
    const settings: ChangedSetting[] = [];

    const pairs: Array<[string, readonly Parameter[], readonly Parameter[]]> = [
        [newConfig.root.title(), oldConfig.root.parameters(), newConfig.root.parameters()],
        ...newConfig.sections().map(([key, section]): [string, readonly Parameter[], readonly Parameter[]] => [
            section.title(),
            oldConfig.catalog[key].parameters(),
            section.parameters(),
        ]),
    ];

    for (const [title, oldParams, newParams] of pairs) {
        const oldById = new Map(oldParams.map(param => [param.id, param]));
        for (const param of newParams) {
            const previous = oldById.get(param.id);
            if (!previous) continue;

            const oldValue = previous.format();
            const newValue = param.format();
            if (oldValue === newValue) continue;

            settings.push({
                section: title,
                id: param.id,
                name: param.name,
                oldValue,
                newValue,
                affectedContainers: affectedContainersOf(param, redirects),
            });
        }
    }

    const affectedContainers = new Set<ContainerID>();
    for (const setting of settings) {
        for (const container of setting.affectedContainers) {
            affectedContainers.add(container);
        }
    }

    return {
        settings,
        affectedContainers,
        networkChanged: oldConfig.network !== newConfig.network,
    };
}

/** Changed settings grouped by section title, in the order they were found */
export function groupBySection(settings: readonly ChangedSetting[]): Map<string, ChangedSetting[]> {
    const grouped = new Map<string, ChangedSetting[]>();
    for (const setting of settings) {
        const group = grouped.get(setting.section) ?? [];
        group.push(setting);
        grouped.set(setting.section, group);
    }
    return grouped;
}
