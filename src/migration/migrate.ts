/**
 * Migration Engine
 * Brings a persisted document up to the current schema before it is loaded.
 */

import { UnsupportedVersionError } from '../params/errors.js';
import { SettingsDocument } from '../params/types.js';
import { MIGRATIONS } from './steps.js';

export const CURRENT_SCHEMA_VERSION = MIGRATIONS.reduce((latest, step) => Math.max(latest, step.version), 0);

const VERSION_PATTERN = /^v(\d+)$/;

export function formatVersion(version: number): string {
    return `v${version}`;
}

/**
 * Schema version of a stamp. An absent stamp is the oldest version (0).
 */
export function parseVersion(stamp: string | undefined): number {
    if (stamp === undefined || stamp === '') return 0;
    const match = VERSION_PATTERN.exec(stamp);
    if (!match) {
        throw new UnsupportedVersionError(stamp, CURRENT_SCHEMA_VERSION);
    }
    return Number(match[1]);
}

export function documentVersion(doc: SettingsDocument): number {
    return parseVersion(doc.root?.version);
}

/**
 * Apply every step newer than the document's version, in order, stamping the
 * version after each one. Mutates and returns `doc`. A document already at the
 * current version is left untouched.
 */
export function migrate(doc: SettingsDocument): SettingsDocument {
    const from = documentVersion(doc);
    if (from > CURRENT_SCHEMA_VERSION) {
        throw new UnsupportedVersionError(formatVersion(from), CURRENT_SCHEMA_VERSION);
    }

    const pending = [...MIGRATIONS]
        .filter(step => step.version > from)
        .sort((a, b) => a.version - b.version);

    for (const step of pending) {
        step.apply(doc);
        const root = doc.root ?? {};
        root.version = formatVersion(step.version);
        doc.root = root;
    }

    return doc;
}

/** Descriptions of the steps a document still needs */
export function pendingMigrations(doc: SettingsDocument): string[] {
    const from = documentVersion(doc);
    return MIGRATIONS.filter(step => step.version > from).map(step => `${formatVersion(step.version)}: ${step.description}`);
}
