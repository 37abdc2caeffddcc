/**
 * Parameter
 * A single typed, network-aware setting. The stored value is checked against the
 * declared type whenever it is assigned, so readers never need to re-validate it.
 */

import {
    ContainerID,
    EnvironmentMap,
    Network,
    NETWORK_ALL,
    NetworkKey,
    NumericRange,
    ParameterOption,
    ParameterType,
    ParameterValue,
} from './types.js';
import { ConstraintViolationError, MissingDefaultError, TypeConversionError } from './errors.js';

const UINT16_MAX = 65535;

const INT_PATTERN = /^[+-]?\d+$/;
const UINT_PATTERN = /^\+?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Boolean spellings accepted in settings files
const TRUE_STRINGS = new Set(['1', 't', 'T', 'true', 'TRUE', 'True']);
const FALSE_STRINGS = new Set(['0', 'f', 'F', 'false', 'FALSE', 'False']);

export interface ParameterDefinition<V extends ParameterValue> {
    id: string;
    name: string;
    description: string;
    type: ParameterType;
    defaults: Partial<Record<NetworkKey, V>>;
    options?: readonly ParameterOption[];
    affectsContainers: readonly ContainerID[];
    envVars?: readonly string[];
    canBeBlank?: boolean;
    overwriteOnUpgrade?: boolean;
    regex?: string;
    maxLength?: number;
    range?: NumericRange;
}

export class Parameter<V extends ParameterValue = ParameterValue> {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly type: ParameterType;
    readonly defaults: Readonly<Partial<Record<NetworkKey, V>>>;
    readonly options: readonly ParameterOption[];
    readonly affectsContainers: readonly ContainerID[];
    readonly envVars: readonly string[];
    readonly canBeBlank: boolean;
    readonly overwriteOnUpgrade: boolean;
    readonly regex?: RegExp;
    readonly maxLength?: number;
    readonly range?: NumericRange;

    private current: V;

    constructor(definition: ParameterDefinition<V>) {
        this.id = definition.id;
        this.name = definition.name;
        this.description = definition.description;
        this.type = definition.type;
        this.defaults = { ...definition.defaults };
        this.options = definition.options ?? [];
        this.affectsContainers = definition.affectsContainers;
        this.envVars = definition.envVars ?? [];
        this.canBeBlank = definition.canBeBlank ?? false;
        this.overwriteOnUpgrade = definition.overwriteOnUpgrade ?? false;
        this.regex = definition.regex === undefined ? undefined : new RegExp(definition.regex);
        this.maxLength = definition.maxLength;
        this.range = definition.range;

        for (const value of Object.values(this.defaults)) {
            if (value !== undefined) this.check(value);
        }

        // Placeholder until the owner applies network defaults
        const initial = this.defaults[NETWORK_ALL] ?? Object.values(this.defaults).find(v => v !== undefined);
        if (initial === undefined) {
            throw new MissingDefaultError(this.id, NETWORK_ALL);
        }
        this.current = initial;
    }

    get value(): V {
        return this.current;
    }

    /**
     * Replace the value after checking it against the type and constraints
     */
    setValue(value: V): void {
        this.check(value);
        this.current = value;
    }

    /**
     * Parse and assign a user-supplied string (the editor / CLI path)
     */
    setFromString(raw: string): void {
        this.current = this.parse(raw);
    }

    /**
     * Default for a network: exact entry first, then the wildcard
     */
    resolveDefault(network: Network): V {
        const value = this.defaults[network] ?? this.defaults[NETWORK_ALL];
        if (value === undefined) {
            throw new MissingDefaultError(this.id, network);
        }
        return value;
    }

    applyDefault(network: Network): void {
        this.current = this.resolveDefault(network);
    }

    isDefault(network: Network): boolean {
        return this.current === this.resolveDefault(network);
    }

    /**
     * Value this parameter takes when the network switches. Values the user left at
     * the old network's default follow the network; explicit overrides stay.
     */
    valueAfterNetworkChange(oldNetwork: Network, newNetwork: Network): V {
        if (oldNetwork === newNetwork) return this.current;
        if (this.current !== this.resolveDefault(oldNetwork)) return this.current;
        return this.resolveDefault(newNetwork);
    }

    changeNetwork(oldNetwork: Network, newNetwork: Network): void {
        this.current = this.valueAfterNetworkChange(oldNetwork, newNetwork);
    }

    /**
     * Canonical, locale-independent string form
     */
    format(): string {
        return formatValue(this.current);
    }

    serializeInto(map: Record<string, string>): void {
        map[this.id] = this.format();
    }

    /**
     * Resolve the value stored for this parameter without assigning it.
     * A missing entry resolves to the network default.
     */
    readFrom(map: Readonly<Record<string, string>> | undefined, network: Network): V {
        const raw = map?.[this.id];
        if (raw === undefined) {
            return this.resolveDefault(network);
        }
        return this.parse(raw);
    }

    deserializeFrom(map: Readonly<Record<string, string>> | undefined, network: Network): void {
        this.current = this.readFrom(map, network);
    }

    addToEnvironment(env: EnvironmentMap): void {
        for (const name of this.envVars) {
            env[name] = this.format();
        }
    }

    /**
     * Parse a stored string into this parameter's type and check its constraints
     */
    parse(raw: string): V {
        const parsed = this.convert(raw);
        if (parsed === undefined || !this.accepts(parsed)) {
            throw new TypeConversionError(this.id, raw, this.describeType());
        }
        this.checkConstraints(parsed);
        return parsed;
    }

    private convert(raw: string): ParameterValue | undefined {
        switch (this.type) {
            case 'bool':
                return parseBoolean(raw);
            case 'int':
                return INT_PATTERN.test(raw) ? Number(raw) : undefined;
            case 'uint':
            case 'uint16':
                return UINT_PATTERN.test(raw) ? Number(raw) : undefined;
            case 'float':
                return FLOAT_PATTERN.test(raw) ? Number(raw) : undefined;
            case 'string':
            case 'choice':
                return raw;
        }
    }

    /**
     * Whether a value has the runtime shape of this parameter's type
     */
    private accepts(value: ParameterValue): value is V {
        switch (this.type) {
            case 'bool':
                return typeof value === 'boolean';
            case 'string':
                return typeof value === 'string';
            case 'choice':
                return this.options.some(option => option.value === value);
            case 'int':
                return typeof value === 'number' && Number.isSafeInteger(value);
            case 'uint':
                return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
            case 'uint16':
                return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= UINT16_MAX;
            case 'float':
                return typeof value === 'number' && Number.isFinite(value);
        }
    }

    private check(value: V): void {
        if (!this.accepts(value)) {
            throw new TypeConversionError(this.id, formatValue(value), this.describeType());
        }
        this.checkConstraints(value);
    }

    private checkConstraints(value: V): void {
        if (typeof value === 'string') {
            // Blank strings are governed by canBeBlank, reported by validation
            if (value === '') return;
            if (this.maxLength !== undefined && value.length > this.maxLength) {
                throw new ConstraintViolationError(this.id, `longer than ${this.maxLength} characters`);
            }
            if (this.regex && !this.regex.test(value)) {
                throw new ConstraintViolationError(this.id, `does not match ${this.regex.source}`);
            }
        } else if (typeof value === 'number' && this.range) {
            if (this.range.min !== undefined && value < this.range.min) {
                throw new ConstraintViolationError(this.id, `must be at least ${this.range.min}`);
            }
            if (this.range.max !== undefined && value > this.range.max) {
                throw new ConstraintViolationError(this.id, `must be at most ${this.range.max}`);
            }
        }
    }

    private describeType(): string {
        if (this.type !== 'choice') return this.type;
        return `choice (${this.options.map(option => option.value).join(', ')})`;
    }
}

export function parseBoolean(raw: string): boolean | undefined {
    if (TRUE_STRINGS.has(raw)) return true;
    if (FALSE_STRINGS.has(raw)) return false;
    return undefined;
}

export function formatValue(value: ParameterValue): string {
    if (typeof value === 'boolean') return value ? 'true' : 'false';
    return String(value);
}

// ==================== FACTORIES ====================
// Each factory fixes the type tag so it always agrees with the value type.

type Definition<V extends ParameterValue> = Omit<ParameterDefinition<V>, 'type' | 'options'>;

export function boolParam(definition: Definition<boolean>): Parameter<boolean> {
    return new Parameter<boolean>({ ...definition, type: 'bool' });
}

export function intParam(definition: Definition<number>): Parameter<number> {
    return new Parameter<number>({ ...definition, type: 'int' });
}

export function uintParam(definition: Definition<number>): Parameter<number> {
    return new Parameter<number>({ ...definition, type: 'uint' });
}

export function uint16Param(definition: Definition<number>): Parameter<number> {
    return new Parameter<number>({ ...definition, type: 'uint16' });
}

export function floatParam(definition: Definition<number>): Parameter<number> {
    return new Parameter<number>({ ...definition, type: 'float' });
}

export function stringParam(definition: Definition<string>): Parameter<string> {
    return new Parameter<string>({ ...definition, type: 'string' });
}

export function choiceParam<V extends string>(
    definition: Definition<V> & { options: readonly ParameterOption<V>[] }
): Parameter<V> {
    return new Parameter<V>({ ...definition, type: 'choice' });
}
