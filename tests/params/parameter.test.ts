import { describe, it, expect } from 'vitest';
import {
    boolParam,
    choiceParam,
    floatParam,
    intParam,
    stringParam,
    uint16Param,
    uintParam,
    formatValue,
} from '../../src/params/Parameter.js';
import {
    ConstraintViolationError,
    MissingDefaultError,
    TypeConversionError,
} from '../../src/params/errors.js';

function fee(defaults: { all?: number; mainnet?: number; prater?: number } = { all: 2 }) {
    return floatParam({
        id: 'fee',
        name: 'Fee',
        description: 'test fee',
        defaults,
        affectsContainers: ['node'],
        envVars: ['FEE', 'FEE_COPY'],
        range: { min: 0 },
    });
}

describe('Default Resolution', () => {
    it('prefers the exact network entry over the wildcard', () => {
        const param = fee({ all: 2, prater: 7 });
        expect(param.resolveDefault('prater')).toBe(7);
        expect(param.resolveDefault('mainnet')).toBe(2);
    });
    it('fails when neither the network nor the wildcard has a default', () => {
        const param = fee({ mainnet: 1 });
        expect(() => param.resolveDefault('prater')).toThrow(MissingDefaultError);
        expect(() => param.resolveDefault('prater')).toThrow('No default for [fee] on network [prater]');
    });
    it('cannot be declared without any default', () => {
        expect(() => fee({})).toThrow(MissingDefaultError);
    });
    it('applyDefault and isDefault follow the network', () => {
        const param = fee({ all: 2, prater: 7 });
        param.applyDefault('prater');
        expect(param.value).toBe(7);
        expect(param.isDefault('prater')).toBe(true);
        expect(param.isDefault('mainnet')).toBe(false);
    });
});

describe('Network Change', () => {
    it('moves a value left at the old default to the new default', () => {
        const param = fee({ mainnet: 1, prater: 5 });
        param.applyDefault('mainnet');
        param.changeNetwork('mainnet', 'prater');
        expect(param.value).toBe(5);
    });
    it('keeps a value the user overrode', () => {
        const param = fee({ mainnet: 1, prater: 5 });
        param.setValue(3);
        param.changeNetwork('mainnet', 'prater');
        expect(param.value).toBe(3);
    });
    it('is a no-op when the network does not change', () => {
        const param = fee({ mainnet: 1, prater: 5 });
        param.setValue(5);
        expect(param.valueAfterNetworkChange('mainnet', 'mainnet')).toBe(5);
    });
});

describe('Parsing', () => {
    it('parses booleans in their accepted spellings', () => {
        const param = boolParam({ id: 'flag', name: 'Flag', description: '', defaults: { all: false }, affectsContainers: [] });
        expect(param.parse('True')).toBe(true);
        expect(param.parse('0')).toBe(false);
        expect(() => param.parse('yes')).toThrow('Value "yes" for [flag] is not a valid bool');
    });
    it('parses signed and unsigned integers', () => {
        const signed = intParam({ id: 'offset', name: 'Offset', description: '', defaults: { all: 0 }, affectsContainers: [] });
        const unsigned = uintParam({ id: 'count', name: 'Count', description: '', defaults: { all: 0 }, affectsContainers: [] });
        expect(signed.parse('-5')).toBe(-5);
        expect(unsigned.parse('42')).toBe(42);
        expect(() => unsigned.parse('-5')).toThrow('Value "-5" for [count] is not a valid uint');
        expect(() => signed.parse('1.5')).toThrow(TypeConversionError);
    });
    it('rejects ports outside the 16-bit range', () => {
        const port = uint16Param({ id: 'port', name: 'Port', description: '', defaults: { all: 8545 }, affectsContainers: [] });
        expect(port.parse('65535')).toBe(65535);
        expect(() => port.parse('70000')).toThrow('Value "70000" for [port] is not a valid uint16');
    });
    it('parses floats including exponents', () => {
        const param = fee();
        expect(param.parse('1e3')).toBe(1000);
        expect(param.parse('.5')).toBe(0.5);
        expect(() => param.parse('abc')).toThrow(TypeConversionError);
    });
    it('only accepts declared choice values', () => {
        const mode = choiceParam<'local' | 'external'>({
            id: 'mode',
            name: 'Mode',
            description: '',
            defaults: { all: 'local' },
            affectsContainers: [],
            options: [
                { name: 'Local', description: '', value: 'local' },
                { name: 'External', description: '', value: 'external' },
            ],
        });
        expect(mode.parse('external')).toBe('external');
        expect(() => mode.parse('hybrid')).toThrow('Value "hybrid" for [mode] is not a valid choice (local, external)');
    });
});

describe('Constraints', () => {
    const name = stringParam({
        id: 'projectName',
        name: 'Project Name',
        description: '',
        defaults: { all: 'stack' },
        affectsContainers: [],
        regex: '^[a-z]+$',
        maxLength: 8,
    });

    it('enforces the regex', () => {
        expect(() => name.parse('Stack')).toThrow('Invalid value for [projectName]: does not match ^[a-z]+$');
    });
    it('enforces the maximum length', () => {
        expect(() => name.parse('abcdefghi')).toThrow(ConstraintViolationError);
        expect(() => name.parse('abcdefghi')).toThrow('longer than 8 characters');
    });
    it('leaves blank strings to validation', () => {
        expect(name.parse('')).toBe('');
    });
    it('enforces numeric ranges on direct edits', () => {
        const param = fee();
        expect(() => param.setValue(-1)).toThrow('Invalid value for [fee]: must be at least 0');
        expect(param.value).toBe(2);
    });
    it('rejects defaults that break the constraints', () => {
        expect(() => fee({ all: -1 })).toThrow(ConstraintViolationError);
    });
});

describe('Serialization', () => {
    it('formats values canonically', () => {
        expect(formatValue(true)).toBe('true');
        expect(formatValue(0.1)).toBe('0.1');
        expect(formatValue(1000)).toBe('1000');
    });
    it('writes its id into the map', () => {
        const param = fee();
        param.setValue(2.5);
        const map: Record<string, string> = {};
        param.serializeInto(map);
        expect(map).toEqual({ fee: '2.5' });
    });
    it('reads a missing entry as the network default', () => {
        const param = fee({ mainnet: 1, prater: 5 });
        param.deserializeFrom({ other: '9' }, 'prater');
        expect(param.value).toBe(5);
        param.deserializeFrom(undefined, 'mainnet');
        expect(param.value).toBe(1);
    });
    it('leaves the value alone when a stored string fails to parse', () => {
        const param = fee();
        expect(() => param.deserializeFrom({ fee: 'lots' }, 'mainnet')).toThrow(TypeConversionError);
        expect(param.value).toBe(2);
    });
    it('setFromString parses before assigning', () => {
        const param = fee();
        param.setFromString('4');
        expect(param.value).toBe(4);
    });
    it('writes every declared environment variable', () => {
        const env: Record<string, string> = {};
        fee().addToEnvironment(env);
        expect(env).toEqual({ FEE: '2', FEE_COPY: '2' });
    });
});
