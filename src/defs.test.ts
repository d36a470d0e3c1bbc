import { describe, expect, it } from 'vitest';

import { alignr, Exn, ExnDomain, ExnInput, indent, Printer } from './defs';


describe('Exn', () => {
    it('lists labelled arguments under the message', () => {
        const e = new ExnInput('bad value', 'given', 5, 'maxlen', 3);
        expect(e).toBeInstanceOf(Exn);
        expect(e).toBeInstanceOf(Error);
        expect(e.name).toBe('contfrac::InvalidInput');
        expect(e.message).toBe('\n    bad value\n         given : 5\n        maxlen : 3\n');
    });

    it('labels the offending value of a domain error', () => {
        expect(new ExnDomain('no value').message).toBe('\n    no value\n');
        expect(new ExnDomain('no value', [1n, 0n]).message)
            .toBe('\n    no value\n        given : [1, 0]\n');
    });

    it('wants label, value pairs', () => {
        expect(() => new ExnInput('bad value', 'given')).toThrow(/ExceptionException/);
    });
});

describe('Printer', () => {
    it('prints nested arrays of bigints', () => {
        expect(Printer.to_string([[4n, 1n], [9n, 2n]])).toBe('[[4, 1], [9, 2]]');
    });

    it('prints in its base', () => {
        expect(Printer.base(2).to_string(5)).toBe('101');
        expect(Printer.base(16).to_string(255n)).toBe('ff');
        expect(Printer.base(16).get_base()).toBe(16);
        expect(Printer.get_base()).toBe(10);
    });

    it('falls back to JSON', () => {
        expect(Printer.to_string({ a: 1 })).toBe('{\n  "a": 1\n}');
        expect(Printer.to_string(null)).toBe('null');
        expect(Printer.to_string(undefined)).toBe('undefined');
    });

    it('accumulates printed values', () => {
        expect(Printer.print('x = ').print(3).toString()).toBe('x = 3');
    });
});

describe('text layout', () => {
    it('indents and aligns every line', () => {
        expect(indent(2, 'a\nb')).toBe('  a\n  b');
        expect(alignr(4, 'a\nbcd')).toBe('   a\n bcd');
    });
});
