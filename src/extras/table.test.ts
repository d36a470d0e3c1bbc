import { describe, expect, it } from 'vitest';

import { Printer } from '../defs';
import { convergent_table } from './table';


describe('convergent_table', () => {
    it('lines up grade, coefficient, convergent and error', () => {
        expect(convergent_table([415, 93]).split('\n')).toEqual([
            'k  a     h/k      error',
            '0  4     4/1   4.624e-1',
            '1  2     9/2  -3.763e-2',
            '2  6   58/13   8.271e-4',
            '3  7  415/93   0.000e+0',
        ]);
    });

    it('stops at maxlen', () => {
        expect(convergent_table([415, 93], 2).split('\n')).toEqual([
            'k  a  h/k      error',
            '0  4  4/1   4.624e-1',
            '1  2  9/2  -3.763e-2',
        ]);
    });

    it('prints integers in the printer base', () => {
        expect(convergent_table(255, undefined, Printer.base(16)).split('\n')).toEqual([
            'k   a   h/k     error',
            '0  ff  ff/1  0.000e+0',
        ]);
    });
});
