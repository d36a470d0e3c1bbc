import { continued_fraction } from "./continued-fraction";
import { ExnInput, ExnRange } from "./defs";
import { NumericInput } from "./input";


export type Convergent = readonly [numerator: bigint, denominator: bigint];


//  h[i] = a[i] * h[i-1] + h[i-2]      h[-1] = 1, h[-2] = 0
//  k[i] = a[i] * k[i-1] + k[i-2]      k[-1] = 0, k[-2] = 1
export function* convergents_of (coefficients: Iterable<bigint>): Generator<Convergent, void, undefined> {
    let h1 = 1n, h2 = 0n;
    let k1 = 0n, k2 = 1n;
    for (const a of coefficients) {
        const h = a * h1 + h2;
        const k = a * k1 + k2;
        h2 = h1;
        h1 = h;
        k2 = k1;
        k1 = k;
        yield [h, k];
    }
}

// Rational approximations of `x' of grade 0, 1, ... The last one of an exact input is
// the input itself. `maxlen' caps the number of convergents.
export function convergents (x: NumericInput, maxlen?: number): Generator<Convergent, void, undefined> {
    return convergents_of(continued_fraction(x, maxlen));
}

export function convergent (x: NumericInput, grade: number): Convergent {
    if (!Number.isInteger(grade) || grade < 0) {
        throw new ExnInput('grade must be a non-negative integer', 'given', grade);
    }
    let last: Convergent | undefined;
    let count = 0;
    for (const c of convergents(x, grade + 1)) {
        last = c;
        ++count;
    }
    if (last === undefined || count <= grade) {
        throw new ExnRange(`no convergent of grade ${grade}: the continued fraction`
            + ` has ${count} term${count === 1 ? '' : 's'}`, 'grade', grade);
    }
    return last;
}
