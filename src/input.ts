import { ExnInput, ExnType } from "./defs";
import { Integral, Ratio } from "./ratio";


// Accepted shapes of a value to expand. A tuple is (numerator, denominator).
export type NumericInput = Integral | Ratio | readonly [Integral, Integral];

// Normalised form the algorithms run on. `approx' operands carry both the double and
// the exact rational it encodes.
export type Operand =
    | { readonly kind: 'exact', readonly ratio: Ratio }
    | { readonly kind: 'approx', readonly ratio: Ratio, readonly value: number };


function integral (n: unknown, what: string): bigint {
    if (typeof n === 'bigint') {
        return n;
    }
    if (typeof n === 'number' && Number.isInteger(n)) {
        return BigInt(n);
    }
    throw new ExnInput(`${what} must be an integer`, 'given', n);
}

export function to_operand (x: NumericInput): Operand {
    if (typeof x === 'bigint') {
        return { kind: 'exact', ratio: Ratio.from_integer(x) };
    }
    if (typeof x === 'number') {
        if (!Number.isFinite(x)) {
            throw new ExnInput('cannot expand a non-finite number', 'given', x);
        }
        if (Number.isInteger(x)) {
            return { kind: 'exact', ratio: Ratio.from_integer(x) };
        }
        return { kind: 'approx', ratio: Ratio.from_double(x), value: x };
    }
    if (x instanceof Ratio) {
        return { kind: 'exact', ratio: x };
    }
    if (Array.isArray(x) && x.length === 2) {
        const num = integral(x[0], 'tuple numerator');
        const den = integral(x[1], 'tuple denominator');
        return { kind: 'exact', ratio: Ratio.of(num, den) };
    }
    throw new ExnType('unsupported input type: expected number, bigint, Ratio or'
        + ' [numerator, denominator]', 'given', describe(x));
}

const describe = (x: unknown): string =>
    (Array.isArray(x) ? `array of length ${x.length}` : (x === null ? 'null' : typeof x));

// Shared by the generators for their length caps.
export function check_count (n: number | undefined, what: string): void {
    if (n !== undefined && !(Number.isInteger(n) && n > 0)) {
        throw new ExnInput(`${what} must be a positive integer`, 'given', n);
    }
}
