import { ExnDomain, ExnInput, Printable, PrinterO } from "./defs";


// Ratio - exact rational number over bigints.
//   Always kept reduced, with a strictly positive denominator, so that two equal values
//   have equal fields.


export type Integral = number | bigint;


export function gcd (a: bigint, b: bigint): bigint {
    a = a < 0n ? -a : a;
    b = b < 0n ? -b : b;
    while (b !== 0n) {
        const t = a % b;
        a = b;
        b = t;
    }
    return a;
}

// bigint division truncates toward zero; this rounds toward -Infinity
export function floor_div (n: bigint, d: bigint): bigint {
    const q = n / d;
    if (n % d !== 0n && ((n < 0n) !== (d < 0n))) {
        return q - 1n;
    }
    return q;
}

const bit_length = (n: bigint): number => (n === 0n ? 0 : n.toString(2).length);

// m * 2**e, without overflowing the intermediate power of two
const ldexp = (m: number, e: number): number => {
    const e1 = Math.trunc(e / 2);
    return m * 2 ** e1 * 2 ** (e - e1);
};


export class Ratio implements Printable {
    private readonly num: bigint;
    private readonly den: bigint;

    static readonly ZERO = new Ratio(0n, 1n);
    static readonly ONE = new Ratio(1n, 1n);

    // Expects a reduced fraction with den > 0. Use one of the static constructors.
    private constructor(num: bigint, den: bigint) {
        this.num = num;
        this.den = den;
    }

    get numerator (): bigint {
        return this.num;
    }

    get denominator (): bigint {
        return this.den;
    }

    is_zero (): boolean {
        return this.num === 0n;
    }

    is_negative (): boolean {
        return this.num < 0n;
    }

    is_integer (): boolean {
        return this.den === 1n;
    }


    // ----- Arithmetic -----

    neg (): Ratio {
        return new Ratio(-this.num, this.den);
    }

    abs (): Ratio {
        return this.is_negative() ? this.neg() : this;
    }

    add (rhs: Ratio): Ratio {
        return Ratio.of(this.num * rhs.den + rhs.num * this.den, this.den * rhs.den);
    }

    sub (rhs: Ratio): Ratio {
        return this.add(rhs.neg());
    }

    mul (rhs: Ratio): Ratio {
        return Ratio.of(this.num * rhs.num, this.den * rhs.den);
    }

    recip (): Ratio {
        if (this.num === 0n) {
            throw new ExnDomain('reciprocal of zero', this);
        }
        // still reduced, only the sign may need to move
        return this.num < 0n
            ? new Ratio(-this.den, -this.num)
            : new Ratio(this.den, this.num);
    }

    floor (): bigint {
        return floor_div(this.num, this.den);
    }

    // this - floor(this), always in [0, 1)
    frac (): Ratio {
        return new Ratio(this.num - this.floor() * this.den, this.den);
    }


    // ----- Comparison -----

    cmp (rhs: Ratio): -1 | 0 | 1 {
        const l = this.num * rhs.den;
        const r = rhs.num * this.den;
        return l < r ? -1 : (l > r ? 1 : 0);
    }

    eq (rhs: Ratio): boolean {
        return this.num === rhs.num && this.den === rhs.den;
    }

    lt (rhs: Ratio): boolean {
        return this.cmp(rhs) < 0;
    }


    // ----- Output -----

    // Nearest double, ties to even. Results in the subnormal range may be rounded twice.
    to_number (): number {
        let n = this.num;
        if (n === 0n) {
            return 0;
        }
        const negative = n < 0n;
        if (negative) {
            n = -n;
        }
        // scale so that the integer quotient has 54 or 55 bits
        const shift = 54 - (bit_length(n) - bit_length(this.den));
        let a = n;
        let b = this.den;
        if (shift >= 0) {
            a <<= BigInt(shift);
        } else {
            b <<= BigInt(-shift);
        }
        let q = a / b;
        const sticky = a % b !== 0n;
        const extra = bit_length(q) - 53;
        const half = 1n << BigInt(extra - 1);
        const rest = q & ((1n << BigInt(extra)) - 1n);
        q >>= BigInt(extra);
        if (rest > half || (rest === half && (sticky || (q & 1n) === 1n))) {
            q += 1n;
        }
        const d = ldexp(Number(q), extra - shift);
        return negative ? -d : d;
    }

    as_tuple (): [bigint, bigint] {
        return [this.num, this.den];
    }

    as_string (pr: PrinterO): string {
        const base = pr.get_base();
        if (this.den === 1n) {
            return this.num.toString(base);
        }
        return `${this.num.toString(base)}/${this.den.toString(base)}`;
    }

    toString (): string {
        return `${this.num}/${this.den}`;
    }


    // ----- Static constructors -----

    static of (num: bigint, den: bigint): Ratio {
        if (den === 0n) {
            throw new ExnInput('denominator must be non-zero', 'numerator', num);
        }
        if (den < 0n) {
            num = -num;
            den = -den;
        }
        const g = gcd(num, den);
        return new Ratio(num / g, den / g);
    }

    static from_integer (n: Integral): Ratio {
        if (typeof n === 'number' && !Number.isInteger(n)) {
            throw new ExnInput('from_integer expects an integer', 'given', n);
        }
        return new Ratio(BigInt(n), 1n);
    }

    // Exact conversion of the binary value the double encodes.
    static from_double (d: number): Ratio {
        if (!Number.isFinite(d)) {
            throw new ExnInput('from_double expects a finite number', 'given', d);
        }
        const dv = new DataView(new ArrayBuffer(8));
        dv.setFloat64(0, d);
        const bits = dv.getBigUint64(0);
        const negative = (bits >> 63n) === 1n;
        const biased = Number((bits >> 52n) & 0x7FFn);
        let mts = bits & ((1n << 52n) - 1n);
        let exp: number;
        if (biased === 0) {
            // subnormal (or zero)
            exp = -1074;
        } else {
            mts |= 1n << 52n;
            exp = biased - 1075;
        }
        if (mts === 0n) {
            return Ratio.ZERO;
        }
        while (exp < 0 && (mts & 1n) === 0n) {
            mts >>= 1n;
            ++exp;
        }
        const num = negative ? -mts : mts;
        return exp >= 0
            ? new Ratio(num << BigInt(exp), 1n)
            : new Ratio(num, 1n << BigInt(-exp));
    }
}
