import { ExnDomain } from "./defs";
import { Ratio } from "./ratio";


export interface ExprOptions {
    // spaces around `+'
    with_spaces?: boolean;
    // `1.0/(' instead of `1/(', for languages where `1/n' is an integer division
    force_floats?: boolean;
}


// Value of c0 + 1/(c1 + 1/(c2 + ...)) in double precision, substituting back from the
// last term. The empty continued fraction is 0.
export function evaluate (cf: Iterable<number | bigint>): number {
    const terms = Array.from(cf, Number);
    if (terms.length === 0) {
        return 0;
    }
    let fraction = 0;
    for (let i = terms.length - 1; i > 0; --i) {
        const divisor = terms[i] + fraction;
        if (divisor === 0) {
            throw new ExnDomain('division by zero while evaluating', terms, 'index', i);
        }
        fraction = 1 / divisor;
    }
    return terms[0] + fraction;
}

export function evaluate_exact (cf: Iterable<bigint>): Ratio {
    const terms = Array.from(cf);
    if (terms.length === 0) {
        return Ratio.ZERO;
    }
    let fraction = Ratio.ZERO;
    for (let i = terms.length - 1; i > 0; --i) {
        const divisor = Ratio.from_integer(terms[i]).add(fraction);
        if (divisor.is_zero()) {
            throw new ExnDomain('division by zero while evaluating', terms, 'index', i);
        }
        fraction = divisor.recip();
    }
    return Ratio.from_integer(terms[0]).add(fraction);
}

// "a0 + 1/(a1 + 1/(a2 + 1/(a3)))"
export function arithmetical_expr (cf: Iterable<number | bigint>, opts: ExprOptions = {}): string {
    const { with_spaces = true, force_floats = false } = opts;
    const parts = Array.from(cf, String);
    let joiner = with_spaces ? ' + ' : '+';
    joiner += force_floats ? '1.0/(' : '1/(';
    return parts.join(joiner) + ')'.repeat(Math.max(0, parts.length - 1));
}
