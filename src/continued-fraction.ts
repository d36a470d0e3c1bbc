import { check_count, NumericInput, Operand, to_operand } from "./input";
import { floor_div, Ratio } from "./ratio";


// Regular continued fraction expansion
//
//     x = a0 + 1/(a1 + 1/(a2 + ...))      a0 any integer, a1, a2, ... > 0
//
// Exact operands are expanded with the Euclidean algorithm on numerator and denominator
// and end when the remainder vanishes. Doubles are expanded from the exact binary value
// they encode, and end as soon as a continued fraction ending at the current step
// (either in floor(r) or in floor(r) + 1) rounds back to the same double.


/**
 * Coefficients of the continued fraction of `x`, generated lazily.
 *
 * `maxlen` caps the number of terms. The input and the cap are checked when this is
 * called, not when the first term is requested.
 *
 * Doubles are subject to binary rounding: `continued_fraction(0.1)` is `[0, 10]`, but
 * the double 0.1 is not exactly 1/10. Pass a tuple or a `Ratio` for exact values.
 */
export function continued_fraction (x: NumericInput, maxlen?: number): Generator<bigint, void, undefined> {
    check_count(maxlen, 'maxlen');
    return coefficients_of(to_operand(x), maxlen);
}

export function* coefficients_of (op: Operand, maxlen = Infinity): Generator<bigint, void, undefined> {
    let num = op.ratio.numerator;
    let den = op.ratio.denominator;
    // last two convergents; only needed for doubles
    let h1 = 1n, h2 = 0n;
    let k1 = 0n, k2 = 1n;
    for (let amount = 0; den !== 0n && amount < maxlen; ++amount) {
        const a = floor_div(num, den);
        [num, den] = [den, num - a * den];
        if (op.kind === 'approx') {
            const h = a * h1 + h2;
            const k = a * k1 + k2;
            if (Ratio.of(h, k).to_number() === op.value) {
                yield a;
                return;
            }
            if (den !== 0n && Ratio.of(h + h1, k + k1).to_number() === op.value) {
                yield a + 1n;
                return;
            }
            [h1, h2] = [h, h1];
            [k1, k2] = [k, k1];
        }
        yield a;
    }
}
