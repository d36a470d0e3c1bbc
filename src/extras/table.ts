import { continued_fraction } from "../continued-fraction";
import { convergents_of } from "../convergents";
import { alignr, Printer, PrinterO } from "../defs";
import { NumericInput, to_operand } from "../input";
import { Ratio } from "../ratio";


const HEADER = ['k', 'a', 'h/k', 'error'];

// One row per grade: the grade, its coefficient, the convergent and the signed error
// `x - h/k'. Columns are right aligned.
export function convergent_table (x: NumericInput, maxlen?: number, pr: PrinterO = Printer): string {
    const value = to_operand(x).ratio;
    const coefficients = Array.from(continued_fraction(x, maxlen));
    const rows: string[][] = [HEADER];
    let grade = 0;
    for (const [h, k] of convergents_of(coefficients)) {
        const error = value.sub(Ratio.of(h, k)).to_number();
        rows.push([
            grade.toString(),
            pr.to_string(coefficients[grade]),
            `${pr.to_string(h)}/${pr.to_string(k)}`,
            error.toExponential(3),
        ]);
        ++grade;
    }
    const wids = HEADER.map((_, j) => Math.max(...rows.map(r => r[j].length)));
    return rows.map(r => r.map((s, j) => alignr(wids[j], s)).join('  ')).join('\n');
}
