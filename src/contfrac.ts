export { continued_fraction, coefficients_of } from './continued-fraction';
export { convergents, convergent, convergents_of } from './convergents';
export type { Convergent } from './convergents';
export { evaluate, evaluate_exact, arithmetical_expr } from './evaluate';
export type { ExprOptions } from './evaluate';
export { to_operand } from './input';
export type { NumericInput, Operand } from './input';
export { Ratio, gcd, floor_div } from './ratio';
export type { Integral } from './ratio';
export {
    Exn, ExnType, ExnInput, ExnRange, ExnDomain, Printer, PrinterO,
} from './defs';
export type { Printable, PrinterOptions } from './defs';
