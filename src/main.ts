import process from 'node:process';

import { Command, CommanderError } from 'commander';

import {
    arithmetical_expr, continued_fraction, convergent, convergents, evaluate,
    evaluate_exact, Exn, ExnInput, NumericInput, Printer,
} from './contfrac';
import { convergent_table } from './extras/table';


const CONSTANTS = new Map<string, number>([
    ['pi', Math.PI],
    ['e', Math.E],
    ['phi', (1 + Math.sqrt(5)) / 2],
]);

const RATIO_RE = /^([+-]?\d+)\/([+-]?\d+)$/;
const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// `p/q' and integers are exact, decimals are doubles
export function parse_value (s: string): NumericInput {
    s = s.trim();
    const named = CONSTANTS.get(s.toLowerCase());
    if (named !== undefined) {
        return named;
    }
    const m = RATIO_RE.exec(s);
    if (m) {
        return [BigInt(m[1]), BigInt(m[2])];
    }
    if (INTEGER_RE.test(s)) {
        return BigInt(s);
    }
    if (DECIMAL_RE.test(s)) {
        return Number(s);
    }
    throw new ExnInput('cannot parse value', 'given', s);
}

function parse_term (s: string): number | bigint {
    s = s.trim();
    if (INTEGER_RE.test(s)) {
        return BigInt(s);
    }
    if (DECIMAL_RE.test(s)) {
        return Number(s);
    }
    throw new ExnInput('cannot parse coefficient', 'given', s);
}

function exact_terms (terms: (number | bigint)[]): bigint[] {
    return terms.map(t => {
        if (typeof t !== 'bigint') {
            throw new ExnInput('exact evaluation takes integer coefficients', 'given', t);
        }
        return t;
    });
}

const parse_count = (v: string): number => Number.parseInt(v, 10);

export function format_coefficients (cf: bigint[]): string {
    const [first, ...rest] = cf;
    return rest.length === 0 ? `[${first}]` : `[${first}; ${rest.join(', ')}]`;
}

const out = (s: string) => {
    process.stdout.write(`${s}\n`);
};


function create_program (): Command {
    const program = new Command();
    program
        .name('contfrac')
        .description('Continued fractions and convergents')
        .exitOverride();

    program
        .command('expand')
        .description('Print the continued fraction coefficients of a value')
        .argument('<value>', 'p/q, an integer, a decimal, or one of pi, e, phi')
        .option('--maxlen <n>', 'Maximum number of coefficients', parse_count)
        .action((value: string, opts: { maxlen?: number }) => {
            out(format_coefficients(Array.from(continued_fraction(parse_value(value), opts.maxlen))));
        });

    program
        .command('convergents')
        .description('Print the convergents of a value, one per line')
        .argument('<value>', 'p/q, an integer, a decimal, or one of pi, e, phi')
        .option('--maxlen <n>', 'Maximum number of convergents', parse_count)
        .option('--table', 'Print grade, coefficient, convergent and error', false)
        .action((value: string, opts: { maxlen?: number, table: boolean }) => {
            const x = parse_value(value);
            if (opts.table) {
                out(convergent_table(x, opts.maxlen));
                return;
            }
            for (const [h, k] of convergents(x, opts.maxlen)) {
                out(`${h}/${k}`);
            }
        });

    program
        .command('convergent')
        .description('Print the convergent of the given grade')
        .argument('<value>', 'p/q, an integer, a decimal, or one of pi, e, phi')
        .argument('<grade>', 'Grade, starting from 0', parse_count)
        .action((value: string, grade: number) => {
            const [h, k] = convergent(parse_value(value), grade);
            out(`${h}/${k}`);
        });

    program
        .command('expr')
        .description('Print the arithmetical expression of a continued fraction')
        .argument('<coefficients...>')
        .option('--no-spaces', 'No spaces around the plus signs')
        .option('--floats', 'Write 1.0/( instead of 1/(', false)
        .action((terms: string[], opts: { spaces: boolean, floats: boolean }) => {
            out(arithmetical_expr(terms.map(parse_term), {
                with_spaces: opts.spaces,
                force_floats: opts.floats,
            }));
        });

    program
        .command('eval')
        .description('Print the value of a continued fraction')
        .argument('<coefficients...>')
        .option('--exact', 'Evaluate in exact rational arithmetic', false)
        .action((terms: string[], opts: { exact: boolean }) => {
            const cf = terms.map(parse_term);
            out(opts.exact ? Printer.to_string(evaluate_exact(exact_terms(cf))) : `${evaluate(cf)}`);
        });

    return program;
}

export async function run_cli (argv = process.argv): Promise<void> {
    const program = create_program();
    try {
        await program.parseAsync(argv);
    } catch (error) {
        if (error instanceof CommanderError) {
            // commander has already printed its message
            if (error.code !== 'commander.helpDisplayed' && error.code !== 'commander.version') {
                process.exitCode = error.exitCode;
            }
            return;
        }
        if (error instanceof Exn) {
            process.stderr.write(`error: ${error.name}: ${error.message.trim()}\n`);
            process.exitCode = 1;
            return;
        }
        throw error;
    }
}
