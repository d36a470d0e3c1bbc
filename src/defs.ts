export const DEFAULT_BASE = 10;


// -----------------------------------------------------------------------------
// ----- Exception types -----
// -----------------------------------------------------------------------------

export class Exn extends Error {
    name = 'contfrac::Exception';

    // `args' are `label, value' pairs printed below the message.
    constructor(name: string, message: string, ...args: unknown[]) {
        message = `\n${indent(4, message)}\n`;
        if (args.length > 0) {
            message = `${message}${Exn.arguments_to_string(args)}`;
        }
        super(message);
        this.name = name || this.name;
    }

    private static arguments_to_string (args: unknown[]): string {
        let nargs = args.length;
        if (nargs % 2 !== 0) {
            throw new Error("ExceptionException: even number of `argument-name',"
                + " `argument-value' should be given");
        }
        let strs: string[] = [];
        let w = 0;
        for (let i = 0; i < nargs; i += 2) {
            w = Math.max(w, Printer.to_string(args[i]).length);
        }
        for (let i = 0; i < nargs; i += 2) {
            let w2 = w + 8;
            let msg = indent_next(w2 + 3, Printer.to_string(args[i + 1]));
            strs.push(`${alignr(w2, Printer.to_string(args[i]))} : ${msg}`);
        }
        return (strs.join('\n') + '\n');
    }
}

export class ExnType extends Exn {
    constructor(message: string, ...args: unknown[]) {
        super('contfrac::TypeError', message, ...args);
    }
}

export class ExnInput extends Exn {
    constructor(message: string, ...args: unknown[]) {
        super('contfrac::InvalidInput', message, ...args);
    }
}

export class ExnRange extends Exn {
    constructor(message: string, ...args: unknown[]) {
        super('contfrac::OutOfRange', message, ...args);
    }
}

// Only raised while evaluating: a continued fraction with a vanishing divisor has no
// value.
export class ExnDomain extends Exn {
    constructor(message: string, giv?: unknown, ...args: unknown[]) {
        if (giv === undefined) {
            super('contfrac::DomainError', message);
        } else {
            super('contfrac::DomainError', message, 'given', giv, ...args);
        }
    }
}


// -----------------------------------------------------------------------------
// ----- Printing & Formatting -----
// -----------------------------------------------------------------------------

export interface Printable {
    as_string (pr: PrinterO): string;
}

export interface PrinterOptions {
    base?: number;
    string?: string;
}

const is_printable = (a: unknown): a is Printable =>
    typeof a === 'object' && a !== null
    && 'as_string' in a && typeof a.as_string === 'function';


export class PrinterO {
    private readonly _base: number;
    private readonly _string: string;

    constructor(opts: PrinterOptions = {}) {
        this._base = opts.base || DEFAULT_BASE;
        this._string = opts.string || '';
    }

    get args (): Required<PrinterOptions> {
        return {
            base: this._base,
            string: this._string,
        };
    }

    make (o: PrinterOptions = {}): PrinterO {
        return new PrinterO(Object.assign(this.args, o));
    }

    get_base (): number {
        return this._base;
    }

    base (val: number): PrinterO {
        return this.make({ base: val });
    }

    print (a: unknown): PrinterO {
        let str = this._string;
        if (typeof a === 'string') {
            str += a;
        } else if (typeof a === 'number' || typeof a === 'bigint') {
            str += a.toString(this._base);
        } else if (Array.isArray(a)) {
            str += '[';
            let pr = this.make({ string: '' });
            str += a.map(e => pr.to_string(e)).join(', ');
            str += ']';
        } else if (is_printable(a)) {
            str += a.as_string(this);
        } else if (a === undefined) {
            str += 'undefined';
        } else {
            str += JSON.stringify(a, null, 2);
        }
        return this.make({ string: str });
    }

    toString (): string {
        return this._string;
    }

    to_string (a: unknown): string {
        return this.make({ string: '' }).print(a).toString();
    }
}

export const Printer = new PrinterO();


// -----------------------------------------------------------------------------
// ----- Text layout -----
// -----------------------------------------------------------------------------

export const spaces = (n: number) => ' '.repeat(Math.max(0, n));

export const lines = (s: string) => s.split(/\r?\n/);

export const indent = (w: number, s: string) => lines(s).map(
    (l: string) => spaces(w) + l).join('\n');

const indent_next = (w: number, s: string) => {
    let lns = lines(s).map((l: string) => spaces(w) + l);
    lns[0] = lns[0].trim();
    return lns.join('\n');
};

// Printed width, ignoring terminal colour escapes
const prwid = (s: string) => s.replace(/\x1b\[[0-9;]*m/g, '').length;

export const alignr = (w: number, s: string) =>
    lines(s).map(l => spaces(w - prwid(l)) + l).join('\n');
