import type { BlankNode, NamedNode } from '@rdfjs/types';
import { Decimal } from 'decimal.js';
import { DataFactory } from 'n3';
import * as z from 'zod';
import { InvalidLiteralError, UnsupportedLiteralTypeError } from './errors.js';

/**
 * One RDF term as it appears in a SPARQL 1.1 Query Results JSON binding.
 * `typed-literal` is the pre-recommendation spelling some endpoints still send.
 */
export type SparqlTerm = {
  type: 'uri' | 'literal' | 'typed-literal' | 'bnode';
  value: string;
  datatype?: string;
  'xml:lang'?: string;
};

export const XSD = 'http://www.w3.org/2001/XMLSchema#';
export const RDF_LANG_STRING = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#langString';

/**
 * A literal whose datatype has no lossless native representation
 * (`xsd:gYear`, `xsd:gYearMonth`, `xsd:time`, durations, ...).
 * The lexical form has been validated against the datatype.
 */
export class RawLiteral {
  constructor(readonly value: string, readonly datatype: string) {}

  toString(): string {
    return this.value;
  }
}

export type LiteralValue = string | number | bigint | boolean | Decimal | Date | Uint8Array | RawLiteral;

/** `null` marks a variable left unbound in a result row. */
export type BindingValue = NamedNode | BlankNode | LiteralValue | null;

export type Binding = Record<string, BindingValue>;

const TZ = '(?:Z|[+-](?:(?:0\\d|1[0-3]):[0-5]\\d|14:00))';
const YEAR = '-?(?:[1-9]\\d{4,}|\\d{4})';
const MONTH = '(?:0[1-9]|1[0-2])';
const DAY = '(?:0[1-9]|[12]\\d|3[01])';
const TIME = '(?:(?:[01]\\d|2[0-3]):[0-5]\\d:[0-5]\\d(?:\\.\\d+)?|24:00:00(?:\\.0+)?)';

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const DOUBLE_RE = /^(?:[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?|[+-]?INF|NaN)$/;
const DATE_RE = new RegExp(`^(${YEAR})-(${MONTH})-(${DAY})(${TZ})?$`);
const DATE_TIME_RE = new RegExp(`^(${YEAR})-(${MONTH})-(${DAY})T(\\d{2}):(\\d{2}):(\\d{2})(\\.\\d+)?(${TZ})?$`);

function lexical(pattern: string): z.ZodType<LiteralValue> {
  return z.string().regex(new RegExp(`^${pattern}$`));
}

function integer(min?: bigint, max?: bigint): z.ZodType<LiteralValue> {
  return z
    .string()
    .regex(INTEGER_RE)
    .transform((value) => BigInt(value))
    .refine((n) => (min === undefined || n >= min) && (max === undefined || n <= max), 'out of range')
    .transform((n) =>
      n >= BigInt(Number.MIN_SAFE_INTEGER) && n <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(n) : n
    );
}

function parseDouble(value: string): number {
  if (value === 'INF' || value === '+INF') return Infinity;
  if (value === '-INF') return -Infinity;
  if (value === 'NaN') return NaN;
  return Number(value);
}

function offsetMinutes(tz: string | undefined): number {
  if (tz === undefined || tz === 'Z') return 0;
  const sign = tz.startsWith('-') ? -1 : 1;
  const [hours, minutes] = tz.slice(1).split(':').map(Number);
  return sign * (hours * 60 + minutes);
}

/**
 * Builds the instant for a calendar date and wall-clock time in the given
 * offset. Returns undefined when the day does not exist in that month.
 */
function toInstant(
  year: number,
  month: number,
  day: number,
  time: { hours: number; minutes: number; seconds: number; millis: number },
  tz: string | undefined
): Date | undefined {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return undefined;
  date.setUTCHours(time.hours, time.minutes, time.seconds, time.millis);
  return new Date(date.getTime() - offsetMinutes(tz) * 60_000);
}

const MIDNIGHT = { hours: 0, minutes: 0, seconds: 0, millis: 0 };

const date = z.string().transform((value, ctx) => {
  const m = DATE_RE.exec(value);
  const instant = m ? toInstant(Number(m[1]), Number(m[2]), Number(m[3]), MIDNIGHT, m[4]) : undefined;
  if (!instant) {
    ctx.addIssue({ code: 'custom', message: 'invalid date' });
    return z.NEVER;
  }
  return instant;
});

function dateTime(requireTimezone: boolean): z.ZodType<LiteralValue> {
  return z.string().transform((value, ctx) => {
    const m = DATE_TIME_RE.exec(value);
    let instant: Date | undefined;
    if (m && (!requireTimezone || m[8] !== undefined)) {
      const [hours, minutes, seconds] = [Number(m[4]), Number(m[5]), Number(m[6])];
      const fraction = m[7] ?? '';
      const validTime =
        (hours < 24 && minutes < 60 && seconds < 60) ||
        (hours === 24 && minutes === 0 && seconds === 0 && /^\.?0*$/.test(fraction));
      if (validTime) {
        const millis = Number(fraction.slice(1, 4).padEnd(3, '0'));
        instant = toInstant(Number(m[1]), Number(m[2]), Number(m[3]), { hours, minutes, seconds, millis }, m[8]);
      }
    }
    if (!instant) {
      ctx.addIssue({ code: 'custom', message: 'invalid dateTime' });
      return z.NEVER;
    }
    return instant;
  });
}

const hexBinary = z
  .string()
  .regex(/^(?:[0-9a-fA-F]{2})*$/)
  .transform((value) => new Uint8Array(Buffer.from(value, 'hex')));

const base64Binary = z
  .string()
  .transform((value) => value.replace(/\s+/g, ''))
  .refine((value) => value.length % 4 === 0 && /^[A-Za-z0-9+/]*={0,2}$/.test(value), 'invalid base64')
  .transform((value) => new Uint8Array(Buffer.from(value, 'base64')));

const string = z.string();

const LEXICAL_FORMS: Record<string, z.ZodType<LiteralValue>> = {
  string,
  normalizedString: string,
  token: string,
  language: z.string().regex(/^[a-zA-Z]{1,8}(?:-[a-zA-Z0-9]{1,8})*$/),
  Name: string,
  NCName: string,
  NMTOKEN: string,
  anyURI: string,

  boolean: z
    .string()
    .regex(/^(?:true|false|1|0)$/)
    .transform((value) => value === 'true' || value === '1'),

  integer: integer(),
  nonNegativeInteger: integer(0n),
  positiveInteger: integer(1n),
  nonPositiveInteger: integer(undefined, 0n),
  negativeInteger: integer(undefined, -1n),
  long: integer(-(2n ** 63n), 2n ** 63n - 1n),
  int: integer(-(2n ** 31n), 2n ** 31n - 1n),
  short: integer(-32768n, 32767n),
  byte: integer(-128n, 127n),
  unsignedLong: integer(0n, 2n ** 64n - 1n),
  unsignedInt: integer(0n, 2n ** 32n - 1n),
  unsignedShort: integer(0n, 65535n),
  unsignedByte: integer(0n, 255n),

  decimal: z
    .string()
    .regex(DECIMAL_RE)
    .transform((value) => new Decimal(value)),
  double: z.string().regex(DOUBLE_RE).transform(parseDouble),
  float: z.string().regex(DOUBLE_RE).transform(parseDouble),

  date,
  dateTime: dateTime(false),
  dateTimeStamp: dateTime(true),

  hexBinary,
  base64Binary,

  // no native equivalent; validated, then kept as RawLiteral
  time: lexical(`${TIME}${TZ}?`),
  gYear: lexical(`${YEAR}${TZ}?`),
  gYearMonth: lexical(`${YEAR}-${MONTH}${TZ}?`),
  gMonth: lexical(`--${MONTH}${TZ}?`),
  gDay: lexical(`---${DAY}${TZ}?`),
  gMonthDay: lexical(`--${MONTH}-${DAY}${TZ}?`),
  duration: lexical('-?P(?=\\d|T\\d)(?:\\d+Y)?(?:\\d+M)?(?:\\d+D)?(?:T(?=\\d)(?:\\d+H)?(?:\\d+M)?(?:\\d+(?:\\.\\d+)?S)?)?'),
  dayTimeDuration: lexical('-?P(?=\\d|T\\d)(?:\\d+D)?(?:T(?=\\d)(?:\\d+H)?(?:\\d+M)?(?:\\d+(?:\\.\\d+)?S)?)?'),
  yearMonthDuration: lexical('-?P(?=\\d)(?:\\d+Y)?(?:\\d+M)?')
};

const RAW_DATATYPES = new Set([
  'time',
  'gYear',
  'gYearMonth',
  'gMonth',
  'gDay',
  'gMonthDay',
  'duration',
  'dayTimeDuration',
  'yearMonthDuration'
]);

/**
 * Converts a literal's lexical form to its native value according to its
 * datatype. Raw-kept datatypes are still run through their lexical check.
 */
export function coerceLiteral(value: string, datatype?: string): LiteralValue {
  if (datatype === undefined || datatype === RDF_LANG_STRING) return value;

  const local = datatype.startsWith(XSD) ? datatype.slice(XSD.length) : undefined;
  const schema = local !== undefined && Object.hasOwn(LEXICAL_FORMS, local) ? LEXICAL_FORMS[local] : undefined;
  if (local === undefined || schema === undefined) throw new UnsupportedLiteralTypeError(datatype, value);

  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new InvalidLiteralError(datatype, value);

  return RAW_DATATYPES.has(local) ? new RawLiteral(value, datatype) : parsed.data;
}

export function coerceTerm(term: SparqlTerm | undefined): BindingValue {
  if (term === undefined) return null;

  switch (term.type) {
    case 'uri':
      return DataFactory.namedNode(term.value);
    case 'bnode':
      return DataFactory.blankNode(term.value);
    case 'literal':
    case 'typed-literal':
      return coerceLiteral(term.value, term.datatype);
    default: {
      const unknown: never = term.type;
      throw new UnsupportedLiteralTypeError(String(unknown), term.value);
    }
  }
}
